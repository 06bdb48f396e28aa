/**
 * Process exit codes. 0 = success, anything else tells the shell why not.
 */
export const ExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  USAGE: 2,
  NOTHING_TO_COPY: 3,
  CLIPBOARD_UNAVAILABLE: 4,
  IO_ERROR: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type ErrorCode =
  | "USAGE"
  | "EMPTY_LIST"
  | "CONFIG_NOT_FOUND"
  | "CONFIG"
  | "FILE_READ"
  | "CLIPBOARD";

/**
 * Base class for every failure the CLI knows how to report.
 */
export abstract class LlmInfoError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly exitCode: ExitCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad command-line invocation. */
export class UsageError extends LlmInfoError {
  readonly code = "USAGE";
  readonly exitCode = ExitCode.USAGE;
}

/** Copy mode ran with nothing to put on the clipboard. */
export class EmptyListError extends LlmInfoError {
  readonly code = "EMPTY_LIST";
  readonly exitCode = ExitCode.NOTHING_TO_COPY;
}

/** Tracked-list or settings file could not be read, parsed or written. */
export class ConfigError extends LlmInfoError {
  readonly code = "CONFIG";
  readonly exitCode = ExitCode.IO_ERROR;

  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The tracked-list file does not exist yet. Recoverable: callers treat it
 * as an empty list.
 */
export class ConfigNotFoundError extends LlmInfoError {
  readonly code = "CONFIG_NOT_FOUND";
  readonly exitCode = ExitCode.IO_ERROR;

  constructor(readonly path: string) {
    super(`${path} does not exist`);
  }
}

/** One tracked file could not be read. Recovered by skipping it. */
export class FileReadError extends LlmInfoError {
  readonly code = "FILE_READ";
  readonly exitCode = ExitCode.IO_ERROR;

  constructor(
    readonly path: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`${path}: ${reason}`, options);
  }
}

/** No clipboard mechanism on this host, or the write failed. */
export class ClipboardError extends LlmInfoError {
  readonly code = "CLIPBOARD";
  readonly exitCode = ExitCode.CLIPBOARD_UNAVAILABLE;
}

/**
 * Best-effort human reason for a failed fs call.
 */
export function describeFsError(err: unknown): string {
  if (isErrnoException(err)) {
    switch (err.code) {
      case "ENOENT":
        return "no such file";
      case "EACCES":
      case "EPERM":
        return "permission denied";
      case "EISDIR":
        return "is a directory";
    }
    return err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
