import chalk from "chalk";

export interface Logger {
  /** Summary lines, standard output. */
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Only printed under --verbose. */
  debug(...args: unknown[]): void;
  setVerbose(verbose: boolean): void;
}

/**
 * Console-backed logger over explicit streams. Everything except `info`
 * goes to stderr so that `--print` output stays clean.
 */
export function createLogger(streams: {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}): Logger {
  const out = new console.Console({ stdout: streams.stdout, stderr: streams.stderr });
  let verbose = false;

  return {
    info(message) {
      out.log(message);
    },
    warn(message) {
      out.error(`${chalk.yellow("warning:")} ${message}`);
    },
    error(message) {
      out.error(`${chalk.red("error:")} ${message}`);
    },
    debug(...args) {
      if (verbose) {
        out.error(chalk.dim("[debug]"), ...args);
      }
    },
    setVerbose(value) {
      verbose = value;
    },
  };
}
