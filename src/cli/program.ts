import { statSync } from "node:fs";
import { resolve } from "node:path";
import chalk from "chalk";
import { Command, CommanderError } from "commander";
import ora from "ora";
import { TRACKED_LIST_FILE, loadOrEmpty, save } from "../core/config-store.js";
import {
  EmptyListError,
  ExitCode,
  LlmInfoError,
  UsageError,
} from "../core/errors.js";
import { render } from "../core/formatter.js";
import { collectCandidates } from "../core/scanner.js";
import { createSelectorState } from "../core/selector.js";
import { loadSettings, mergeSettings } from "../core/settings.js";
import { estimateTokens } from "../core/token-estimator.js";
import { getSink, type SinkTarget } from "../providers/index.js";
import type { OutputSink, SelectorRunner } from "../types/index.js";
import { createLogger, type Logger } from "./logger.js";
import { pageSizeFor, runSelector } from "./tui.js";
import { copySummary, formatBox, hint, pluralize } from "./utils.js";

export const VERSION = "0.1.0";

export interface CliDeps {
  cwd: string;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** stdin is a terminal; edit mode refuses to run otherwise. */
  interactive: boolean;
  /** Animate spinners (stderr is a terminal). */
  spinners: boolean;
  selector: SelectorRunner;
  sink: (target: SinkTarget) => OutputSink;
  /** Rows available to the selector's file list. */
  pageSize: number;
}

type CliOptions = {
  edit?: boolean;
  regen?: boolean;
  project?: string;
  print?: boolean;
  ignore?: string[];
  defaultIgnores: boolean;
  verbose?: boolean;
};

function defaultDeps(): CliDeps {
  return {
    cwd: process.cwd(),
    stdout: process.stdout,
    stderr: process.stderr,
    interactive: process.stdin.isTTY === true,
    spinners: process.stderr.isTTY === true,
    selector: (initial) => runSelector(initial),
    sink: (target) => getSink(target),
    pageSize: pageSizeFor(process.stdout.rows),
  };
}

/**
 * Parse `argv` (user arguments only) and run copy or edit mode.
 * Resolves to the process exit code; never calls process.exit itself.
 */
export async function main(
  argv: string[],
  overrides: Partial<CliDeps> = {}
): Promise<ExitCode> {
  const base = { ...defaultDeps(), ...overrides };
  const deps: CliDeps = {
    ...base,
    sink: overrides.sink ?? ((target) => getSink(target, base.stdout)),
  };
  const logger = createLogger(deps);
  let exitCode: ExitCode = ExitCode.SUCCESS;

  const program = new Command();
  program
    .name("llm-info")
    .description(
      "Copy a curated list of project files to the clipboard, fenced for an LLM prompt."
    )
    .version(VERSION)
    .option("-e, --edit", "choose the tracked files interactively")
    .option("--regen", "alias for --edit")
    .option("-p, --project <path>", "project root (default: current directory)")
    .option("--print", "write the block to stdout instead of the clipboard")
    .option("--ignore <pattern...>", "extra glob patterns to hide in edit mode")
    .option("--no-default-ignores", "show files the built-in ignore set would hide")
    .option("-v, --verbose", "show detailed debug output")
    .allowExcessArguments(false)
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.stdout.write(str),
      writeErr: (str) => deps.stderr.write(str),
      outputError: (str, write) => write(chalk.red(str)),
    })
    .action(async () => {
      const options = program.opts<CliOptions>();
      if (options.verbose) logger.setVerbose(true);
      exitCode =
        options.edit || options.regen
          ? await runEdit(options, deps, logger)
          : await runCopy(options, deps, logger);
    });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version also end up here, with exit code 0
      return err.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.USAGE;
    }
    logger.error(err instanceof Error ? err.message : String(err));
    logger.debug(err);
    return ExitCode.GENERAL_ERROR;
  }
  return exitCode;
}

function fail(logger: Logger, error: LlmInfoError): ExitCode {
  logger.error(error.message);
  if (error.cause) logger.debug(error.cause);
  return error.exitCode;
}

function resolveRoot(options: CliOptions, deps: CliDeps): string | UsageError {
  const root = resolve(deps.cwd, options.project ?? ".");
  if (!statSync(root, { throwIfNoEntry: false })?.isDirectory()) {
    return new UsageError(`Project directory not found: ${root}`);
  }
  return root;
}

// --- copy mode ---

async function runCopy(
  options: CliOptions,
  deps: CliDeps,
  logger: Logger
): Promise<ExitCode> {
  if (options.ignore !== undefined || !options.defaultIgnores) {
    return fail(
      logger,
      new UsageError("--ignore and --no-default-ignores only apply with --edit.")
    );
  }

  const root = resolveRoot(options, deps);
  if (root instanceof UsageError) return fail(logger, root);
  logger.debug("Project root:", root);

  const settings = loadSettings(root);
  if (!settings.ok) return fail(logger, settings.error);

  const tracked = loadOrEmpty(root);
  if (!tracked.ok) return fail(logger, tracked.error);

  if (tracked.value.size === 0) {
    const code = fail(
      logger,
      new EmptyListError(`Nothing to copy: no files are tracked in ${TRACKED_LIST_FILE}.`)
    );
    deps.stderr.write(hint('run "llm-info --edit" to choose files.') + "\n");
    return code;
  }
  logger.debug("Tracked files:", tracked.value.size);

  const rendered = render(root, tracked.value, {
    maxFileBytes: settings.value.maxFileBytes,
  });
  for (const skipped of rendered.skipped) {
    logger.warn(`skipping ${skipped.message}`);
  }
  if (rendered.files.length === 0) {
    return fail(
      logger,
      new EmptyListError(
        `Nothing to copy: none of the ${pluralize(tracked.value.size, "tracked file")} could be read.`
      )
    );
  }

  const target: SinkTarget = options.print ? "stdout" : "clipboard";
  const sink = deps.sink(target);
  const spinner = ora({
    text: `Copying to ${sink.name}...`,
    stream: deps.stderr,
    isSilent: !deps.spinners,
  }).start();
  const delivered = await sink.deliver(rendered.text);
  if (!delivered.ok) {
    spinner.fail(`Could not copy to ${sink.name}`);
    return fail(logger, delivered.error);
  }
  spinner.stop();

  const summary = copySummary({
    files: rendered.files.length,
    chars: rendered.text.length,
    tokens: estimateTokens(rendered.text),
    destination: sink.name,
  });
  // Keep stdout for the block itself when printing
  if (target === "stdout") {
    deps.stderr.write(summary + "\n");
  } else {
    logger.info(chalk.green(summary));
  }
  return ExitCode.SUCCESS;
}

// --- edit mode ---

async function runEdit(
  options: CliOptions,
  deps: CliDeps,
  logger: Logger
): Promise<ExitCode> {
  if (!deps.interactive) {
    return fail(logger, new UsageError("--edit needs an interactive terminal."));
  }

  const root = resolveRoot(options, deps);
  if (root instanceof UsageError) return fail(logger, root);
  logger.debug("Project root:", root);

  const fileSettings = loadSettings(root);
  if (!fileSettings.ok) return fail(logger, fileSettings.error);
  const settings = mergeSettings(fileSettings.value, {
    ignore: options.ignore,
    defaultIgnores: options.defaultIgnores,
  });
  logger.debug("Ignore patterns:", settings.ignore.join(", ") || "(none)");
  logger.debug("Built-in ignores:", settings.useDefaultIgnores ? "on" : "off");

  const tracked = loadOrEmpty(root);
  if (!tracked.ok) return fail(logger, tracked.error);

  const candidates = collectCandidates(root, settings, tracked.value);
  logger.debug("Candidates:", candidates.length);

  const initial = createSelectorState({
    candidates,
    tracked: tracked.value,
    pageSize: deps.pageSize,
  });
  const outcome = await deps.selector(initial);

  if (outcome.status === "cancelled") {
    logger.info(chalk.dim("Cancelled. Nothing was saved."));
    return ExitCode.SUCCESS;
  }

  const available = new Set(candidates);
  for (const stale of tracked.value.filter((path) => !available.has(path))) {
    logger.warn(`dropping ${stale}: file no longer exists`);
  }

  const saved = save(root, outcome.paths);
  if (!saved.ok) return fail(logger, saved.error);

  logger.info(
    formatBox(`Saved ${pluralize(outcome.paths.length, "file")} to ${TRACKED_LIST_FILE}`)
  );
  return ExitCode.SUCCESS;
}
