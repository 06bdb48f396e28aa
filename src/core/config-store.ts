import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { Result } from "../types/index.js";
import {
  ConfigError,
  ConfigNotFoundError,
  describeFsError,
  isErrnoException,
} from "./errors.js";
import { err, ok } from "./result.js";
import { TrackedList } from "./tracked-list.js";

export const TRACKED_LIST_FILE = ".llm_info";

export function trackedListPath(root: string): string {
  return join(root, TRACKED_LIST_FILE);
}

/**
 * Read the tracked list from `<root>/.llm_info`.
 */
export function load(
  root: string
): Result<TrackedList, ConfigNotFoundError | ConfigError> {
  const file = trackedListPath(root);
  let content: string;
  try {
    content = readFileSync(file, "utf-8");
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") {
      return err(new ConfigNotFoundError(file));
    }
    return err(
      new ConfigError(file, `Cannot read ${file}: ${describeFsError(e)}`, { cause: e })
    );
  }
  return ok(parseTrackedList(content));
}

/**
 * Like {@link load}, but a missing file is an empty list.
 */
export function loadOrEmpty(root: string): Result<TrackedList, ConfigError> {
  const result = load(root);
  if (result.ok) return result;
  if (result.error instanceof ConfigNotFoundError) {
    return ok(TrackedList.empty());
  }
  return err(result.error);
}

/**
 * Overwrite `<root>/.llm_info` with one path per line.
 */
export function save(
  root: string,
  paths: Iterable<string>
): Result<void, ConfigError> {
  const file = trackedListPath(root);
  try {
    writeFileSync(file, serializeTrackedList(TrackedList.from(paths)), "utf-8");
  } catch (e) {
    return err(
      new ConfigError(file, `Cannot write ${file}: ${describeFsError(e)}`, { cause: e })
    );
  }
  return ok();
}

export function parseTrackedList(content: string): TrackedList {
  return TrackedList.from(content.split(/\r?\n/));
}

export function serializeTrackedList(list: TrackedList): string {
  return list.size === 0 ? "" : list.toArray().join("\n") + "\n";
}
