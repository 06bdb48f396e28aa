import { readFileSync, statSync } from "node:fs";
import { join } from "node:path";
import type { RenderOptions, RenderResult, Result } from "../types/index.js";
import { FileReadError, describeFsError } from "./errors.js";
import { err, ok } from "./result.js";

const FENCE = "```";

/**
 * Render one file as a fenced path block followed by a fenced content block.
 */
export function formatEntry(path: string, content: string): string {
  return [FENCE, path, FENCE, FENCE, content, FENCE].join("\n");
}

/**
 * Read a tracked file as UTF-8 text.
 */
export function readTrackedFile(
  root: string,
  path: string,
  options: RenderOptions = {}
): Result<string, FileReadError> {
  const full = join(root, path);
  try {
    const stat = statSync(full);
    if (!stat.isFile()) {
      return err(new FileReadError(path, "not a regular file"));
    }
    if (options.maxFileBytes !== undefined && stat.size > options.maxFileBytes) {
      return err(
        new FileReadError(path, `${stat.size} bytes exceeds the ${options.maxFileBytes} byte limit`)
      );
    }
    return ok(readFileSync(full, "utf-8"));
  } catch (e) {
    return err(new FileReadError(path, describeFsError(e), { cause: e }));
  }
}

/**
 * Concatenate every readable tracked file into one block. Unreadable files
 * are collected in `skipped` and left out; the rest still render.
 */
export function render(
  root: string,
  paths: Iterable<string>,
  options: RenderOptions = {}
): RenderResult {
  const entries: string[] = [];
  const files: string[] = [];
  const skipped: FileReadError[] = [];

  for (const path of paths) {
    const result = readTrackedFile(root, path, options);
    if (!result.ok) {
      skipped.push(result.error);
      continue;
    }
    entries.push(formatEntry(path, result.value));
    files.push(path);
  }

  return { text: entries.join("\n\n"), files, skipped };
}
