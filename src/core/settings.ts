import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import type { Result, Settings } from "../types/index.js";
import { ConfigError, describeFsError, isErrnoException } from "./errors.js";
import { err, ok } from "./result.js";

export const SETTINGS_FILE = ".llm_info.json";

export const SettingsSchema = z
  .object({
    ignore: z.array(z.string().min(1)).default([]),
    useDefaultIgnores: z.boolean().default(true),
    maxFileBytes: z.number().int().positive().optional(),
  })
  .strict();

export const DEFAULT_SETTINGS: Settings = {
  ignore: [],
  useDefaultIgnores: true,
};

/**
 * Load `<root>/.llm_info.json`. A missing file yields the defaults.
 */
export function loadSettings(root: string): Result<Settings, ConfigError> {
  const file = join(root, SETTINGS_FILE);
  let raw: string;
  try {
    raw = readFileSync(file, "utf-8");
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") {
      return ok({ ...DEFAULT_SETTINGS, ignore: [] });
    }
    return err(
      new ConfigError(file, `Cannot read ${file}: ${describeFsError(e)}`, { cause: e })
    );
  }
  return parseSettings(raw, file);
}

export function parseSettings(raw: string, file: string): Result<Settings, ConfigError> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    return err(
      new ConfigError(file, `${file} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`, { cause: e })
    );
  }

  const parsed = SettingsSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    return err(new ConfigError(file, `Invalid ${file}: ${issues}`, { cause: parsed.error }));
  }
  return ok(parsed.data);
}

/**
 * Overlay command-line flags on top of the file settings.
 */
export function mergeSettings(
  base: Settings,
  overrides: { ignore?: string[]; defaultIgnores?: boolean }
): Settings {
  return {
    ...base,
    ignore: [...base.ignore, ...(overrides.ignore ?? [])],
    useDefaultIgnores: overrides.defaultIgnores === false ? false : base.useDefaultIgnores,
  };
}
