import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ConfigError } from "../../src/core/errors.js";
import {
  SETTINGS_FILE,
  loadSettings,
  mergeSettings,
  parseSettings,
} from "../../src/core/settings.js";

describe("settings", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "llm-info-settings-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should fall back to defaults when the file is missing", () => {
    const result = loadSettings(root);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({ ignore: [], useDefaultIgnores: true });
  });

  it("should read and fill in defaults", () => {
    writeFileSync(
      join(root, SETTINGS_FILE),
      JSON.stringify({ ignore: ["**/*.log"], maxFileBytes: 1000 })
    );
    const result = loadSettings(root);
    if (!result.ok) throw result.error;
    expect(result.value).toEqual({
      ignore: ["**/*.log"],
      useDefaultIgnores: true,
      maxFileBytes: 1000,
    });
  });

  it("should reject malformed JSON", () => {
    const result = parseSettings("{ ignore: ", "cfg.json");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConfigError);
    expect(result.error.message).toContain("cfg.json is not valid JSON");
  });

  it("should reject unknown keys", () => {
    const result = parseSettings(JSON.stringify({ ignored: [] }), "cfg.json");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toContain("Invalid cfg.json");
    expect(result.error.message).toContain("Unrecognized key");
  });

  it("should name the offending field", () => {
    const result = parseSettings(JSON.stringify({ maxFileBytes: -1 }), "cfg.json");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toContain("maxFileBytes:");
  });

  it("should overlay command-line flags", () => {
    const merged = mergeSettings(
      { ignore: ["**/*.log"], useDefaultIgnores: true },
      { ignore: ["docs/**"], defaultIgnores: false }
    );
    expect(merged).toEqual({ ignore: ["**/*.log", "docs/**"], useDefaultIgnores: false });
  });

  it("should keep file settings when no flags are given", () => {
    const base = { ignore: ["x"], useDefaultIgnores: false, maxFileBytes: 10 };
    expect(mergeSettings(base, { defaultIgnores: true })).toEqual(base);
  });
});
