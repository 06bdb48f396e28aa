import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileReadError } from "../../src/core/errors.js";
import { formatEntry, readTrackedFile, render } from "../../src/core/formatter.js";

describe("formatEntry", () => {
  it("should fence the path and the contents separately", () => {
    expect(formatEntry("a.txt", "hello")).toBe("```\na.txt\n```\n```\nhello\n```");
  });

  it("should keep contents verbatim, trailing newline included", () => {
    expect(formatEntry("b.md", "# Title\n")).toBe("```\nb.md\n```\n```\n# Title\n\n```");
  });
});

describe("render", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "llm-info-render-"));
    writeFileSync(join(root, "a.txt"), "hello");
    writeFileSync(join(root, "b.txt"), "world");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should produce the exact fenced block for two files", () => {
    const result = render(root, ["a.txt", "b.txt"]);
    expect(result.text).toBe(
      "```\na.txt\n```\n```\nhello\n```\n\n```\nb.txt\n```\n```\nworld\n```"
    );
    expect(result.files).toEqual(["a.txt", "b.txt"]);
    expect(result.skipped).toEqual([]);
  });

  it("should emit one path block and one content block per file, in list order", () => {
    mkdirSync(join(root, "src"));
    writeFileSync(join(root, "src", "c.ts"), "export {};");
    const result = render(root, ["src/c.ts", "b.txt", "a.txt"]);

    const lines = result.text.split("\n");
    expect(lines.filter((l) => l === "```")).toHaveLength(12);
    expect(lines.filter((l) => ["src/c.ts", "b.txt", "a.txt"].includes(l))).toEqual([
      "src/c.ts",
      "b.txt",
      "a.txt",
    ]);
    expect(result.text.split("\n\n")).toEqual([
      "```\nsrc/c.ts\n```\n```\nexport {};\n```",
      "```\nb.txt\n```\n```\nworld\n```",
      "```\na.txt\n```\n```\nhello\n```",
    ]);
  });

  it("should skip a missing file and keep the rest", () => {
    const result = render(root, ["a.txt", "gone.txt", "b.txt"]);
    expect(result.files).toEqual(["a.txt", "b.txt"]);
    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0]).toBeInstanceOf(FileReadError);
    expect(result.skipped[0].path).toBe("gone.txt");
    expect(result.skipped[0].message).toBe("gone.txt: no such file");
    expect(result.text).toBe(
      "```\na.txt\n```\n```\nhello\n```\n\n```\nb.txt\n```\n```\nworld\n```"
    );
  });

  it("should return an empty block for an empty list", () => {
    expect(render(root, [])).toEqual({ text: "", files: [], skipped: [] });
  });
});

describe("readTrackedFile", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "llm-info-read-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should read UTF-8 text", () => {
    writeFileSync(join(root, "u.txt"), "héllo ✓");
    const result = readTrackedFile(root, "u.txt");
    expect(result).toEqual({ ok: true, value: "héllo ✓" });
  });

  it("should refuse directories", () => {
    mkdirSync(join(root, "dir"));
    const result = readTrackedFile(root, "dir");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe("not a regular file");
  });

  it("should skip files over the size limit", () => {
    writeFileSync(join(root, "big.txt"), "hello");
    const result = readTrackedFile(root, "big.txt", { maxFileBytes: 4 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("big.txt: 5 bytes exceeds the 4 byte limit");
  });

  it("should accept files exactly at the size limit", () => {
    writeFileSync(join(root, "ok.txt"), "hello");
    expect(readTrackedFile(root, "ok.txt", { maxFileBytes: 5 }).ok).toBe(true);
  });
});
