import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import { createLogger } from "../../src/cli/logger.js";
import { copySummary, formatBox, hint, pluralize } from "../../src/cli/utils.js";

function capture() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

describe("pluralize", () => {
  it("should pick the singular for one", () => {
    expect(pluralize(1, "file")).toBe("1 file");
    expect(pluralize(0, "file")).toBe("0 files");
    expect(pluralize(3, "entry", "entries")).toBe("3 entries");
  });
});

describe("copySummary", () => {
  it("should describe a clipboard copy", () => {
    expect(
      copySummary({ files: 1, chars: 1234, tokens: 309, destination: "clipboard" })
    ).toBe("Copied 1 file (1,234 chars, ~309 tokens) to clipboard.");
  });

  it("should describe a write to stdout", () => {
    expect(copySummary({ files: 2, chars: 56, tokens: 14, destination: "stdout" })).toBe(
      "Wrote 2 files (56 chars, ~14 tokens) to stdout."
    );
  });
});

describe("formatBox / hint", () => {
  it("should wrap content in a rounded box", () => {
    const lines = formatBox("Saved 1 file").split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toContain("╭");
    expect(lines[1]).toContain(" Saved 1 file ");
    expect(lines[2]).toContain("╯");
  });

  it("should prefix hints", () => {
    expect(hint("try --edit")).toBe("Hint: try --edit");
  });
});

describe("createLogger", () => {
  it("should send info to stdout and everything else to stderr", () => {
    const out = capture();
    const errs = capture();
    const logger = createLogger({ stdout: out.stream, stderr: errs.stream });

    logger.info("done");
    logger.warn("careful");
    logger.error("broken");

    expect(out.text()).toBe("done\n");
    expect(errs.text()).toBe("warning: careful\nerror: broken\n");
  });

  it("should only print debug output when verbose", () => {
    const out = capture();
    const errs = capture();
    const logger = createLogger({ stdout: out.stream, stderr: errs.stream });

    logger.debug("hidden");
    logger.setVerbose(true);
    logger.debug("Tracked files:", 2);

    expect(errs.text()).toBe("[debug] Tracked files: 2\n");
    expect(out.text()).toBe("");
  });
});
