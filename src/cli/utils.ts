import boxen from "boxen";
import chalk from "chalk";

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

/**
 * One-line summary printed after a successful copy.
 */
export function copySummary(opts: {
  files: number;
  chars: number;
  tokens: number;
  destination: string;
}): string {
  const verb = opts.destination === "clipboard" ? "Copied" : "Wrote";
  return (
    `${verb} ${pluralize(opts.files, "file")} ` +
    `(${opts.chars.toLocaleString("en-US")} chars, ~${opts.tokens.toLocaleString("en-US")} tokens) ` +
    `to ${opts.destination}.`
  );
}

/**
 * Wrap content in a green-bordered box (success).
 */
export function formatBox(content: string): string {
  return boxen(content, {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderColor: "green",
    borderStyle: "round",
  });
}

/**
 * Format a dimmed hint line.
 */
export function hint(text: string): string {
  return chalk.dim(`Hint: ${text}`);
}
