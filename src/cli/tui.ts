/**
 * Full-screen file picker using raw stdin + ANSI escape codes.
 * No TUI framework: key parsing and rendering are plain functions over the
 * selector state, the loop below only wires them to the terminal.
 */

import chalk from "chalk";
import type {
  SelectorEvent,
  SelectorOutcome,
  SelectorState,
} from "../types/index.js";
import { outcomeOf, reduce, visiblePaths } from "../core/selector.js";
import { pluralize } from "./utils.js";

/** Lines around the file rows: title, help, filter, two scroll hints, footer. */
const CHROME_LINES = 6;

/**
 * Parse a raw stdin chunk into a selector event.
 */
export function parseKey(data: Buffer): SelectorEvent | null {
  if (data.length === 0) return null;
  const first = data[0];

  // Ctrl+C
  if (first === 0x03) return { type: "cancel" };
  // Enter (CR or LF)
  if (first === 0x0d || first === 0x0a) return { type: "confirm" };
  // Ctrl+A
  if (first === 0x01) return { type: "toggle-visible" };
  // Backspace / DEL
  if (first === 0x7f || first === 0x08) return { type: "backspace" };
  if (first === 0x20 && data.length === 1) return { type: "toggle" };

  if (first === 0x1b) {
    if (data.length === 1) return { type: "escape" };
    return parseEscapeSequence(data.subarray(1).toString("latin1"));
  }

  const text = data.toString("utf8");
  return text.trim() ? { type: "input", text } : null;
}

/**
 * Parse a raw stdin chunk that may hold several keys, such as a held-down
 * arrow or pasted text followed by Enter.
 */
export function parseKeys(data: Buffer): SelectorEvent[] {
  const events: SelectorEvent[] = [];
  for (const key of splitKeys(data.toString("utf8"))) {
    const event = parseKey(Buffer.from(key, "utf8"));
    if (event) events.push(event);
  }
  return events;
}

function splitKeys(input: string): string[] {
  const keys: string[] = [];
  let i = 0;
  while (i < input.length) {
    const ch = input[i];
    if (ch === "\x1b") {
      const end = escapeEnd(input, i);
      keys.push(input.slice(i, end));
      i = end;
      continue;
    }
    if (isControl(ch)) {
      keys.push(ch);
      i++;
      continue;
    }
    let end = i;
    while (end < input.length && !isControl(input[end])) end++;
    const text = input.slice(i, end);
    // A run of spaces is repeated toggles, not filter text
    if (text.trim()) keys.push(text);
    else keys.push(...Array.from(text));
    i = end;
  }
  return keys;
}

/** Index just past the escape sequence starting at `start`. */
function escapeEnd(input: string, start: number): number {
  const intro = input[start + 1];
  if (intro === "O") return Math.min(start + 3, input.length);
  if (intro !== "[") return start + 1;
  let i = start + 2;
  // CSI parameter bytes, then one final byte
  while (i < input.length && input[i] >= "0" && input[i] <= "?") i++;
  return Math.min(i + 1, input.length);
}

function isControl(ch: string): boolean {
  return ch < " " || ch === "\x7f";
}

function parseEscapeSequence(seq: string): SelectorEvent | null {
  switch (seq) {
    case "[A":
    case "OA":
      return { type: "up" };
    case "[B":
    case "OB":
      return { type: "down" };
    case "[5~":
      return { type: "page-up" };
    case "[6~":
      return { type: "page-down" };
    case "[H":
    case "OH":
    case "[1~":
      return { type: "home" };
    case "[F":
    case "OF":
    case "[4~":
      return { type: "end" };
    default:
      return null;
  }
}

/**
 * Shorten `text` to `max` columns, keeping its end (the file name).
 */
export function truncateStart(text: string, max: number): string {
  if (max <= 0) return "";
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  if (max === 1) return "…";
  return "…" + chars.slice(chars.length - max + 1).join("");
}

/**
 * Render the selector state as screen lines.
 */
export function renderSelector(state: SelectorState, columns = 80): string[] {
  const visible = visiblePaths(state);
  const lines: string[] = [
    chalk.bold("Select files to track"),
    chalk.dim(
      "↑/↓ move  space toggle  ctrl+a toggle shown  type to filter  enter save  esc cancel"
    ),
    state.filter
      ? `Filter: ${chalk.cyan(state.filter)}`
      : chalk.dim("Filter: (type to narrow)"),
  ];

  if (visible.length === 0) {
    lines.push(chalk.dim(state.candidates.length === 0 ? "  No files" : "  No matches"));
  }

  if (state.offset > 0) {
    lines.push(chalk.dim(`  ↑ ${state.offset} more`));
  }

  const end = Math.min(state.offset + state.pageSize, visible.length);
  for (let i = state.offset; i < end; i++) {
    const path = visible[i];
    const isSelected = state.selected.has(path);
    const label = truncateStart(`${isSelected ? "[x]" : "[ ]"} ${path}`, columns - 4);
    const paint = isSelected ? chalk.green : chalk.red;
    if (i === state.cursor) {
      lines.push(`  ❯ ${chalk.inverse(paint(label))}`);
    } else {
      lines.push(`    ${paint(label)}`);
    }
  }

  if (end < visible.length) {
    lines.push(chalk.dim(`  ↓ ${visible.length - end} more`));
  }

  lines.push(
    chalk.dim(
      `${state.selected.size} selected · ${visible.length} shown / ${pluralize(state.candidates.length, "file")}`
    )
  );
  return lines;
}

export function pageSizeFor(rows: number | undefined): number {
  return Math.max(1, (rows ?? 24) - CHROME_LINES);
}

/**
 * Run an interactive selector session on the terminal. Resolves once the
 * user confirms or cancels.
 */
export function runSelector(
  initial: SelectorState,
  io: { stdin: NodeJS.ReadStream; stdout: NodeJS.WriteStream } = {
    stdin: process.stdin,
    stdout: process.stdout,
  }
): Promise<SelectorOutcome> {
  const { stdin, stdout } = io;

  return new Promise((resolve) => {
    let state = reduce(initial, { type: "resize", pageSize: pageSizeFor(stdout.rows) });

    function render() {
      const lines = renderSelector(state, stdout.columns ?? 80);
      stdout.write("\x1B[H\x1B[2J" + lines.join("\n"));
    }

    function restoreTerminal() {
      // Show cursor, leave the alternate screen
      stdout.write("\x1B[?25h\x1B[?1049l");
    }

    function cleanup() {
      restoreTerminal();
      if (stdin.isTTY) {
        stdin.setRawMode(false);
      }
      stdin.pause();
      stdin.removeListener("data", onData);
      stdout.removeListener("resize", onResize);
      process.removeListener("exit", restoreTerminal);
    }

    function onData(data: Buffer) {
      const events = parseKeys(data);
      if (events.length === 0) return;
      for (const event of events) {
        state = reduce(state, event);
        const outcome = outcomeOf(state);
        if (outcome) {
          cleanup();
          resolve(outcome);
          return;
        }
      }
      render();
    }

    function onResize() {
      state = reduce(state, { type: "resize", pageSize: pageSizeFor(stdout.rows) });
      render();
    }

    // Safety: always restore terminal on exit
    process.on("exit", restoreTerminal);

    // Alternate screen, hide cursor
    stdout.write("\x1B[?1049h\x1B[?25l");
    if (stdin.isTTY) {
      stdin.setRawMode(true);
    }
    stdin.resume();
    stdin.on("data", onData);
    stdout.on("resize", onResize);

    render();
  });
}
