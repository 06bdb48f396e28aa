import type { FileReadError, LlmInfoError } from "../core/errors.js";
import type { TrackedList } from "../core/tracked-list.js";

// === Results ===

export type Result<T, E> = Ok<T> | Err<E>;

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E> {
  ok: false;
  error: E;
}

// === Project Settings ===

export interface Settings {
  /** Extra glob patterns hidden from the selector. */
  ignore: string[];
  /** Apply the built-in ignore set (VCS metadata, dependencies, binaries). */
  useDefaultIgnores: boolean;
  /** Tracked files larger than this are skipped when rendering. */
  maxFileBytes?: number;
}

// === Rendering ===

export interface RenderOptions {
  maxFileBytes?: number;
}

export interface RenderResult {
  text: string;
  /** Paths that made it into `text`, in output order. */
  files: string[];
  skipped: FileReadError[];
}

// === Interactive Selector ===

export type SelectorStatus = "browsing" | "confirmed" | "cancelled";

export interface SelectorState {
  /** All candidate paths, sorted. Never filtered. */
  candidates: readonly string[];
  selected: TrackedList;
  filter: string;
  /** Index into the visible (filtered) list. */
  cursor: number;
  /** First visible row of the scroll window. */
  offset: number;
  pageSize: number;
  status: SelectorStatus;
}

export type SelectorEvent =
  | { type: "up" }
  | { type: "down" }
  | { type: "page-up" }
  | { type: "page-down" }
  | { type: "home" }
  | { type: "end" }
  | { type: "toggle" }
  | { type: "toggle-visible" }
  | { type: "input"; text: string }
  | { type: "backspace" }
  | { type: "escape" }
  | { type: "confirm" }
  | { type: "cancel" }
  | { type: "resize"; pageSize: number };

export type SelectorOutcome =
  | { status: "confirmed"; paths: string[] }
  | { status: "cancelled" };

/**
 * Drives one selector session to completion. The default implementation
 * reads keystrokes from a raw-mode TTY; tests replay scripted events.
 */
export type SelectorRunner = (
  initial: SelectorState
) => Promise<SelectorOutcome>;

// === Sinks ===

/**
 * Destination for the rendered block (clipboard, stdout).
 */
export interface OutputSink {
  readonly name: string;
  deliver(text: string): Promise<Result<void, LlmInfoError>>;
}
