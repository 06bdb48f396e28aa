import type {
  SelectorEvent,
  SelectorOutcome,
  SelectorState,
} from "../types/index.js";
import { TrackedList } from "./tracked-list.js";

export const DEFAULT_PAGE_SIZE = 20;

/**
 * Initial selector state. Tracked paths that are not candidates start
 * unselected and are therefore dropped on confirm.
 */
export function createSelectorState(opts: {
  candidates: Iterable<string>;
  tracked: TrackedList;
  pageSize?: number;
}): SelectorState {
  const candidates = TrackedList.from(opts.candidates).sorted().toArray();
  const available = new Set(candidates);
  return {
    candidates,
    selected: opts.tracked.filter((path) => available.has(path)),
    filter: "",
    cursor: 0,
    offset: 0,
    pageSize: Math.max(1, opts.pageSize ?? DEFAULT_PAGE_SIZE),
    status: "browsing",
  };
}

/**
 * Case-insensitive subsequence match: every filter character appears in
 * `path`, in order.
 */
export function fuzzyMatch(path: string, filter: string): boolean {
  if (!filter) return true;
  const haystack = path.toLowerCase();
  let from = 0;
  for (const ch of filter.toLowerCase()) {
    const at = haystack.indexOf(ch, from);
    if (at === -1) return false;
    from = at + ch.length;
  }
  return true;
}

export function visiblePaths(state: SelectorState): string[] {
  return state.candidates.filter((path) => fuzzyMatch(path, state.filter));
}

/** Path under the cursor, if any file is visible. */
export function currentPath(state: SelectorState): string | undefined {
  return visiblePaths(state)[state.cursor];
}

/** Selected paths in candidate (alphabetical) order. */
export function selectedPaths(state: SelectorState): string[] {
  return state.candidates.filter((path) => state.selected.has(path));
}

export function outcomeOf(state: SelectorState): SelectorOutcome | null {
  switch (state.status) {
    case "confirmed":
      return { status: "confirmed", paths: selectedPaths(state) };
    case "cancelled":
      return { status: "cancelled" };
    default:
      return null;
  }
}

/**
 * Apply one input event. Pure: the terminal loop only renders what this
 * returns. Once the session has ended, further events are ignored.
 */
export function reduce(state: SelectorState, event: SelectorEvent): SelectorState {
  if (state.status !== "browsing") return state;

  const visible = visiblePaths(state);

  switch (event.type) {
    case "up":
      return clampView({ ...state, cursor: state.cursor - 1 });
    case "down":
      return clampView({ ...state, cursor: state.cursor + 1 });
    case "page-up":
      return clampView({ ...state, cursor: state.cursor - state.pageSize });
    case "page-down":
      return clampView({ ...state, cursor: state.cursor + state.pageSize });
    case "home":
      return clampView({ ...state, cursor: 0 });
    case "end":
      return clampView({ ...state, cursor: visible.length - 1 });

    case "toggle": {
      const path = visible[state.cursor];
      if (path === undefined) return state;
      return { ...state, selected: state.selected.toggle(path) };
    }

    case "toggle-visible": {
      if (visible.length === 0) return state;
      const allSelected = visible.every((path) => state.selected.has(path));
      const selected = visible.reduce(
        (list, path) => (allSelected ? list.remove(path) : list.add(path)),
        state.selected
      );
      return { ...state, selected };
    }

    case "input": {
      const text = stripControl(event.text);
      if (!text) return state;
      return clampView({ ...state, filter: state.filter + text, cursor: 0, offset: 0 });
    }

    case "backspace": {
      if (!state.filter) return state;
      const filter = Array.from(state.filter).slice(0, -1).join("");
      return clampView({ ...state, filter, cursor: 0, offset: 0 });
    }

    case "escape":
      if (state.filter) {
        return clampView({ ...state, filter: "", cursor: 0, offset: 0 });
      }
      return { ...state, status: "cancelled" };

    case "confirm":
      return { ...state, status: "confirmed" };

    case "cancel":
      return { ...state, status: "cancelled" };

    case "resize":
      return clampView({ ...state, pageSize: Math.max(1, event.pageSize) });
  }
}

/**
 * Keep the cursor on a visible row and the scroll window around the cursor.
 */
function clampView(state: SelectorState): SelectorState {
  const count = visiblePaths(state).length;
  const cursor = count === 0 ? 0 : Math.min(Math.max(state.cursor, 0), count - 1);

  let offset = state.offset;
  if (cursor < offset) offset = cursor;
  if (cursor >= offset + state.pageSize) offset = cursor - state.pageSize + 1;
  offset = Math.max(0, Math.min(offset, count - state.pageSize));

  return { ...state, cursor, offset };
}

function stripControl(text: string): string {
  return Array.from(text)
    .filter((ch) => ch >= " " && ch !== "\x7f")
    .join("");
}
