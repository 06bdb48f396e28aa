import { sep } from "node:path";

/**
 * Ordered set of project-relative paths. A path can only ever appear once;
 * insertion order is kept.
 */
export class TrackedList implements Iterable<string> {
  private readonly paths: string[];
  private readonly index: Set<string>;

  private constructor(paths: string[]) {
    this.paths = paths;
    this.index = new Set(paths);
  }

  static empty(): TrackedList {
    return new TrackedList([]);
  }

  /**
   * Build a list from arbitrary input. Paths are normalised; whitespace-only
   * entries and repeats are dropped, keeping the first occurrence.
   */
  static from(paths: Iterable<string>): TrackedList {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const raw of paths) {
      const path = normalizePath(raw);
      if (!path.trim() || seen.has(path)) continue;
      seen.add(path);
      out.push(path);
    }
    return new TrackedList(out);
  }

  get size(): number {
    return this.paths.length;
  }

  has(path: string): boolean {
    return this.index.has(normalizePath(path));
  }

  /** Returns a new list with `path` appended, or this list if already present. */
  add(path: string): TrackedList {
    const normalized = normalizePath(path);
    if (!normalized.trim() || this.index.has(normalized)) return this;
    return new TrackedList([...this.paths, normalized]);
  }

  remove(path: string): TrackedList {
    const normalized = normalizePath(path);
    if (!this.index.has(normalized)) return this;
    return new TrackedList(this.paths.filter((p) => p !== normalized));
  }

  toggle(path: string): TrackedList {
    return this.has(path) ? this.remove(path) : this.add(path);
  }

  /** Keep only the paths accepted by `predicate`, order unchanged. */
  filter(predicate: (path: string) => boolean): TrackedList {
    return new TrackedList(this.paths.filter(predicate));
  }

  sorted(): TrackedList {
    return new TrackedList([...this.paths].sort(comparePaths));
  }

  toArray(): string[] {
    return [...this.paths];
  }

  [Symbol.iterator](): Iterator<string> {
    return this.paths[Symbol.iterator]();
  }
}

/**
 * Drop a leading "./" and, on Windows, switch to forward slashes. Spaces are
 * part of the name and kept.
 */
export function normalizePath(path: string, separator: string = sep): string {
  let out = separator === "\\" ? path.replace(/\\/g, "/") : path;
  while (out.startsWith("./")) out = out.slice(2);
  return out;
}

/** Plain code-unit ordering, so output does not depend on the locale. */
export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
