import { statSync } from "node:fs";
import { join } from "node:path";
import fg from "fast-glob";
import type { Settings } from "../types/index.js";
import { TRACKED_LIST_FILE } from "./config-store.js";
import { SETTINGS_FILE } from "./settings.js";
import { TrackedList, comparePaths } from "./tracked-list.js";

/**
 * Built-in ignore set: VCS metadata, dependency and build output, and files
 * that are binary or look like secrets.
 */
export const DEFAULT_IGNORES: readonly string[] = [
  // Version control
  "**/.git/**",
  "**/.svn/**",
  "**/.hg/**",

  // Dependencies and build output
  "**/node_modules/**",
  "**/dist/**",
  "**/build/**",
  "**/out/**",
  "**/.cache/**",
  "**/__pycache__/**",
  "**/.venv/**",
  "**/target/**",

  // System files
  "**/.DS_Store",
  "**/Thumbs.db",

  // Secrets
  "**/.env*",
  "**/*.pem",
  "**/*.key",

  // Binaries, media, archives
  "**/*.{png,jpg,jpeg,gif,bmp,webp,ico,avif,tiff}",
  "**/*.{pdf,zip,tar,gz,tgz,7z,rar}",
  "**/*.{mp3,mp4,mov,avi,wav}",
  "**/*.{exe,dll,so,dylib,o,a,class,pyc,wasm}",
  "**/*.{sqlite,db}",
  "**/*.{woff,woff2,ttf,otf,eot}",
];

/** The tool's own files never show up as candidates. */
const OWN_FILES = [TRACKED_LIST_FILE, SETTINGS_FILE];

export function ignorePatterns(settings: Settings): string[] {
  return [
    ...OWN_FILES,
    ...(settings.useDefaultIgnores ? DEFAULT_IGNORES : []),
    ...settings.ignore,
  ];
}

/**
 * List every regular file under `root` that the ignore policy lets through,
 * as sorted `/`-separated relative paths. Directories that cannot be read
 * are skipped.
 */
export function scanCandidates(root: string, settings: Settings): string[] {
  const files = fg.sync("**/*", {
    cwd: root,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore: ignorePatterns(settings),
  });
  return files.sort(comparePaths);
}

/**
 * Candidate list for the selector: scanned files plus tracked paths that
 * still exist, even if the ignore policy would hide them.
 */
export function collectCandidates(
  root: string,
  settings: Settings,
  tracked: TrackedList
): string[] {
  const scanned = scanCandidates(root, settings);
  const extra = tracked.filter((path) => isRegularFile(join(root, path)));
  return TrackedList.from([...scanned, ...extra]).sorted().toArray();
}

function isRegularFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}
