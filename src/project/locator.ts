/**
 * Project locator
 *
 * Upward search for the project root and downward search for manifests.
 */

import { dirname, join } from "path";
import type { FileStat, FileSystem } from "#/core";
import {
  COMPOUND_MARKER_FILE,
  IGNORED_DIRECTORIES,
  MANIFEST_EXTENSION,
  PROJECT_MARKER_FILES,
} from "#/constants";
import { getLogger } from "#/logger";

const log = getLogger("project");

const IGNORED = new Set<string>(IGNORED_DIRECTORIES);

/**
 * Check if a directory holds any of the project marker files.
 */
export function hasProjectMarker(fs: FileSystem, dir: string): boolean {
  return PROJECT_MARKER_FILES.some((marker) => fs.exists(join(dir, marker)));
}

export function compoundMarkerPath(rootDir: string): string {
  return join(rootDir, COMPOUND_MARKER_FILE);
}

/**
 * Find the project root by walking up from `startDir`, inclusive.
 * Returns undefined when the filesystem root is passed without a match.
 */
export function locateRoot(fs: FileSystem, startDir: string): string | undefined {
  let current = startDir;

  for (;;) {
    if (hasProjectMarker(fs, current)) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) return undefined;
    current = parent;
  }
}

function isHidden(entry: string): boolean {
  return entry.startsWith(".");
}

// Hidden names cover editor lock files such as `.#pkg.cabal`
function isManifestFile(entry: string): boolean {
  return !isHidden(entry) && entry.endsWith(MANIFEST_EXTENSION) && entry.length > MANIFEST_EXTENSION.length;
}

function isSearchable(entry: string): boolean {
  return !isHidden(entry) && !IGNORED.has(entry);
}

/**
 * Stat an entry found by readdir. Undefined when it cannot be followed,
 * e.g. a dangling symlink.
 */
function statEntry(fs: FileSystem, path: string): FileStat | undefined {
  try {
    return fs.stat(path);
  } catch (err) {
    log.debug({ path, err }, "Skipping unreadable entry");
    return undefined;
  }
}

/**
 * Manifests directly inside `dir`.
 */
export function findRootManifests(fs: FileSystem, dir: string): string[] {
  return fs
    .readdir(dir)
    .sort()
    .filter(isManifestFile)
    .map((entry) => join(dir, entry))
    .filter((path) => statEntry(fs, path)?.isFile === true);
}

/**
 * Depth-first search for manifests below `rootDir`.
 * A subdirectory holding its own project marker is another project and is
 * not descended into. Build output and hidden directories are skipped.
 */
export function findManifests(fs: FileSystem, rootDir: string): string[] {
  const found: string[] = [];

  const walk = (dir: string, isRoot: boolean): void => {
    if (!isRoot && hasProjectMarker(fs, dir)) {
      return;
    }

    for (const entry of fs.readdir(dir).sort()) {
      if (!isSearchable(entry) && !isManifestFile(entry)) continue;

      const fullPath = join(dir, entry);
      const stat = statEntry(fs, fullPath);
      if (!stat) continue;

      if (stat.isDirectory) {
        if (isSearchable(entry)) {
          walk(fullPath, false);
        }
      } else if (stat.isFile && isManifestFile(entry)) {
        found.push(fullPath);
      }
    }
  };

  walk(rootDir, true);
  return found;
}
