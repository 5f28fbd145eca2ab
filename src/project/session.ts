/**
 * Project session
 *
 * Holds the active ProjectState and keeps it in step with the files on disk.
 * Manifests are reparsed only when their modification time moved forward.
 */

import { basename, extname } from "path";
import type { FileSystem } from "#/core";
import {
  NoManifestFoundError,
  NoProjectFoundError,
  NoProjectLoadedError,
  UnknownPackageError,
  isHstackError,
} from "#/errors";
import { fallbackRecord, parseManifest, type PackageRecord } from "#/manifest";
import { getLogger } from "#/logger";
import { compoundMarkerPath, findManifests, findRootManifests, locateRoot } from "./locator";
import type { PackageSelection, ProjectState } from "./project.types";

const log = getLogger("project");

function emptySelection(): PackageSelection {
  return { flags: [] };
}

function readModTime(fs: FileSystem, path: string): number | undefined {
  try {
    return fs.stat(path).mtimeMs;
  } catch {
    return undefined;
  }
}

export class ProjectSession {
  private state: ProjectState | undefined;

  constructor(private readonly fs: FileSystem) {}

  /** The active project, if prepare has succeeded at least once */
  get current(): ProjectState | undefined {
    return this.state;
  }

  /**
   * Locate the project enclosing `startDir` and bring its package records up to date.
   *
   * A different root, or a newer compound marker, reloads every manifest.
   * Otherwise only manifests whose modification time advanced are reparsed.
   */
  prepare(startDir: string): ProjectState {
    const rootDir = locateRoot(this.fs, startDir);
    if (!rootDir) {
      throw new NoProjectFoundError(startDir);
    }

    const markerModTime = readModTime(this.fs, compoundMarkerPath(rootDir));
    const compound = markerModTime !== undefined;

    let manifests: string[] | undefined;
    let projectName: string;
    if (compound) {
      projectName = basename(rootDir);
    } else {
      manifests = findRootManifests(this.fs, rootDir);
      const [only] = manifests;
      if (manifests.length !== 1 || only === undefined) {
        throw new NoManifestFoundError(rootDir, manifests.length);
      }
      projectName = basename(only, extname(only));
    }

    // Undefined when there is no loaded project or it has a different root
    const previous = this.state?.rootDirectory === rootDir ? this.state : undefined;

    let packages: PackageRecord[];
    if (!previous || this.needsFullReload(previous, markerModTime, manifests)) {
      const paths = manifests ?? findManifests(this.fs, rootDir);
      packages = this.dedupe(paths.map((path) => this.load(path)));
      log.info({ rootDir, packages: packages.length, compound }, "Loaded project");
    } else {
      // A reparsed manifest may now claim a name another package holds
      packages = this.dedupe(previous.packages.map((record) => this.refresh(record)));
    }

    let currentPackage: PackageRecord | undefined;
    let selection: PackageSelection;
    if (!previous) {
      currentPackage = packages[0];
      selection = emptySelection();
    } else {
      const previousPath = previous.currentPackage?.manifestPath;
      currentPackage = packages.find((p) => p.manifestPath === previousPath) ?? packages[0];
      selection = currentPackage?.manifestPath === previousPath ? previous.selection : emptySelection();
    }

    this.state = {
      rootDirectory: rootDir,
      projectName,
      isCompound: packages.length > 1,
      packages,
      currentPackage,
      projectMarkerModTime: markerModTime,
      selection,
    };
    return this.state;
  }

  /**
   * Make the named package the active scope. Clears the package selection.
   */
  selectPackage(name: string): PackageRecord {
    const state = this.requireState();
    const record = state.packages.find((p) => p.name === name);
    if (!record) {
      throw new UnknownPackageError(name, state.rootDirectory);
    }
    if (record !== state.currentPackage) {
      state.currentPackage = record;
      state.selection = emptySelection();
    }
    return record;
  }

  /**
   * Remember what was chosen for the current package.
   */
  recordSelection(selection: Partial<PackageSelection>): void {
    const state = this.requireState();
    state.selection = { ...state.selection, ...selection };
  }

  reset(): void {
    this.state = undefined;
  }

  private requireState(): ProjectState {
    if (!this.state) {
      throw new NoProjectLoadedError();
    }
    return this.state;
  }

  /**
   * Same root, but the project's shape may still have changed: the compound
   * marker appeared, disappeared or was touched, or a simple project's
   * manifest was renamed.
   */
  private needsFullReload(
    previous: ProjectState,
    markerModTime: number | undefined,
    rootManifests: string[] | undefined
  ): boolean {
    const wasCompound = previous.projectMarkerModTime !== undefined;
    if (markerModTime !== undefined) {
      return !wasCompound || (previous.projectMarkerModTime ?? -Infinity) < markerModTime;
    }
    return wasCompound || !this.sameManifests(previous.packages, rootManifests ?? []);
  }

  private sameManifests(packages: PackageRecord[], manifests: string[]): boolean {
    return (
      packages.length === manifests.length &&
      packages.every((record, i) => record.manifestPath === manifests[i])
    );
  }

  private refresh(record: PackageRecord): PackageRecord {
    const modTime = readModTime(this.fs, record.manifestPath);
    if (modTime === undefined || modTime <= record.manifestModTime) {
      log.debug({ manifest: record.manifestPath }, "Manifest unchanged");
      return record;
    }
    return this.load(record.manifestPath);
  }

  private load(manifestPath: string): PackageRecord {
    try {
      const record = parseManifest(this.fs, manifestPath);
      log.debug({ manifest: manifestPath, name: record.name }, "Parsed manifest");
      return record;
    } catch (err) {
      if (isHstackError(err) && err.code === "MANIFEST_NOT_FOUND") {
        log.warn({ manifest: manifestPath, err }, "Unreadable manifest, using empty record");
        return fallbackRecord(manifestPath, readModTime(this.fs, manifestPath));
      }
      throw err;
    }
  }

  private dedupe(records: PackageRecord[]): PackageRecord[] {
    const seen = new Set<string>();
    return records.filter((record) => {
      if (!record.name) return true;
      if (seen.has(record.name)) {
        log.warn({ name: record.name, manifest: record.manifestPath }, "Duplicate package name ignored");
        return false;
      }
      seen.add(record.name);
      return true;
    });
  }
}
