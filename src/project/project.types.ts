/**
 * Project types
 */

import type { PackageRecord } from "#/manifest";

/**
 * Selection state scoped to the current package.
 * Cleared when the active project changes.
 */
export interface PackageSelection {
  /** Target chosen for the last target-scoped operation */
  lastTarget?: string;
  /** Flags used by the last operation */
  flags: string[];
}

/**
 * The single active project held by a ProjectSession.
 */
export interface ProjectState {
  rootDirectory: string;
  /** Root directory base name for compound projects, manifest base name otherwise */
  projectName: string;
  /** More than one package was loaded */
  isCompound: boolean;
  /** Ordered, unique by name */
  packages: PackageRecord[];
  /** Active scope for build operations; undefined when the project has no packages */
  currentPackage?: PackageRecord;
  /** Modification time of the compound marker; undefined when there is none */
  projectMarkerModTime?: number;
  selection: PackageSelection;
}
