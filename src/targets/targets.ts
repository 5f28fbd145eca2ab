/**
 * Target selection
 *
 * Candidates are the bare package name (build everything) plus the
 * package's own targets, optionally narrowed by a substring.
 */

import type { Prompter } from "#/core";
import { InvalidSelectionError } from "#/errors";
import { TARGET_KINDS, type PackageRecord, type TargetKind } from "#/manifest";

export interface ParsedTarget {
  packageName: string;
  kind: TargetKind;
  /** Component name; absent for `lib` */
  component?: string;
}

export interface ResolveTargetOptions {
  /** Only targets containing this substring are offered */
  fragment?: string;
  /** Pick the bare package name without asking */
  autoMode: boolean;
  prompter: Prompter;
}

function isTargetKind(value: string): value is TargetKind {
  return TARGET_KINDS.some((kind) => kind === value);
}

/**
 * Split a target string into its parts.
 * Returns null when the string is not a well-formed target.
 *
 * @example parseTarget("app:exe:server") → { packageName: "app", kind: "exe", component: "server" }
 * @example parseTarget("app:lib") → { packageName: "app", kind: "lib" }
 */
export function parseTarget(target: string): ParsedTarget | null {
  const [packageName, kind, component, ...rest] = target.split(":");
  if (!packageName || !kind || !isTargetKind(kind) || rest.length > 0) {
    return null;
  }
  if (kind === "lib") {
    return component === undefined ? { packageName, kind } : null;
  }
  return component ? { packageName, kind, component } : null;
}

export function targetsOfKind(pkg: PackageRecord, kind: TargetKind): string[] {
  return pkg.targets.filter((target) => parseTarget(target)?.kind === kind);
}

/**
 * The package name first, then every target containing `fragment`.
 */
export function targetCandidates(pkg: PackageRecord, fragment?: string): string[] {
  const targets = fragment ? pkg.targets.filter((target) => target.includes(fragment)) : pkg.targets;
  return [pkg.name, ...targets];
}

/**
 * Resolve the target for an operation on `pkg`.
 * In auto mode the package name is returned and the prompter is not consulted.
 */
export async function resolveTarget(pkg: PackageRecord, options: ResolveTargetOptions): Promise<string> {
  if (options.autoMode) {
    return pkg.name;
  }

  const candidates = targetCandidates(pkg, options.fragment);
  const choice = await options.prompter.select(`Target in ${pkg.name}`, candidates, { requireMatch: true });

  if (!candidates.includes(choice)) {
    throw new InvalidSelectionError(choice, candidates);
  }
  return choice;
}
