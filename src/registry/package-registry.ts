/**
 * Installed package registry
 *
 * Caches the output of the package database listing. The installed set
 * changes rarely, so the cache is filled on first use and only replaced
 * by an explicit refresh().
 */

import type { ShellExecutor } from "#/core";
import { RegistryQueryError } from "#/errors";
import { getLogger } from "#/logger";

const log = getLogger("registry");

// <name>-<version>, e.g. ghc-boot-th-9.4.7
const PACKAGE_ID_REGEX = /^([A-Za-z0-9]+(?:-[A-Za-z0-9]+)*)-(\d+(?:\.\d+)*)$/;

// Hidden packages are listed as (name-1.0), broken ones as {name-1.0}
const WRAPPER_REGEX = /^[({](.*)[)}]$/;

/**
 * Parse a package database listing into name → versions.
 * Versions keep their order of appearance; duplicates are kept.
 *
 * @example parseInstalledPackages("base-4.18.0.0 text-2.0.2") → Map { "base" => ["4.18.0.0"], "text" => ["2.0.2"] }
 */
export function parseInstalledPackages(output: string): Map<string, string[]> {
  const installed = new Map<string, string[]>();

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    // Database headers: "/usr/lib/ghc/package.conf.d:"
    if (!line || line.endsWith(":")) continue;

    for (const rawToken of line.split(/\s+/)) {
      const token = rawToken.replace(WRAPPER_REGEX, "$1");
      const match = token.match(PACKAGE_ID_REGEX);
      if (!match?.[1] || !match[2]) continue;

      const versions = installed.get(match[1]);
      if (versions) {
        versions.push(match[2]);
      } else {
        installed.set(match[1], [match[2]]);
      }
    }
  }

  return installed;
}

export class PackageRegistry {
  private cache: Map<string, string[]> | undefined;

  constructor(
    private readonly shell: ShellExecutor,
    private readonly toolPath: string,
    private readonly args: readonly string[]
  ) {}

  /**
   * Names of all installed packages, sorted.
   */
  listInstalledPackages(): string[] {
    return Array.from(this.load().keys()).sort();
  }

  /**
   * Every installed version of `name`, in listing order. Empty when not installed.
   */
  listVersions(name: string): string[] {
    return [...(this.load().get(name) ?? [])];
  }

  /**
   * Re-run the listing and replace the cache wholesale.
   */
  refresh(): void {
    this.cache = this.query();
  }

  private load(): Map<string, string[]> {
    if (!this.cache) {
      this.cache = this.query();
    }
    return this.cache;
  }

  private query(): Map<string, string[]> {
    const args = [...this.args];
    let output: string;
    try {
      output = this.shell.execFile(this.toolPath, args);
    } catch (err) {
      throw new RegistryQueryError([this.toolPath, ...args].join(" "), err);
    }

    const installed = parseInstalledPackages(output);
    log.debug({ packages: installed.size }, "Queried installed packages");
    return installed;
  }
}
