/**
 * Version utilities
 *
 * Package versions are dotted numeric sequences ("4.18.0.0"), compared
 * segment by segment as numbers. When one version is a prefix of the other,
 * the shorter one is lower ("1.0" < "1.0.0").
 */

const VERSION_PATTERN = /^\d+(?:\.\d+)*$/;

/**
 * Check if a string is a dotted numeric version.
 */
export function isValidVersion(version: string): boolean {
  return VERSION_PATTERN.test(version);
}

function segments(version: string): number[] {
  return version.split(".").map((part) => Number.parseInt(part, 10) || 0);
}

/**
 * Compare two versions.
 * Returns -1 if a < b, 0 if a === b, 1 if a > b.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const left = segments(a);
  const right = segments(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const l = left[i] ?? 0;
    const r = right[i] ?? 0;
    if (l !== r) return l < r ? -1 : 1;
  }

  if (left.length === right.length) return 0;
  return left.length < right.length ? -1 : 1;
}

/**
 * Sort versions in descending order (highest first).
 * Invalid versions are filtered out.
 */
export function sortVersionsDesc(versions: string[]): string[] {
  return versions.filter(isValidVersion).sort((a, b) => compareVersions(b, a));
}

/**
 * Get the highest version from a list.
 * Returns null if the list has no valid versions.
 *
 * @example latestVersion(["1.2.0", "1.10.0", "1.9.9"]) → "1.10.0"
 */
export function latestVersion(versions: string[]): string | null {
  return versions
    .filter(isValidVersion)
    .reduce<string | null>((best, v) => (best === null || compareVersions(v, best) > 0 ? v : best), null);
}
