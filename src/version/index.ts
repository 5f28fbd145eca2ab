/**
 * Version module
 *
 * Dotted numeric version validation and comparison.
 */

export { isValidVersion, compareVersions, sortVersionsDesc, latestVersion } from "./version";
