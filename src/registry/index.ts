/**
 * Registry module
 *
 * Cached view of the packages installed in the build tool's package databases.
 */

export { PackageRegistry, parseInstalledPackages } from "./package-registry";
