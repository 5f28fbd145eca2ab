/**
 * Manifest module
 *
 * Line-oriented parsing of package manifests into PackageRecords.
 */

export * from "./manifest.types";
export {
  classifyLine,
  scanManifest,
  buildTargets,
  parseManifestText,
  parseManifest,
  fallbackRecord,
} from "./manifest";
