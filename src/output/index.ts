export {
  scanOutput,
  resolveArtifact,
  OutputScanner,
  type ScannedArtifacts,
  type OutputScannerOptions,
} from "./scanner";
