/**
 * Manifest types
 *
 * A package manifest (`*.cabal`) is scanned line by line into a ManifestScan,
 * which is then assembled into a PackageRecord.
 */

export const TARGET_KINDS = ["lib", "exe", "test", "bench"] as const;

export type TargetKind = (typeof TARGET_KINDS)[number];

export type ManifestField = "name" | "version" | "homepage" | "location";

export type ComponentStanza = "executable" | "test-suite" | "benchmark";

export type ManifestLine =
  | { kind: "field"; field: ManifestField; value: string }
  | { kind: "library" }
  | { kind: "component"; stanza: ComponentStanza; ident: string }
  | { kind: "comment" }
  | { kind: "other" };

/**
 * Intermediate form of a manifest: first value of each field,
 * stanza identifiers in file order.
 */
export interface ManifestScan {
  name?: string;
  version?: string;
  homepage?: string;
  location?: string;
  hasLibrary: boolean;
  executables: string[];
  testSuites: string[];
  benchmarks: string[];
}

/**
 * One per manifest file.
 */
export interface PackageRecord {
  /** Package name; empty when the manifest declares none */
  name: string;
  /** Dotted-numeric version; empty when the manifest declares none */
  version: string;
  /** `name:lib`, `name:exe:<id>`, `name:test:<id>`, `name:bench:<id>` */
  targets: string[];
  /** Absolute path of the directory holding the manifest */
  directory: string;
  manifestPath: string;
  /** Modification time of the manifest when it was parsed */
  manifestModTime: number;
  homepage?: string;
  /** `location:` of the first source-repository stanza */
  repositoryLocation?: string;
}
