/**
 * Manifest parser
 *
 * Line classifier for cabal package manifests. Only the handful of keys the
 * engine needs are recognised; everything else is "other".
 */

import { dirname } from "path";
import type { FileSystem } from "#/core";
import { ManifestNotFoundError } from "#/errors";
import type {
  ComponentStanza,
  ManifestField,
  ManifestLine,
  ManifestScan,
  PackageRecord,
} from "./manifest.types";

const COMMENT_PATTERN = /^\s*--/;

const FIELD_PATTERNS: ReadonlyArray<[ManifestField, RegExp]> = [
  ["name", /^\s*name\s*:\s*(.*?)\s*$/i],
  ["version", /^\s*version\s*:\s*(.*?)\s*$/i],
  ["homepage", /^\s*homepage\s*:\s*(.*?)\s*$/i],
  ["location", /^\s*location\s*:\s*(.*?)\s*$/i],
];

// "library" alone or a named sub-library; not "library-dirs:"
const LIBRARY_PATTERN = /^\s*library(?:\s|$)/i;

const COMPONENT_PATTERNS: ReadonlyArray<[ComponentStanza, RegExp]> = [
  ["executable", /^\s*executable\s+(\S+)/i],
  ["test-suite", /^\s*test-suite\s+(\S+)/i],
  ["benchmark", /^\s*benchmark\s+(\S+)/i],
];

/**
 * Classify a single manifest line.
 *
 * @example classifyLine("Name: my-app") → { kind: "field", field: "name", value: "my-app" }
 * @example classifyLine("  executable server") → { kind: "component", stanza: "executable", ident: "server" }
 */
export function classifyLine(line: string): ManifestLine {
  if (COMMENT_PATTERN.test(line)) {
    return { kind: "comment" };
  }

  for (const [field, pattern] of FIELD_PATTERNS) {
    const match = line.match(pattern);
    if (match) {
      return { kind: "field", field, value: match[1] ?? "" };
    }
  }

  if (LIBRARY_PATTERN.test(line)) {
    return { kind: "library" };
  }

  for (const [stanza, pattern] of COMPONENT_PATTERNS) {
    const match = line.match(pattern);
    if (match?.[1]) {
      return { kind: "component", stanza, ident: match[1] };
    }
  }

  return { kind: "other" };
}

/**
 * Scan manifest text into its intermediate form.
 * Fields keep their first non-empty value; stanzas accumulate in file order.
 */
export function scanManifest(text: string): ManifestScan {
  const scan: ManifestScan = {
    hasLibrary: false,
    executables: [],
    testSuites: [],
    benchmarks: [],
  };

  for (const line of text.split(/\r?\n/)) {
    const classified = classifyLine(line);

    switch (classified.kind) {
      case "field":
        if (classified.value && scan[classified.field] === undefined) {
          scan[classified.field] = classified.value;
        }
        break;
      case "library":
        scan.hasLibrary = true;
        break;
      case "component":
        if (classified.stanza === "executable") scan.executables.push(classified.ident);
        else if (classified.stanza === "test-suite") scan.testSuites.push(classified.ident);
        else scan.benchmarks.push(classified.ident);
        break;
      default:
        break;
    }
  }

  return scan;
}

/**
 * Synthesize target strings. Order is fixed: lib, exe, test, bench.
 *
 * @example buildTargets({ name: "app", hasLibrary: true, executables: ["app"], ... }) → ["app:lib", "app:exe:app"]
 */
export function buildTargets(scan: ManifestScan): string[] {
  const name = scan.name ?? "";
  const targets: string[] = [];

  if (scan.hasLibrary) {
    targets.push(`${name}:lib`);
  }
  targets.push(...scan.executables.map((exe) => `${name}:exe:${exe}`));
  targets.push(...scan.testSuites.map((test) => `${name}:test:${test}`));
  targets.push(...scan.benchmarks.map((bench) => `${name}:bench:${bench}`));

  return targets;
}

export function parseManifestText(text: string, manifestPath: string, modTime: number): PackageRecord {
  const scan = scanManifest(text);

  return {
    name: scan.name ?? "",
    version: scan.version ?? "",
    targets: buildTargets(scan),
    directory: dirname(manifestPath),
    manifestPath,
    manifestModTime: modTime,
    homepage: scan.homepage,
    repositoryLocation: scan.location,
  };
}

/**
 * Read and parse a manifest file.
 * The modification time is taken before reading, so a write racing the read
 * shows up as stale on the next check.
 */
export function parseManifest(fs: FileSystem, manifestPath: string): PackageRecord {
  let modTime: number;
  let text: string;

  try {
    modTime = fs.stat(manifestPath).mtimeMs;
    text = fs.readFile(manifestPath);
  } catch (err) {
    throw new ManifestNotFoundError(manifestPath, err);
  }

  return parseManifestText(text, manifestPath, modTime);
}

/**
 * Record standing in for a manifest that could not be read.
 */
export function fallbackRecord(manifestPath: string, modTime = 0): PackageRecord {
  return {
    name: "",
    version: "",
    targets: [],
    directory: dirname(manifestPath),
    manifestPath,
    manifestModTime: modTime,
  };
}
