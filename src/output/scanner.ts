/**
 * Output scanner
 *
 * Looks through the output of a finished build for the locations of
 * generated artifacts and opens them.
 */

import { isAbsolute, resolve } from "path";
import { pathToFileURL } from "url";
import type { ArtifactKind, ArtifactLocation, Opener } from "#/core";
import { isEngineChannel } from "#/command";
import type { ProcessFinished, ProcessRunner } from "#/runner";
import { getLogger } from "#/logger";

const log = getLogger("output");

const COVERAGE_PATTERN = /^The coverage report for .+ is available at (\S.*?)\s*$/m;

// Tried in order; the first phrasing that matches wins
const HADDOCK_PATTERNS = [
  /Updating Haddock index for local packages in\s*\n\s*(\S.*?)\s*$/m,
  /Documentation created:\s*\n\s*(\S.*?),?\s*$/m,
];

export interface ScannedArtifacts {
  coverage?: string;
  haddock?: string;
}

export interface OutputScannerOptions {
  openCoverage: boolean;
  openHaddock: boolean;
}

/**
 * Find at most one coverage report and one haddock index in `text`.
 * Paths are returned as printed.
 */
export function scanOutput(text: string): ScannedArtifacts {
  const result: ScannedArtifacts = {};

  const coverage = text.match(COVERAGE_PATTERN)?.[1];
  if (coverage) {
    result.coverage = coverage;
  }

  for (const pattern of HADDOCK_PATTERNS) {
    const haddock = text.match(pattern)?.[1];
    if (haddock) {
      result.haddock = haddock;
      break;
    }
  }

  return result;
}

/**
 * Resolve a printed path against the package directory.
 *
 * @example resolveArtifact("haddock", "doc/index.html", "/work/web") → { kind: "haddock", path: "/work/web/doc/index.html", url: "file:///work/web/doc/index.html" }
 */
export function resolveArtifact(kind: ArtifactKind, path: string, packageDir: string): ArtifactLocation {
  const absolute = isAbsolute(path) ? path : resolve(packageDir, path);
  return { kind, path: absolute, url: pathToFileURL(absolute).href };
}

export class OutputScanner {
  constructor(
    private readonly opener: Opener,
    private readonly options: OutputScannerOptions
  ) {}

  /**
   * Scan a finished process and open what it produced.
   * Only engine channels are considered, and only processes that actually ran.
   * Returns the locations that were opened.
   */
  handleFinished(event: ProcessFinished, packageDir: string): ArtifactLocation[] {
    if (!isEngineChannel(event.channel) || event.outcome.status !== "exited") {
      return [];
    }

    const found = scanOutput(event.output);
    const opened: ArtifactLocation[] = [];

    if (found.coverage && this.options.openCoverage) {
      opened.push(resolveArtifact("coverage", found.coverage, packageDir));
    }
    if (found.haddock && this.options.openHaddock) {
      opened.push(resolveArtifact("haddock", found.haddock, packageDir));
    }

    for (const location of opened) {
      log.info({ kind: location.kind, path: location.path }, "Opening artifact");
      this.opener.open(location);
    }
    return opened;
  }

  /**
   * Scan every process the runner finishes. Returns a function that detaches.
   */
  attach(runner: ProcessRunner, resolveDir: (event: ProcessFinished) => string): () => void {
    return runner.onFinish((event) => {
      this.handleFinished(event, resolveDir(event));
    });
  }
}
