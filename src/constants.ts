/**
 * Global constants for the hstack engine
 */

// Any one of these marks the root of a project
export const PROJECT_MARKER_FILES = ["stack.yaml", "cabal.project", "cabal.project.local"] as const;

// Marks a project made of several packages
export const COMPOUND_MARKER_FILE = "cabal.project";

export const MANIFEST_EXTENSION = ".cabal";

// Build output directories never searched for manifests
export const IGNORED_DIRECTORIES = [".stack-work", "dist", "dist-newstyle"] as const;

export const CONFIG_FILE = ".hstack.yaml";

export const DEFAULT_TOOL_PATH = "stack";

export const DEFAULT_REGISTRY_ARGS: readonly string[] = ["exec", "--", "ghc-pkg", "list", "--simple-output"];

// Output channels are named "<package>.stack-log"
export const LOG_CHANNEL_SUFFIX = ".stack-log";
export const LOG_CHANNEL_FALLBACK = "project";
