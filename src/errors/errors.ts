/**
 * Error hierarchy for the engine.
 *
 * HstackError (base)
 * ├── NoProjectFoundError
 * ├── NoProjectLoadedError
 * ├── NoManifestFoundError
 * ├── ManifestNotFoundError
 * ├── ExternalToolMissingError
 * ├── RegistryQueryError
 * ├── InvalidSelectionError
 * ├── UnknownPackageError
 * ├── UnknownOperationError
 * ├── InvalidFlagError
 * └── InvalidConfigError
 */

export type HstackErrorCode =
  | "NO_PROJECT_FOUND"
  | "NO_PROJECT_LOADED"
  | "NO_MANIFEST_FOUND"
  | "MANIFEST_NOT_FOUND"
  | "EXTERNAL_TOOL_MISSING"
  | "REGISTRY_QUERY_FAILED"
  | "INVALID_SELECTION"
  | "UNKNOWN_PACKAGE"
  | "UNKNOWN_OPERATION"
  | "INVALID_FLAG"
  | "INVALID_CONFIG";

export class HstackError extends Error {
  readonly code: HstackErrorCode;

  constructor(code: HstackErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "HstackError";
  }
}

export class NoProjectFoundError extends HstackError {
  readonly startDir: string;

  constructor(startDir: string) {
    super("NO_PROJECT_FOUND", `No project marker found in ${startDir} or any parent directory`);
    this.startDir = startDir;
    this.name = "NoProjectFoundError";
  }
}

export class NoProjectLoadedError extends HstackError {
  constructor() {
    super("NO_PROJECT_LOADED", "No project loaded; call prepare() first");
    this.name = "NoProjectLoadedError";
  }
}

export class NoManifestFoundError extends HstackError {
  readonly rootDir: string;
  readonly count: number;

  constructor(rootDir: string, count: number) {
    super(
      "NO_MANIFEST_FOUND",
      count === 0
        ? `No package manifest found in ${rootDir}`
        : `Expected exactly one package manifest in ${rootDir}, found ${count}`
    );
    this.rootDir = rootDir;
    this.count = count;
    this.name = "NoManifestFoundError";
  }
}

export class ManifestNotFoundError extends HstackError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super("MANIFEST_NOT_FOUND", `Cannot read package manifest ${path}`, { cause });
    this.path = path;
    this.name = "ManifestNotFoundError";
  }
}

export class ExternalToolMissingError extends HstackError {
  readonly toolPath: string;

  constructor(toolPath: string) {
    super("EXTERNAL_TOOL_MISSING", `Build tool not found: ${toolPath}`);
    this.toolPath = toolPath;
    this.name = "ExternalToolMissingError";
  }
}

export class RegistryQueryError extends HstackError {
  constructor(command: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super("REGISTRY_QUERY_FAILED", `Installed package query failed (${command})${reason}`, { cause });
    this.name = "RegistryQueryError";
  }
}

export class InvalidSelectionError extends HstackError {
  constructor(choice: string, candidates: string[]) {
    super("INVALID_SELECTION", `'${choice}' is not one of: ${candidates.join(", ")}`);
    this.name = "InvalidSelectionError";
  }
}

export class UnknownPackageError extends HstackError {
  constructor(name: string, rootDir: string) {
    super("UNKNOWN_PACKAGE", `No package named '${name}' in project ${rootDir}`);
    this.name = "UnknownPackageError";
  }
}

export class UnknownOperationError extends HstackError {
  constructor(name: string) {
    super("UNKNOWN_OPERATION", `Unknown operation: ${name}`);
    this.name = "UnknownOperationError";
  }
}

export class InvalidFlagError extends HstackError {
  constructor(operation: string, flag: string) {
    super("INVALID_FLAG", `Flag ${flag} is not accepted by '${operation}'`);
    this.name = "InvalidFlagError";
  }
}

export class InvalidConfigError extends HstackError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super("INVALID_CONFIG", [message, ...details.map((d) => `  ${d}`)].join("\n"));
    this.details = details;
    this.name = "InvalidConfigError";
  }
}

export function isHstackError(value: unknown): value is HstackError {
  return value instanceof HstackError;
}
