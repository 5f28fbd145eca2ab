/**
 * Operation catalogue
 *
 * The build tool sub-commands the engine knows how to scope, with the flags
 * each one takes.
 */

import { InvalidFlagError, UnknownOperationError } from "#/errors";
import type { OperationSpec } from "./command.types";

const BUILD_FLAGS = [
  "--fast",
  "--pedantic",
  "--file-watch",
  "--coverage",
  "--haddock",
  "--no-haddock-deps",
  "--dry-run",
  "--force-dirty",
  "--profile",
  "--test",
  "--bench",
  "--copy-bins",
] as const;

export const OPERATIONS = {
  build: { name: "build", scope: "target", flags: BUILD_FLAGS },
  test: { name: "test", scope: "target", flags: ["--fast", "--coverage", "--file-watch", "--no-run-tests"] },
  bench: { name: "bench", scope: "target", flags: ["--fast", "--no-run-benchmarks"] },
  haddock: { name: "haddock", scope: "target", flags: ["--no-haddock-deps", "--open"] },
  install: { name: "install", scope: "target", flags: ["--fast", "--pedantic"] },
  clean: { name: "clean", scope: "package", flags: ["--full"] },
  sdist: { name: "sdist", scope: "directory", flags: ["--pvp-bounds=none", "--pvp-bounds=lower", "--pvp-bounds=upper", "--pvp-bounds=both"] },
  upload: { name: "upload", scope: "directory", flags: ["--candidate"] },
  setup: { name: "setup", scope: "project", flags: ["--reinstall", "--upgrade-cabal"] },
  update: { name: "update", scope: "project", flags: [] },
  upgrade: { name: "upgrade", scope: "project", flags: ["--binary-only", "--source-only"] },
  exec: { name: "exec", scope: "project", flags: [] },
} as const satisfies Record<string, OperationSpec>;

export type OperationName = keyof typeof OPERATIONS;

export function isOperationName(value: string): value is OperationName {
  return Object.hasOwn(OPERATIONS, value);
}

export function getOperation(name: string): OperationSpec {
  if (!isOperationName(name)) {
    throw new UnknownOperationError(name);
  }
  return OPERATIONS[name];
}

/**
 * Throw InvalidFlagError for the first flag the operation does not take.
 */
export function validateFlags(operation: OperationSpec, flags: readonly string[]): void {
  const invalid = flags.find((flag) => !operation.flags.includes(flag));
  if (invalid !== undefined) {
    throw new InvalidFlagError(operation.name, invalid);
  }
}
