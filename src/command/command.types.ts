/**
 * Command types
 */

/**
 * What an operation acts on, which decides its arguments and working directory.
 * - target: a target of the current package (or the whole package)
 * - package: the current package, passed by name
 * - directory: the current package, run from its directory without arguments
 * - project: the whole project, run from the root
 */
export type OperationScope = "target" | "package" | "directory" | "project";

export interface OperationSpec {
  name: string;
  scope: OperationScope;
  /** Flags the operation accepts */
  flags: readonly string[];
}

export interface BuildCommandInput {
  toolPath: string;
  operation: string;
  /** Absent entries are dropped */
  args: ReadonlyArray<string | null | undefined>;
  /** Appended as-is, without quoting */
  verbatimArgs?: readonly string[];
  workingDirectory: string;
  /** Package whose output channel the command writes to */
  packageName?: string;
}

/**
 * A ready-to-run invocation of the build tool.
 */
export interface Command {
  toolPath: string;
  operation: string;
  positionalArgs: string[];
  /** Unquoted tokens: [toolPath, operation, ...positionalArgs] */
  argv: string[];
  /** Quoted tokens joined by single spaces; replaced wholesale when edited */
  commandLine: string;
  workingDirectory: string;
  logChannelKey: string;
  /** The command line was changed by the user before running */
  edited: boolean;
}
