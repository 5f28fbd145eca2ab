/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export interface FileStat {
  isDirectory: boolean;
  isFile: boolean;
  size: number;
  /** Modification time in milliseconds since the epoch */
  mtimeMs: number;
}

export interface FileSystem {
  readFile(path: string): string;
  exists(path: string): boolean;
  readdir(path: string): string[];
  stat(path: string): FileStat;
}

/**
 * Shell command executor using array-based arguments.
 * Arguments go straight to the executable, without shell interpretation.
 *
 * @example shell.execFile("stack", ["exec", "--", "ghc-pkg", "list"])
 */
export interface ShellExecutor {
  execFile(command: string, args: string[]): string;
}

export type ProcessOutcome =
  | { status: "exited"; exitCode: number | null; signal: string | null }
  | { status: "failed-to-start"; error: Error };

export interface LaunchRequest {
  /** Fully quoted command line, run through the shell */
  commandLine: string;
  cwd: string;
  onOutput(chunk: string): void;
  onFinish(outcome: ProcessOutcome): void;
}

/**
 * Starts long-running processes without waiting for them.
 * Completion is reported through `onFinish` exactly once.
 */
export interface ProcessLauncher {
  launch(request: LaunchRequest): void;
}

export interface SelectOptions {
  /** When true the answer must be one of the offered candidates */
  requireMatch: boolean;
}

/**
 * Interactive capability supplied by whatever UI sits on top of the engine.
 */
export interface Prompter {
  select(prompt: string, candidates: string[], options: SelectOptions): Promise<string>;
  editText(prompt: string, initial: string): Promise<string>;
}

export type ArtifactKind = "coverage" | "haddock";

export interface ArtifactLocation {
  kind: ArtifactKind;
  path: string;
  url: string;
}

export interface Opener {
  open(location: ArtifactLocation): void;
}

export interface EngineContext {
  fs: FileSystem;
  shell: ShellExecutor;
  launcher: ProcessLauncher;
  prompter: Prompter;
  opener: Opener;
  env: Record<string, string | undefined>;
}
