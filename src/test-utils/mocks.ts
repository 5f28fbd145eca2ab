/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type {
  ArtifactLocation,
  FileStat,
  FileSystem,
  LaunchRequest,
  Opener,
  ProcessLauncher,
  ProcessOutcome,
  Prompter,
  SelectOptions,
  ShellExecutor,
} from "#/core";

interface MockFileEntry {
  content: string;
  mtimeMs: number;
}

export type MockFileSystem = FileSystem & {
  files: Map<string, MockFileEntry>;
  /** Every path passed to readFile, in call order */
  reads: string[];
  writeFile(path: string, content: string, mtimeMs?: number): void;
  touch(path: string, mtimeMs?: number): void;
  remove(path: string): void;
};

/**
 * Create a mock FileSystem with in-memory storage.
 * Modification times come from a counter that advances by 1000 on each write,
 * so a later write is always newer.
 */
export function createMockFileSystem(initialFiles: Record<string, string> = {}): MockFileSystem {
  const files = new Map<string, MockFileEntry>();
  const reads: string[] = [];
  let clock = 0;

  const nextTime = (): number => {
    clock += 1000;
    return clock;
  };

  const trim = (path: string): string => (path.length > 1 && path.endsWith("/") ? path.slice(0, -1) : path);

  const hasChildren = (dir: string): boolean => {
    const prefix = dir === "/" ? "/" : `${dir}/`;
    for (const filePath of files.keys()) {
      if (filePath.startsWith(prefix)) return true;
    }
    return false;
  };

  for (const [path, content] of Object.entries(initialFiles)) {
    files.set(path, { content, mtimeMs: nextTime() });
  }

  return {
    files,
    reads,

    readFile(path: string): string {
      reads.push(path);
      const entry = files.get(path);
      if (!entry) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return entry.content;
    },

    exists(path: string): boolean {
      const normalized = trim(path);
      return files.has(normalized) || hasChildren(normalized);
    },

    readdir(path: string): string[] {
      const normalized = trim(path);
      const prefix = normalized === "/" ? "/" : `${normalized}/`;
      const results = new Set<string>();

      for (const filePath of files.keys()) {
        if (filePath.startsWith(prefix)) {
          const firstPart = filePath.slice(prefix.length).split("/")[0];
          if (firstPart) {
            results.add(firstPart);
          }
        }
      }

      return Array.from(results);
    },

    stat(path: string): FileStat {
      const normalized = trim(path);
      const entry = files.get(normalized);
      if (entry) {
        return { isDirectory: false, isFile: true, size: entry.content.length, mtimeMs: entry.mtimeMs };
      }
      if (hasChildren(normalized)) {
        return { isDirectory: true, isFile: false, size: 0, mtimeMs: 0 };
      }
      throw new Error(`ENOENT: no such file or directory, stat '${path}'`);
    },

    writeFile(path: string, content: string, mtimeMs?: number): void {
      files.set(path, { content, mtimeMs: mtimeMs ?? nextTime() });
    },

    touch(path: string, mtimeMs?: number): void {
      const entry = files.get(path);
      if (!entry) {
        throw new Error(`ENOENT: no such file or directory, utime '${path}'`);
      }
      entry.mtimeMs = mtimeMs ?? nextTime();
    },

    remove(path: string): void {
      files.delete(path);
    },
  };
}

/**
 * Recorded shell execution call
 */
interface ShellCall {
  command: string;
  args: string[];
}

/**
 * Create a mock ShellExecutor with predefined command outputs.
 * Matching is done against the command name.
 */
export function createMockShellExecutor(
  results: Record<string, string | Error> = {}
): ShellExecutor & { calls: ShellCall[]; results: Record<string, string | Error> } {
  const calls: ShellCall[] = [];

  return {
    calls,
    results,

    execFile(command: string, args: string[]): string {
      calls.push({ command, args });

      const result = results[command];
      if (result instanceof Error) {
        throw result;
      }
      return result ?? "";
    },
  };
}

/**
 * A process started through the mock launcher. Tests drive it by hand.
 */
export interface MockProcess {
  request: LaunchRequest;
  emit(chunk: string): void;
  exit(exitCode?: number): void;
  failToStart(error: Error): void;
}

export function createMockProcessLauncher(): ProcessLauncher & { processes: MockProcess[] } {
  const processes: MockProcess[] = [];

  return {
    processes,

    launch(request: LaunchRequest): void {
      let finished = false;
      const finish = (outcome: ProcessOutcome): void => {
        if (finished) return;
        finished = true;
        request.onFinish(outcome);
      };

      processes.push({
        request,
        emit: (chunk) => request.onOutput(chunk),
        exit: (exitCode = 0) => finish({ status: "exited", exitCode, signal: null }),
        failToStart: (error) => finish({ status: "failed-to-start", error }),
      });
    },
  };
}

interface PrompterCall {
  method: "select" | "editText";
  prompt: string;
  candidates?: string[];
  options?: SelectOptions;
  initial?: string;
}

/**
 * Create a scripted Prompter.
 * `select` answers with the scripted choice, or the first candidate when none is scripted.
 * `edit` maps the initial text to the edited text; identity by default.
 */
export function createMockPrompter(script: {
  choices?: string[];
  edit?: (initial: string) => string;
} = {}): Prompter & { calls: PrompterCall[] } {
  const calls: PrompterCall[] = [];
  const choices = [...(script.choices ?? [])];

  return {
    calls,

    async select(prompt: string, candidates: string[], options: SelectOptions): Promise<string> {
      calls.push({ method: "select", prompt, candidates, options });
      return choices.shift() ?? candidates[0] ?? "";
    },

    async editText(prompt: string, initial: string): Promise<string> {
      calls.push({ method: "editText", prompt, initial });
      return script.edit ? script.edit(initial) : initial;
    },
  };
}

export function createMockOpener(): Opener & { opened: ArtifactLocation[] } {
  const opened: ArtifactLocation[] = [];

  return {
    opened,

    open(location: ArtifactLocation): void {
      opened.push(location);
    },
  };
}
