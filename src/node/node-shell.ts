import { execFileSync } from "child_process";
import type { ShellExecutor } from "#/core";

/**
 * ShellExecutor running the executable directly, without a shell.
 * Throws when the command cannot start or exits non-zero.
 */
export const nodeShellExecutor: ShellExecutor = {
  execFile(command: string, args: string[]): string {
    return execFileSync(command, args, {
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "pipe"],
    });
  },
};
