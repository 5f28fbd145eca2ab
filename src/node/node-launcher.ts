import { spawn } from "child_process";
import type { LaunchRequest, ProcessLauncher, ProcessOutcome } from "#/core";
import { getLogger } from "#/logger";

const log = getLogger("launcher");

/**
 * Runs command lines through the system shell, streaming stdout and stderr
 * into the request's output callback.
 */
export class NodeProcessLauncher implements ProcessLauncher {
  launch(request: LaunchRequest): void {
    const child = spawn(request.commandLine, {
      cwd: request.cwd,
      shell: true,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let spawned = false;
    let finished = false;
    const finish = (outcome: ProcessOutcome): void => {
      if (finished) return;
      finished = true;
      request.onFinish(outcome);
    };

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => request.onOutput(chunk));
    child.stderr.on("data", (chunk: string) => request.onOutput(chunk));

    child.on("spawn", () => {
      spawned = true;
    });
    child.on("error", (error) => {
      if (!spawned) {
        finish({ status: "failed-to-start", error });
        return;
      }
      log.warn({ err: error, command: request.commandLine }, "Error from running process");
    });
    child.on("close", (exitCode, signal) => {
      finish({ status: "exited", exitCode, signal });
    });
  }
}
