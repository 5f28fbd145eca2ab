/**
 * Process runner
 *
 * Launches commands without waiting for them. Output is collected per
 * channel and finish listeners hear about every process that ends.
 */

import type { ProcessLauncher, ProcessOutcome } from "#/core";
import type { Command } from "#/command";
import { getLogger } from "#/logger";

const log = getLogger("runner");

export interface ProcessFinished {
  command: Command;
  channel: string;
  outcome: ProcessOutcome;
  /** Everything the process wrote to its channel */
  output: string;
}

export type FinishListener = (event: ProcessFinished) => void;

export class ProcessRunner {
  private readonly buffers = new Map<string, string>();
  private readonly listeners: FinishListener[] = [];

  constructor(private readonly launcher: ProcessLauncher) {}

  /**
   * Register a listener for finished processes.
   * Returns a function that removes it.
   */
  onFinish(listener: FinishListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  /**
   * Current contents of a channel's output buffer.
   */
  output(channel: string): string {
    return this.buffers.get(channel) ?? "";
  }

  /**
   * Start `command` and return immediately. The channel buffer is cleared first.
   */
  run(command: Command): void {
    const channel = command.logChannelKey;
    this.buffers.set(channel, "");
    log.info({ command: command.commandLine, cwd: command.workingDirectory, channel }, "Launching");

    this.launcher.launch({
      commandLine: command.commandLine,
      cwd: command.workingDirectory,
      onOutput: (chunk) => {
        this.buffers.set(channel, this.output(channel) + chunk);
      },
      onFinish: (outcome) => {
        if (outcome.status === "failed-to-start") {
          log.error({ err: outcome.error, command: command.commandLine }, "Process failed to start");
        } else {
          log.info({ channel, exitCode: outcome.exitCode, signal: outcome.signal }, "Process finished");
        }
        this.notify({ command, channel, outcome, output: this.output(channel) });
      },
    });
  }

  private notify(event: ProcessFinished): void {
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }
}
