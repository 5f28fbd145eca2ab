/**
 * Command builder
 *
 * Turns an operation and its arguments into a quoted command line, and
 * names the output channel the command writes to.
 */

import type { Prompter } from "#/core";
import { LOG_CHANNEL_FALLBACK, LOG_CHANNEL_SUFFIX } from "#/constants";
import { getLogger } from "#/logger";
import { shellQuote } from "./quote";
import type { BuildCommandInput, Command } from "./command.types";

const log = getLogger("command");

/**
 * Output channel for a package. Commands on the same package share a channel.
 *
 * @example logChannelKey("My App") → "my-app.stack-log"
 * @example logChannelKey(undefined) → "project.stack-log"
 */
export function logChannelKey(packageName?: string): string {
  const name = packageName?.trim() || LOG_CHANNEL_FALLBACK;
  return `${name.toLowerCase().replace(/\s+/g, "-")}${LOG_CHANNEL_SUFFIX}`;
}

/**
 * Check if a channel follows the engine's naming convention.
 */
export function isEngineChannel(key: string): boolean {
  return key.endsWith(LOG_CHANNEL_SUFFIX) && key.length > LOG_CHANNEL_SUFFIX.length;
}

/**
 * Assemble a command. Order is fixed: tool, operation, args, verbatim args.
 */
export function buildCommand(input: BuildCommandInput): Command {
  const positionalArgs = input.args.filter((arg): arg is string => arg !== null && arg !== undefined);
  const argv = [input.toolPath, input.operation, ...positionalArgs];
  const commandLine = [...argv.map(shellQuote), ...(input.verbatimArgs ?? [])].join(" ");

  return {
    toolPath: input.toolPath,
    operation: input.operation,
    positionalArgs,
    argv,
    commandLine,
    workingDirectory: input.workingDirectory,
    logChannelKey: logChannelKey(input.packageName),
    edited: false,
  };
}

export interface FinalizeOptions {
  editBeforeRun: boolean;
  prompter: Prompter;
}

/**
 * Give the user a chance to edit the command line before it runs.
 * The edited text is used verbatim; `argv` keeps what was built.
 */
export async function finalizeCommand(command: Command, options: FinalizeOptions): Promise<Command> {
  if (!options.editBeforeRun) {
    return command;
  }

  const commandLine = await options.prompter.editText("Command", command.commandLine);
  if (commandLine === command.commandLine) {
    return command;
  }

  log.debug({ from: command.commandLine, to: commandLine }, "Command line edited");
  return { ...command, commandLine, edited: true };
}
