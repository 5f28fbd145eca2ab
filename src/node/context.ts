import type { EngineContext, Opener, Prompter } from "#/core";
import { nodeFileSystem } from "./node-fs";
import { nodeShellExecutor } from "./node-shell";
import { NodeProcessLauncher } from "./node-launcher";
import { SystemOpener } from "./opener";
import { NonInteractivePrompter } from "./prompter";

/**
 * EngineContext wired to the real filesystem, processes and environment.
 * The prompter defaults to one that refuses to prompt.
 */
export function createNodeContext(overrides: { prompter?: Prompter; opener?: Opener } = {}): EngineContext {
  return {
    fs: nodeFileSystem,
    shell: nodeShellExecutor,
    launcher: new NodeProcessLauncher(),
    prompter: overrides.prompter ?? new NonInteractivePrompter(),
    opener: overrides.opener ?? new SystemOpener(),
    env: process.env,
  };
}
