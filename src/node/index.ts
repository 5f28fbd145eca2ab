/**
 * Node adapters
 *
 * Implementations of the core interfaces for running under Node.js.
 */

export { nodeFileSystem } from "./node-fs";
export { nodeShellExecutor } from "./node-shell";
export { NodeProcessLauncher } from "./node-launcher";
export { SystemOpener } from "./opener";
export { NonInteractivePrompter } from "./prompter";
export { createNodeContext } from "./context";
