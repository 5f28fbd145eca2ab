import type { Prompter } from "#/core";

/**
 * Prompter for non-interactive use. Any attempt to prompt fails, so
 * callers must run with autoTarget on and editBeforeRun off.
 */
export class NonInteractivePrompter implements Prompter {
  async select(prompt: string): Promise<string> {
    throw new Error(`Interactive selection required (${prompt}); enable autoTarget or provide a prompter`);
  }

  async editText(prompt: string): Promise<string> {
    throw new Error(`Interactive editing required (${prompt}); disable editBeforeRun or provide a prompter`);
  }
}
