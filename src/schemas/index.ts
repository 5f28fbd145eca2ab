import { z } from "zod";
import { DEFAULT_REGISTRY_ARGS, DEFAULT_TOOL_PATH } from "#/constants";

// Engine configuration (.hstack.yaml)
export const EngineConfigSchema = z.object({
  // Executable name or path of the build tool
  toolPath: z.string().min(1).default(DEFAULT_TOOL_PATH),
  // Pick the bare package name as target instead of asking
  autoTarget: z.boolean().default(false),
  // Hand the assembled command line to the prompter for editing
  editBeforeRun: z.boolean().default(false),
  openCoverage: z.boolean().default(true),
  openHaddock: z.boolean().default(true),
  // Arguments passed to the tool to list installed packages
  registryArgs: z.array(z.string()).min(1).default(() => [...DEFAULT_REGISTRY_ARGS]),
}).strict();
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
