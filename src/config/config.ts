import { dirname, join } from "path";
import type { FileSystem } from "#/core";
import { CONFIG_FILE } from "#/constants";
import { EngineConfigSchema, type EngineConfig, type EngineConfigInput } from "#/schemas";
import { parseConfigYaml, type ParseResult } from "#/friendly-errors";

/**
 * Engine configuration with every default applied.
 */
export function defaultEngineConfig(overrides: EngineConfigInput = {}): EngineConfig {
  return EngineConfigSchema.parse(overrides);
}

/**
 * Find the closest `.hstack.yaml`, walking up from `startDir`.
 */
export function findConfigFile(fs: FileSystem, startDir: string): string | undefined {
  let current = startDir;

  for (;;) {
    const candidate = join(current, CONFIG_FILE);
    if (fs.exists(candidate)) {
      return candidate;
    }
    const parent = dirname(current);
    if (parent === current) return undefined;
    current = parent;
  }
}

/**
 * Load and validate a config file. A missing file yields the defaults.
 */
export function loadEngineConfig(fs: FileSystem, configPath: string): ParseResult<EngineConfig> {
  if (!fs.exists(configPath)) {
    return { success: true, data: defaultEngineConfig() };
  }
  const content = fs.readFile(configPath);
  return parseConfigYaml(content, configPath);
}
