/**
 * Friendly Errors
 *
 * Turns a `.hstack.yaml` document into an EngineConfig, or into an error
 * whose details name the offending setting. Manifests have their own line
 * scanner and never come through here.
 *
 * @example
 * ```ts
 * const result = parseConfigYaml(content, ".hstack.yaml");
 * if (!result.success) {
 *   throw new InvalidConfigError(result.error.message, result.error.details);
 * }
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodIssue } from "zod";
import { EngineConfigSchema, type EngineConfig } from "#/schemas";

export type ParseErrorType = "yaml" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details?: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

const KNOWN_SETTINGS = Object.keys(EngineConfigSchema.shape);

function suggestSetting(key: string): string {
  const match = KNOWN_SETTINGS.find((known) => known.toLowerCase() === key.toLowerCase());
  return match ? ` (did you mean "${match}"?)` : "";
}

function formatIssue(issue: ZodIssue): string[] {
  const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";

  switch (issue.code) {
    case "unrecognized_keys":
      return issue.keys.map((key) => `Unknown setting "${key}"${suggestSetting(key)}`);
    case "invalid_type":
      return [`${path}expected ${issue.expected}, got ${issue.received}`];
    default:
      return [`${path}${issue.message}`];
  }
}

// First line only; the rest is a source excerpt
function formatYamlError(error: YAMLParseError): string {
  return error.message.split("\n")[0] ?? error.message;
}

function describeDocument(raw: unknown): string {
  if (Array.isArray(raw)) return "a list";
  return typeof raw;
}

/**
 * Parse and validate the contents of a config file.
 * An empty document means "all defaults"; anything other than a mapping at
 * the top level is rejected before the schema runs.
 */
export function parseConfigYaml(content: string, filepath?: string): ParseResult<EngineConfig> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Invalid YAML syntax${fileContext}`,
        details: [err instanceof YAMLParseError ? formatYamlError(err) : String(err)],
      },
    };
  }

  const document = raw ?? {};
  if (typeof document !== "object" || Array.isArray(document)) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid configuration${fileContext}`,
        details: [`Expected a mapping of settings, got ${describeDocument(document)}`],
      },
    };
  }

  const result = EngineConfigSchema.safeParse(document);
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid configuration${fileContext}`,
        details: result.error.issues.flatMap(formatIssue),
      },
    };
  }

  return { success: true, data: result.data };
}
