/**
 * Structured logger: a thin pino wrapper.
 *
 * JSON lines on stderr with a label `level` and ISO 8601 `time`, so stdout
 * stays free for whatever UI embeds the engine.
 */
import pino from "pino";

const level = process.env["HSTACK_LOG_LEVEL"] ?? "info";

const rootLogger = pino(
  {
    level,
    base: undefined, // Remove pid and hostname from log output
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);

/**
 * Get a child logger with a module name.
 */
export function getLogger(name: string): pino.Logger {
  return rootLogger.child({ module: name });
}

export { rootLogger };
