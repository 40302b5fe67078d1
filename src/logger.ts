/**
 * Named pino loggers, one per driver layer. Development output goes through
 * pino-pretty with the layer name coloured; everything else is JSON lines.
 */
import { type Logger, pino } from "pino";
import { config } from "./config.js";

// ANSI colours for the [name] prefix in pretty output
const MODULE_COLORS = {
  // Host surface
  api: "\x1b[34m", // blue
  middleware: "\x1b[94m", // bright blue

  // Driver layers
  amplifier: "\x1b[33m", // yellow
  zone: "\x1b[32m", // green
  driver: "\x1b[36m", // cyan
  transport: "\x1b[35m", // magenta
  state: "\x1b[95m", // bright magenta
} as const;

const RESET = "\x1b[0m";

export type ModuleName = keyof typeof MODULE_COLORS;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger('transport');
 * log.info({ host, port }, 'Connecting to amplifier');
 */
export function createLogger(module: ModuleName): Logger {
  const color = MODULE_COLORS[module];

  const isDevelopment = config.NODE_ENV === "development";

  if (isDevelopment) {
    // Pretty printing for development
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON for production
  return pino({
    name: module,
    level: config.LOG_LEVEL,
  });
}

// =============================================================================
// Zone Operation Logging
// =============================================================================

/**
 * `→ turnOn started`, with the zone's output in the context.
 */
export function logOperationStart(
  logger: Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `→ ${operation} started`);
}

/**
 * `✓ turnOn completed (12ms)`.
 */
export function logOperationComplete(
  logger: Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * `✗ turnOn failed: <message>`, where the message is an already formatted
 * zone error.
 */
export function logOperationFailed(
  logger: Logger,
  operation: string,
  message: string,
  context: Record<string, unknown> = {},
): void {
  logger.error(
    { operation, error: message, ...context },
    `✗ ${operation} failed: ${message}`,
  );
}
