/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Matrix amplifier control configuration covering:
 * - Server settings
 * - Amplifier endpoint and protocol dialect
 * - Zone and input counts
 * - Transport timeouts and refresh polling
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Optional positive integer - empty string becomes undefined.
 */
const optionalInt = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? Number(val) : undefined))
  .pipe(z.number().int().positive().optional());

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8080).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("MatrixAmpControl").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Amplifier Configuration
  // ==========================================================================
  AMP_HOST: z
    .string()
    .min(1, "AMP_HOST is required")
    .describe("Amplifier IP address or hostname"),
  AMP_PORT: optionalInt.describe(
    "Amplifier port (defaults to 4999 for stream, 8750 for datagram)",
  ),
  AMP_DIALECT: z
    .enum(["stream", "datagram"])
    .default("datagram")
    .describe("Wire protocol dialect"),
  AMP_NAME: z.string().default("Matrix Amp").describe("Display name"),
  AMP_NUM_INPUTS: z.coerce
    .number()
    .int()
    .default(6)
    .describe("Number of amplifier inputs (1-16, 1-15 for datagram)"),
  AMP_NUM_OUTPUTS: z.coerce
    .number()
    .int()
    .default(16)
    .describe("Number of amplifier outputs / zones (1-16)"),
  AMP_ENTRY_ID: z
    .string()
    .optional()
    .describe("Prefix for zone unique IDs (defaults to AMP_HOST)"),

  // ==========================================================================
  // Transport Timeouts
  // ==========================================================================
  AMP_CONNECT_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10000)
    .describe("Stream connect timeout (ms)"),
  AMP_COMMAND_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(5000)
    .describe("Stream reply timeout (ms)"),
  AMP_REPLY_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(2000)
    .describe("Datagram reply wait before treating silence as accepted (ms)"),

  // ==========================================================================
  // Refresh Polling (stream dialect only)
  // ==========================================================================
  ENABLE_POLLING: envBoolean(true).describe(
    "Enable periodic zone refresh from the device",
  ),
  POLL_INTERVAL_MS: z.coerce
    .number()
    .positive()
    .default(30000)
    .describe("Zone refresh interval in milliseconds"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Raw amplifier settings for `setupAmplifier`.
 * Range checks (zone/input counts, dialect limits) happen there.
 */
export function getAmplifierSettings(): Readonly<{
  host: string;
  port: number | undefined;
  dialect: "stream" | "datagram";
  name: string;
  numInputs: number;
  numOutputs: number;
  entryId: string | undefined;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  replyTimeoutMs: number;
}> {
  return {
    host: config.AMP_HOST,
    port: config.AMP_PORT,
    dialect: config.AMP_DIALECT,
    name: config.AMP_NAME,
    numInputs: config.AMP_NUM_INPUTS,
    numOutputs: config.AMP_NUM_OUTPUTS,
    entryId: config.AMP_ENTRY_ID,
    connectTimeoutMs: config.AMP_CONNECT_TIMEOUT_MS,
    commandTimeoutMs: config.AMP_COMMAND_TIMEOUT_MS,
    replyTimeoutMs: config.AMP_REPLY_TIMEOUT_MS,
  };
}

/**
 * Polling configuration.
 * Returns null if polling is disabled.
 */
export function getPollingConfig(): Readonly<{ intervalMs: number }> | null {
  if (!config.ENABLE_POLLING) {
    return null;
  }
  return { intervalMs: config.POLL_INTERVAL_MS };
}
