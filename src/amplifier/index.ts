/**
 * Amplifier Module - Public API
 */
export type {
  Amplifier,
  AmplifierConfig,
  AmplifierConfigInput,
  AmplifierDeps,
  ZoneRegistry,
} from "./schema.js";
export { AmplifierConfigSchema } from "./schema.js";
export type { AmplifierError } from "./errors.js";
export { formatAmplifierError } from "./errors.js";
export { createZoneRegistry } from "./registry.js";
export { parseAmplifierConfig, setupAmplifier } from "./service.js";
