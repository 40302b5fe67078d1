/**
 * Driver Module - Public API
 */
export type {
  AmpDriver,
  CommandOutcome,
  CommandResult,
  DriverConfig,
  DriverDeps,
  QueryResult,
} from "./schema.js";
export type { DriverError } from "./errors.js";
export { formatDriverError } from "./errors.js";
export { createDriver } from "./service.js";
