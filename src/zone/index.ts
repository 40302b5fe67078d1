/**
 * Zone Module - Public API
 */
export type {
  Zone,
  ZoneAttributes,
  ZoneOperation,
  ZoneOptions,
  ZoneResult,
  ZoneState,
} from "./schema.js";
export type { ZoneError, ZoneField } from "./errors.js";
export { formatZoneError } from "./errors.js";
export { createZone } from "./service.js";
export { sourceLabel, zoneName, zoneUniqueId } from "./transform.js";
