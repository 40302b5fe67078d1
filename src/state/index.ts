/**
 * State Module - Public API
 */
export type { StateTracker, ZoneSnapshot } from "./schema.js";
export { UNKNOWN_ZONE_SNAPSHOT } from "./schema.js";
export { createStateTracker } from "./service.js";
