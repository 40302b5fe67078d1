/**
 * Amplifier Module - Zone Registry
 *
 * In-memory, owned by the host and handed to setup.
 */
import type { Zone } from "../zone/index.js";
import type { ZoneRegistry } from "./schema.js";

export function createZoneRegistry(): ZoneRegistry {
  const zones = new Map<string, Zone>();

  return {
    register(zone) {
      if (zones.has(zone.uniqueId)) {
        return false;
      }
      zones.set(zone.uniqueId, zone);
      return true;
    },
    unregister: (uniqueId) => zones.delete(uniqueId),
    get: (uniqueId) => zones.get(uniqueId),
    list: () => [...zones.values()],
  };
}
