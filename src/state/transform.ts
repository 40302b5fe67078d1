/**
 * State Module - Pure Transformations
 *
 * Each function returns a new snapshot; the tracker owns the mutable map.
 */
import type { ZoneSnapshot } from "./schema.js";

export const recordPower = (
  snapshot: ZoneSnapshot,
  on: boolean,
  now: number,
): ZoneSnapshot => ({ ...snapshot, power: on, updatedAt: now });

export const recordVolume = (
  snapshot: ZoneSnapshot,
  volume: number,
  now: number,
): ZoneSnapshot => ({ ...snapshot, volume, updatedAt: now });

export const recordSource = (
  snapshot: ZoneSnapshot,
  source: number,
  now: number,
): ZoneSnapshot => ({ ...snapshot, source, updatedAt: now });
