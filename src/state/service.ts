/**
 * State Module - Tracker
 *
 * In-memory map from output number to snapshot, shared by every zone of one
 * amplifier.
 */
import { createLogger } from "../logger.js";
import {
  type StateTracker,
  UNKNOWN_ZONE_SNAPSHOT,
  type ZoneSnapshot,
} from "./schema.js";
import { recordPower, recordSource, recordVolume } from "./transform.js";

const log = createLogger("state");

export function createStateTracker(
  clock: () => number = Date.now,
): StateTracker {
  const zones = new Map<number, ZoneSnapshot>();

  const snapshot = (output: number): ZoneSnapshot =>
    zones.get(output) ?? UNKNOWN_ZONE_SNAPSHOT;

  const update = (
    output: number,
    change: (current: ZoneSnapshot, now: number) => ZoneSnapshot,
  ): ZoneSnapshot => {
    const next = change(snapshot(output), clock());
    zones.set(output, next);
    log.trace({ output, ...next }, "Zone state updated");
    return next;
  };

  return {
    recordPower: (output, on) =>
      update(output, (current, now) => recordPower(current, on, now)),
    recordVolume: (output, volume) =>
      update(output, (current, now) => recordVolume(current, volume, now)),
    recordSource: (output, source) =>
      update(output, (current, now) => recordSource(current, source, now)),

    currentPower: (output) => snapshot(output).power,
    currentVolume: (output) => snapshot(output).volume,
    currentSource: (output) => snapshot(output).source,

    snapshot,

    forget(output) {
      zones.delete(output);
    },
  };
}
