/**
 * State Module - Schemas and Types
 *
 * Last-known zone values. Neither dialect pushes state, so these only change
 * when a command succeeds or a query answers.
 */

/**
 * Believed state of one output zone. `null` means not yet known.
 */
export type ZoneSnapshot = Readonly<{
  power: boolean | null;
  volume: number | null;
  source: number | null;
  /** Epoch millis of the last recorded change. */
  updatedAt: number | null;
}>;

export const UNKNOWN_ZONE_SNAPSHOT: ZoneSnapshot = {
  power: null,
  volume: null,
  source: null,
  updatedAt: null,
};

export interface StateTracker {
  recordPower(output: number, on: boolean): ZoneSnapshot;
  recordVolume(output: number, volume: number): ZoneSnapshot;
  recordSource(output: number, source: number): ZoneSnapshot;

  currentPower(output: number): boolean | null;
  currentVolume(output: number): number | null;
  currentSource(output: number): number | null;

  snapshot(output: number): ZoneSnapshot;
  /** Drop everything known about one output. */
  forget(output: number): void;
}
