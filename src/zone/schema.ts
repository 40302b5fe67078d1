/**
 * Zone Module - Schemas and Types
 *
 * A zone is one amplifier output as the host sees it: power, volume and a
 * selected source, backed by the shared driver and state tracker.
 */
import type { Result } from "neverthrow";

import type { AmpDriver } from "../driver/index.js";
import type { Dialect } from "../protocol/index.js";
import type { StateTracker } from "../state/index.js";
import type { ZoneError } from "./errors.js";

export type ZoneState = "on" | "off";

export type ZoneOperation =
  | "turnOn"
  | "turnOff"
  | "setVolume"
  | "selectSource"
  | "refresh";

/**
 * What the host reads back. Unknown power reports "off"; unknown volume and
 * source report null.
 */
export type ZoneAttributes = Readonly<{
  output: number;
  name: string;
  uniqueId: string;
  state: ZoneState;
  /** 0.0-1.0 */
  volumeLevel: number | null;
  source: string | null;
  sourceList: ReadonlyArray<string>;
  available: boolean;
  dialect: Dialect;
}>;

export type ZoneResult = Result<ZoneAttributes, ZoneError>;

export type ZoneOptions = Readonly<{
  output: number;
  name: string;
  uniqueId: string;
  numInputs: number;
  driver: AmpDriver;
  tracker: StateTracker;
}>;

export interface Zone {
  readonly output: number;
  readonly name: string;
  readonly uniqueId: string;

  turnOn(): Promise<ZoneResult>;
  turnOff(): Promise<ZoneResult>;
  /** Integer 0-100. */
  setVolume(volume: number): Promise<ZoneResult>;
  /** 0.0-1.0, rounded to the nearest device step. */
  setVolumeLevel(level: number): Promise<ZoneResult>;
  /** A label from the source list, e.g. "Input 3". */
  selectSource(label: string): Promise<ZoneResult>;
  selectSourceByNumber(input: number): Promise<ZoneResult>;
  /** Read state back from the device. No-op where the dialect cannot. */
  refresh(): Promise<ZoneResult>;
  getAttributes(): ZoneAttributes;
}
