/**
 * Zone Module - Pure Transformations
 *
 * Host-facing values (levels, labels) to device values and back.
 */
import { type Result, err, ok } from "neverthrow";

import { MAX_VOLUME, MIN_VOLUME } from "../protocol/index.js";
import type { ZoneSnapshot } from "../state/index.js";
import { type ZoneError, validationFailed } from "./errors.js";
import type { ZoneAttributes, ZoneOptions } from "./schema.js";

// =============================================================================
// Volume
// =============================================================================

export const validateVolume = (volume: number): Result<number, ZoneError> =>
  Number.isInteger(volume) && volume >= MIN_VOLUME && volume <= MAX_VOLUME
    ? ok(volume)
    : err(validationFailed("volume", `Volume ${volume} is outside 0-100`));

/**
 * Map a 0.0-1.0 level to the nearest device volume step.
 *
 * @example
 * levelToVolume(0.333) // ok(33)
 */
export const levelToVolume = (level: number): Result<number, ZoneError> =>
  Number.isFinite(level) && level >= 0 && level <= 1
    ? ok(Math.round(level * MAX_VOLUME))
    : err(validationFailed("level", `Volume level ${level} is outside 0.0-1.0`));

export const volumeToLevel = (volume: number | null): number | null =>
  volume === null ? null : volume / MAX_VOLUME;

// =============================================================================
// Sources
// =============================================================================

export const sourceLabel = (input: number): string => `Input ${input}`;

export const buildSourceList = (numInputs: number): ReadonlyArray<string> =>
  Array.from({ length: numInputs }, (_, index) => sourceLabel(index + 1));

export const validateInput = (
  input: number,
  numInputs: number,
): Result<number, ZoneError> =>
  Number.isInteger(input) && input >= 1 && input <= numInputs
    ? ok(input)
    : err(validationFailed("input", `Input ${input} is outside 1-${numInputs}`));

/**
 * Resolve a source label to its input number by its last word.
 *
 * @example
 * parseSourceLabel("Input 3", 6) // ok(3)
 */
export const parseSourceLabel = (
  label: string,
  numInputs: number,
): Result<number, ZoneError> => {
  const token = label.trim().split(/\s+/).pop() ?? "";
  if (!/^\d+$/.test(token)) {
    return err(validationFailed("source", `Unknown source "${label}"`));
  }
  return validateInput(Number.parseInt(token, 10), numInputs);
};

// =============================================================================
// Identity & Attributes
// =============================================================================

export const zoneName = (amplifierName: string, output: number): string =>
  `${amplifierName} Zone ${output}`;

export const zoneUniqueId = (entryId: string, output: number): string =>
  `${entryId}_output_${output}`;

export const buildAttributes = (
  options: Pick<ZoneOptions, "output" | "name" | "uniqueId" | "numInputs">,
  snapshot: ZoneSnapshot,
  available: boolean,
  dialect: ZoneAttributes["dialect"],
): ZoneAttributes => ({
  output: options.output,
  name: options.name,
  uniqueId: options.uniqueId,
  state: snapshot.power === true ? "on" : "off",
  volumeLevel: volumeToLevel(snapshot.volume),
  source: snapshot.source === null ? null : sourceLabel(snapshot.source),
  sourceList: buildSourceList(options.numInputs),
  available,
  dialect,
});
