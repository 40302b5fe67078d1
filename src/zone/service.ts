/**
 * Zone Module - Service
 *
 * Commands go to the device first. Stream state changes once the device
 * acknowledges; datagram state follows every attempted send. A turn-off always
 * leaves the zone tracked as off. Nothing here throws to the host.
 */
import { type Result, err, ok } from "neverthrow";

import type { CommandResult } from "../driver/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import { type ZoneError, formatZoneError, fromDriverError } from "./errors.js";
import type {
  Zone,
  ZoneAttributes,
  ZoneOperation,
  ZoneOptions,
  ZoneResult,
} from "./schema.js";
import {
  buildAttributes,
  levelToVolume,
  parseSourceLabel,
  validateInput,
  validateVolume,
} from "./transform.js";

const log = createLogger("zone");

export function createZone(options: ZoneOptions): Zone {
  const { output, driver, tracker, numInputs } = options;

  const getAttributes = (): ZoneAttributes =>
    buildAttributes(
      options,
      tracker.snapshot(output),
      driver.isAvailable(),
      driver.dialect,
    );

  async function run(
    operation: ZoneOperation,
    context: Record<string, unknown>,
    action: () => Promise<Result<unknown, ZoneError>>,
  ): Promise<ZoneResult> {
    const startTime = Date.now();
    logOperationStart(log, operation, { output, ...context });

    const result = await action();
    if (result.isErr()) {
      logOperationFailed(log, operation, formatZoneError(result.error), {
        output,
        ...context,
      });
      return err(result.error);
    }

    logOperationComplete(log, operation, startTime, { output });
    return ok(getAttributes());
  }

  const send = async (
    operation: ZoneOperation,
    pending: Promise<CommandResult>,
  ): Promise<Result<unknown, ZoneError>> =>
    (await pending).mapErr((error) => fromDriverError(operation, error));

  /**
   * Whether a command went past validation. Datagram state follows what was
   * attempted, since the device never says otherwise.
   */
  const attempted = (sent: Result<unknown, ZoneError>): boolean =>
    sent.isOk() || sent.error.type === "COMMAND_FAILED";

  const shouldRecord = (sent: Result<unknown, ZoneError>): boolean =>
    sent.isOk() || (driver.dialect === "datagram" && attempted(sent));

  const applyVolume = (volume: number) =>
    run("setVolume", { volume }, async () => {
      const valid = validateVolume(volume);
      if (valid.isErr()) {
        return err(valid.error);
      }
      const sent = await send("setVolume", driver.setVolume(output, volume));
      if (shouldRecord(sent)) {
        tracker.recordVolume(output, volume);
      }
      return sent;
    });

  const applySource = (input: number) =>
    run("selectSource", { input }, async () => {
      const valid = validateInput(input, numInputs);
      if (valid.isErr()) {
        return err(valid.error);
      }
      const sent = await send("selectSource", driver.route(output, input));
      if (shouldRecord(sent)) {
        tracker.recordSource(output, input);
      }
      return sent;
    });

  return {
    output,
    name: options.name,
    uniqueId: options.uniqueId,

    turnOn: () => {
      const source = tracker.currentSource(output) ?? 1;
      return run("turnOn", { source }, async () => {
        const sent = await send("turnOn", driver.powerOn(output, source));
        if (shouldRecord(sent)) {
          tracker.recordPower(output, true);
          tracker.recordSource(output, source);
        }
        return sent;
      });
    },

    turnOff: () =>
      run("turnOff", {}, async () => {
        const sent = await send("turnOff", driver.powerOff(output));
        // Off is recorded on every dialect once the command was attempted
        if (attempted(sent)) {
          tracker.recordPower(output, false);
        }
        return sent;
      }),

    setVolume: applyVolume,

    setVolumeLevel: (level) => {
      const volume = levelToVolume(level);
      if (volume.isErr()) {
        logOperationFailed(log, "setVolume", formatZoneError(volume.error), {
          output,
          level,
        });
        return Promise.resolve(err(volume.error));
      }
      return applyVolume(volume.value);
    },

    selectSource: (label) => {
      const input = parseSourceLabel(label, numInputs);
      if (input.isErr()) {
        logOperationFailed(log, "selectSource", formatZoneError(input.error), {
          output,
          label,
        });
        return Promise.resolve(err(input.error));
      }
      return applySource(input.value);
    },

    selectSourceByNumber: applySource,

    refresh: () =>
      run("refresh", {}, async () => {
        if (!driver.supportsQueries) {
          return ok(undefined);
        }

        const power = await driver.queryPower(output);
        if (power.isErr()) {
          return err(fromDriverError("refresh", power.error));
        }
        if (power.value !== null) {
          tracker.recordPower(output, power.value);
        }

        const volume = await driver.queryVolume(output);
        if (volume.isErr()) {
          return err(fromDriverError("refresh", volume.error));
        }
        if (volume.value !== null) {
          tracker.recordVolume(output, volume.value);
        }

        const source = await driver.queryRoute(output);
        if (source.isErr()) {
          return err(fromDriverError("refresh", source.error));
        }
        if (source.value !== null) {
          tracker.recordSource(output, source.value);
        }

        return ok(undefined);
      }),

    getAttributes,
  };
}
