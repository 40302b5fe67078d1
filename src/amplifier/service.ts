/**
 * Amplifier Module - Setup & Teardown
 *
 * Builds one driver and one tracker per device and shares them across every
 * output zone, so all commands for the device pass through a single lock.
 */
import { type Result, err, ok } from "neverthrow";

import { createDriver } from "../driver/index.js";
import { createLogger } from "../logger.js";
import { createStateTracker } from "../state/index.js";
import {
  type Zone,
  type ZoneResult,
  createZone,
  formatZoneError,
  zoneName,
  zoneUniqueId,
} from "../zone/index.js";
import {
  type AmplifierError,
  formatAmplifierError,
  invalidConfig,
  zoneConflict,
} from "./errors.js";
import {
  type Amplifier,
  type AmplifierConfig,
  AmplifierConfigSchema,
  type AmplifierDeps,
  type ZoneRegistry,
} from "./schema.js";

const log = createLogger("amplifier");

export function parseAmplifierConfig(
  raw: unknown,
): Result<AmplifierConfig, AmplifierError> {
  const parsed = AmplifierConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      invalidConfig(
        parsed.error.issues.map((issue) =>
          issue.path.length > 0
            ? `${issue.path.join(".")}: ${issue.message}`
            : issue.message,
        ),
      ),
    );
  }
  return ok(parsed.data);
}

export function setupAmplifier(
  raw: unknown,
  registry: ZoneRegistry,
  deps: AmplifierDeps = {},
): Result<Amplifier, AmplifierError> {
  const parsed = parseAmplifierConfig(raw);
  if (parsed.isErr()) {
    log.error({ error: formatAmplifierError(parsed.error) }, "Setup rejected");
    return err(parsed.error);
  }
  const config = parsed.value;

  const outputs = Array.from({ length: config.numOutputs }, (_, i) => i + 1);
  const taken = outputs
    .map((output) => zoneUniqueId(config.entryId, output))
    .find((uniqueId) => registry.get(uniqueId) !== undefined);
  if (taken !== undefined) {
    const error = zoneConflict(taken);
    log.error({ uniqueId: taken }, error.message);
    return err(error);
  }

  const driver = createDriver(config, deps);
  const tracker = createStateTracker(deps.clock);
  const zones: ReadonlyArray<Zone> = outputs.map((output) =>
    createZone({
      output,
      name: zoneName(config.name, output),
      uniqueId: zoneUniqueId(config.entryId, output),
      numInputs: config.numInputs,
      driver,
      tracker,
    }),
  );
  for (const zone of zones) {
    registry.register(zone);
  }

  log.info(
    {
      host: config.host,
      port: config.port,
      dialect: config.dialect,
      zones: zones.length,
      inputs: config.numInputs,
    },
    "Amplifier ready",
  );

  return ok({
    config,
    zones,

    getZone: (output) => zones.find((zone) => zone.output === output),

    async refreshAll(): Promise<ReadonlyArray<ZoneResult>> {
      const results: ZoneResult[] = [];
      for (const zone of zones) {
        results.push(await zone.refresh());
      }
      const failures = results.flatMap((result) =>
        result.isErr() ? [formatZoneError(result.error)] : [],
      );
      if (failures.length > 0) {
        log.warn(
          { failed: failures.length, error: failures[0] },
          "Zone refresh incomplete",
        );
      }
      return results;
    },

    isAvailable: () => driver.isAvailable(),
    getStats: () => driver.getStats(),

    async teardown(): Promise<void> {
      for (const zone of zones) {
        registry.unregister(zone.uniqueId);
        tracker.forget(zone.output);
      }
      await driver.close();
      log.info({ host: config.host }, "Amplifier torn down");
    },
  });
}
