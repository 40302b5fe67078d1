/**
 * Amplifier Setup Tests
 */
import { describe, expect, test } from "vitest";

import {
  createFakeDatagram,
  createFakeStream,
} from "../../__tests__/fakes.js";
import { formatAmplifierError } from "../errors.js";
import { createZoneRegistry } from "../registry.js";
import { parseAmplifierConfig, setupAmplifier } from "../service.js";

describe("parseAmplifierConfig", () => {
  test("fills defaults and derives port and entry id", () => {
    const config = parseAmplifierConfig({ host: "10.0.0.7" })._unsafeUnwrap();

    expect(config).toEqual({
      host: "10.0.0.7",
      port: 8750,
      dialect: "datagram",
      name: "Matrix Amp",
      numInputs: 6,
      numOutputs: 16,
      entryId: "10.0.0.7",
      connectTimeoutMs: 10000,
      commandTimeoutMs: 5000,
      replyTimeoutMs: 2000,
    });
  });

  test("defaults the stream port to 4999 and keeps an explicit port", () => {
    const stream = parseAmplifierConfig({ host: "amp", dialect: "stream" });
    const custom = parseAmplifierConfig({
      host: "amp",
      dialect: "stream",
      port: 5000,
    });

    expect(stream._unsafeUnwrap().port).toBe(4999);
    expect(custom._unsafeUnwrap().port).toBe(5000);
  });

  test("allows 16 inputs for stream but not for datagram", () => {
    const stream = parseAmplifierConfig({
      host: "amp",
      dialect: "stream",
      numInputs: 16,
    });
    const datagram = parseAmplifierConfig({
      host: "amp",
      dialect: "datagram",
      numInputs: 16,
    });

    expect(stream.isOk()).toBe(true);
    expect(datagram._unsafeUnwrapErr()).toEqual({
      type: "INVALID_CONFIG",
      message: "Invalid amplifier configuration",
      issues: ["numInputs: The datagram dialect addresses at most 15 inputs"],
    });
  });

  test("rejects a missing host and out-of-range counts", () => {
    const error = parseAmplifierConfig({
      host: " ",
      numOutputs: 17,
    })._unsafeUnwrapErr();

    expect(error.type).toBe("INVALID_CONFIG");
    expect(formatAmplifierError(error)).toContain("host: Host is required");
    expect(formatAmplifierError(error)).toContain("numOutputs:");
  });
});

describe("setupAmplifier", () => {
  test("creates and registers one zone per output", () => {
    // Arrange
    const registry = createZoneRegistry();
    const fake = createFakeDatagram();

    // Act
    const amplifier = setupAmplifier(
      { host: "10.0.0.7", name: "Upstairs", numOutputs: 3, entryId: "amp-1" },
      registry,
      { socketFactory: fake.socketFactory },
    )._unsafeUnwrap();

    // Assert
    expect(amplifier.zones.map((zone) => zone.name)).toEqual([
      "Upstairs Zone 1",
      "Upstairs Zone 2",
      "Upstairs Zone 3",
    ]);
    expect(registry.list().map((zone) => zone.uniqueId)).toEqual([
      "amp-1_output_1",
      "amp-1_output_2",
      "amp-1_output_3",
    ]);
    expect(amplifier.getZone(2)?.uniqueId).toBe("amp-1_output_2");
    expect(amplifier.getZone(4)).toBeUndefined();
  });

  test("zones share one tracker and one connection", async () => {
    // Arrange
    const fake = createFakeStream(() => "OK");
    const amplifier = setupAmplifier(
      { host: "10.0.0.5", dialect: "stream", numOutputs: 2 },
      createZoneRegistry(),
      { connector: fake.connector },
    )._unsafeUnwrap();

    // Act
    await amplifier.getZone(1)?.setVolume(30);
    await amplifier.getZone(2)?.setVolume(60);

    // Assert
    expect(fake.connectCount()).toBe(1);
    const levels = amplifier.zones.map(
      (zone) => zone.getAttributes().volumeLevel,
    );
    expect(levels).toEqual([0.3, 0.6]);
  });

  test("refuses to register over existing zones", () => {
    const registry = createZoneRegistry();
    const fake = createFakeDatagram();
    setupAmplifier({ host: "10.0.0.7", numOutputs: 2 }, registry, {
      socketFactory: fake.socketFactory,
    });

    const second = setupAmplifier(
      { host: "10.0.0.7", numOutputs: 4 },
      registry,
      { socketFactory: fake.socketFactory },
    );

    expect(second._unsafeUnwrapErr()).toEqual({
      type: "ZONE_CONFLICT",
      message: "Zone 10.0.0.7_output_1 is already registered",
      uniqueId: "10.0.0.7_output_1",
    });
    expect(registry.list()).toHaveLength(2);
  });

  test("returns an error without registering on invalid config", () => {
    const registry = createZoneRegistry();

    const result = setupAmplifier({ host: "" }, registry);

    expect(result._unsafeUnwrapErr().type).toBe("INVALID_CONFIG");
    expect(registry.list()).toEqual([]);
  });

  test("refreshAll queries each zone in output order", async () => {
    // Arrange
    const fake = createFakeStream((command) =>
      command.startsWith("GETPOWER") ? "POWER ON" : "GARBAGE",
    );
    const amplifier = setupAmplifier(
      { host: "10.0.0.5", dialect: "stream", numOutputs: 2 },
      createZoneRegistry(),
      { connector: fake.connector },
    )._unsafeUnwrap();

    // Act
    const results = await amplifier.refreshAll();

    // Assert
    expect(results.map((result) => result._unsafeUnwrap().state)).toEqual([
      "on",
      "on",
    ]);
    expect(fake.writes).toEqual([
      "GETPOWER 1\r\n",
      "GETVOL 1\r\n",
      "GETROUTE 1\r\n",
      "GETPOWER 2\r\n",
      "GETVOL 2\r\n",
      "GETROUTE 2\r\n",
    ]);
  });

  test("teardown unregisters zones, forgets state and closes", async () => {
    // Arrange
    const registry = createZoneRegistry();
    const fake = createFakeStream(() => "OK");
    const amplifier = setupAmplifier(
      { host: "10.0.0.5", dialect: "stream", numOutputs: 2 },
      registry,
      { connector: fake.connector },
    )._unsafeUnwrap();
    const zone = amplifier.zones[0];
    await zone?.turnOn();

    // Act
    await amplifier.teardown();

    // Assert
    expect(registry.list()).toEqual([]);
    expect(zone?.getAttributes()).toMatchObject({
      state: "off",
      source: null,
    });
    expect(fake.events[fake.events.length - 1]).toBe("close");
    const after = await zone?.turnOff();
    expect(after?._unsafeUnwrapErr()).toMatchObject({
      type: "COMMAND_FAILED",
      cause: { type: "CLOSED" },
    });
    expect(amplifier.isAvailable()).toBe(false);
  });
});
