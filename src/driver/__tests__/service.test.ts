/**
 * Driver Tests
 *
 * Both dialects are driven through createDriver with in-process sockets.
 */
import { describe, expect, test } from "vitest";

import {
  createFakeDatagram,
  createFakeStream,
} from "../../__tests__/fakes.js";
import { formatDriverError } from "../errors.js";
import type { DriverConfig } from "../schema.js";
import { createDriver } from "../service.js";

const BASE_CONFIG: DriverConfig = {
  dialect: "stream",
  host: "10.0.0.5",
  port: 4999,
  numInputs: 6,
  numOutputs: 8,
  connectTimeoutMs: 10000,
  commandTimeoutMs: 5000,
  replyTimeoutMs: 2000,
};

const DATAGRAM_CONFIG: DriverConfig = {
  ...BASE_CONFIG,
  dialect: "datagram",
  port: 8750,
};

describe("Stream driver", () => {
  test("routes and reports confirmed on OK", async () => {
    // Arrange
    const fake = createFakeStream(() => "OK");
    const driver = createDriver(BASE_CONFIG, { connector: fake.connector });

    // Act
    const result = await driver.route(1, 2);

    // Assert
    expect(result._unsafeUnwrap()).toBe("confirmed");
    expect(fake.writes).toEqual(["ROUTE 1 2\r\n"]);
    expect(driver.supportsQueries).toBe(true);
  });

  test("powers on then routes the chosen input", async () => {
    const fake = createFakeStream(() => "OK");
    const driver = createDriver(BASE_CONFIG, { connector: fake.connector });

    await driver.powerOn(3, 2);

    expect(fake.writes).toEqual(["POWERON 3\r\n", "ROUTE 3 2\r\n"]);
  });

  test("rejects a reply without OK", async () => {
    const fake = createFakeStream(() => "ERR");
    const driver = createDriver(BASE_CONFIG, { connector: fake.connector });

    const result = await driver.powerOff(1);

    const error = result._unsafeUnwrapErr();
    expect(error).toEqual({
      type: "COMMAND_REJECTED",
      message: "Device did not acknowledge the command",
      reply: "ERR",
    });
    expect(formatDriverError(error)).toBe('Command rejected: "ERR"');
  });

  test("stops after the first unacknowledged step of power on", async () => {
    const fake = createFakeStream(() => "ERR");
    const driver = createDriver(BASE_CONFIG, { connector: fake.connector });

    await driver.powerOn(3, 2);

    expect(fake.writes).toEqual(["POWERON 3\r\n"]);
  });

  test("validates before connecting", async () => {
    // Arrange
    const fake = createFakeStream(() => "OK");
    const driver = createDriver(BASE_CONFIG, { connector: fake.connector });

    // Act
    const volume = await driver.setVolume(1, 101);
    const input = await driver.powerOn(1, 7);
    const output = await driver.route(9, 1);

    // Assert
    expect(volume._unsafeUnwrapErr().type).toBe("VOLUME_OUT_OF_RANGE");
    expect(input._unsafeUnwrapErr().type).toBe("INPUT_OUT_OF_RANGE");
    expect(output._unsafeUnwrapErr().type).toBe("OUTPUT_OUT_OF_RANGE");
    expect(fake.connectCount()).toBe(0);
    expect(fake.writes).toEqual([]);
  });

  test("reads back volume, route and power", async () => {
    // Arrange
    const replies: Record<string, string> = {
      "GETVOL 2": "VOLUME 35",
      "GETROUTE 2": "SOURCE 4",
      "GETPOWER 2": "POWER ON",
    };
    const fake = createFakeStream((command) => replies[command] ?? "ERR");
    const driver = createDriver(BASE_CONFIG, { connector: fake.connector });

    // Act
    const volume = await driver.queryVolume(2);
    const route = await driver.queryRoute(2);
    const power = await driver.queryPower(2);

    // Assert
    expect(volume._unsafeUnwrap()).toBe(35);
    expect(route._unsafeUnwrap()).toBe(4);
    expect(power._unsafeUnwrap()).toBe(true);
  });

  test("reads a malformed reply as unknown", async () => {
    const fake = createFakeStream(() => "GARBAGE");
    const driver = createDriver(BASE_CONFIG, { connector: fake.connector });

    const result = await driver.queryVolume(1);

    expect(result._unsafeUnwrap()).toBeNull();
  });

  test("passes transport failures through", async () => {
    const fake = createFakeStream(() => "OK");
    fake.failConnectWith(new Error("connect ECONNREFUSED 10.0.0.5:4999"));
    const driver = createDriver(BASE_CONFIG, { connector: fake.connector });

    const result = await driver.queryPower(1);

    expect(result._unsafeUnwrapErr().type).toBe("CONNECTION_FAILED");
    expect(driver.isAvailable()).toBe(false);
  });
});

describe("Datagram driver", () => {
  test("sends a wrapped volume packet and reports unconfirmed on silence", async () => {
    // Arrange
    const fake = createFakeDatagram();
    const driver = createDriver(DATAGRAM_CONFIG, {
      socketFactory: fake.socketFactory,
      random: () => 0.5,
    });

    // Act
    const result = await driver.setVolume(1, 50);

    // Assert
    expect(result._unsafeUnwrap()).toBe("unconfirmed");
    expect(fake.packets).toEqual(["0s2a50 c4.amp.chvol 01 d2 \r\n"]);
  });

  test("reports confirmed when the device answers", async () => {
    const fake = createFakeDatagram(() => "ack");
    const driver = createDriver(DATAGRAM_CONFIG, {
      socketFactory: fake.socketFactory,
      random: () => 0.5,
    });

    const result = await driver.powerOff(2);

    expect(result._unsafeUnwrap()).toBe("confirmed");
    expect(fake.packets).toEqual(["0s2a50 c4.amp.out 02 00 \r\n"]);
  });

  test("powers on with a single route packet", async () => {
    const fake = createFakeDatagram();
    const driver = createDriver(
      { ...DATAGRAM_CONFIG, numInputs: 15, numOutputs: 16 },
      { socketFactory: fake.socketFactory, random: () => 0 },
    );

    await driver.powerOn(3, 10);

    expect(fake.packets).toEqual(["0s2a00 c4.amp.out 03 0a \r\n"]);
  });

  test("answers every query with unknown and no packets", async () => {
    // Arrange
    const fake = createFakeDatagram();
    const driver = createDriver(DATAGRAM_CONFIG, {
      socketFactory: fake.socketFactory,
    });

    // Act
    const results = await Promise.all([
      driver.queryPower(1),
      driver.queryVolume(1),
      driver.queryRoute(1),
    ]);

    // Assert
    expect(results.map((result) => result._unsafeUnwrap())).toEqual([
      null,
      null,
      null,
    ]);
    expect(fake.events).toEqual([]);
    expect(driver.supportsQueries).toBe(false);
  });

  test("rejects an input above the configured count without sending", async () => {
    const fake = createFakeDatagram();
    const driver = createDriver(DATAGRAM_CONFIG, {
      socketFactory: fake.socketFactory,
    });

    const result = await driver.route(1, 7);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "INPUT_OUT_OF_RANGE",
      input: 7,
      max: 6,
    });
    expect(fake.packets).toEqual([]);
  });
});
