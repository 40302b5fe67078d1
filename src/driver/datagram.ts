/**
 * Driver Module - Datagram Dialect
 *
 * Fire-and-forget `c4.amp.*` packets. The device has no read-back, so every
 * query answers unknown without touching the network.
 */
import { err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  type AmpCommand,
  type EncoderLimits,
  buildPacketCounter,
  encodeDatagramCommand,
  wrapDatagramPacket,
} from "../protocol/index.js";
import type { Transport } from "../transport/index.js";
import type { AmpDriver, CommandResult, QueryResult } from "./schema.js";

const log = createLogger("driver");

export function createDatagramDriver(
  transport: Transport,
  limits: EncoderLimits,
  random: () => number = Math.random,
): AmpDriver {
  async function control(command: AmpCommand): Promise<CommandResult> {
    const encoded = encodeDatagramCommand(command, limits);
    if (encoded.isErr()) {
      return err(encoded.error);
    }

    const packet = wrapDatagramPacket(buildPacketCounter(random), encoded.value);
    const result = await transport.execute(packet);
    if (result.isErr()) {
      return err(result.error);
    }

    if (result.value.kind === "silent") {
      log.debug(
        { command: command.kind, output: command.output },
        "Sent, unconfirmed",
      );
      return ok("unconfirmed");
    }
    return ok("confirmed");
  }

  const unknown = <T>(): Promise<QueryResult<T>> => Promise.resolve(ok(null));

  return {
    dialect: "datagram",
    supportsQueries: false,
    limits,

    route: (output, input) => control({ kind: "route", output, input }),
    setVolume: (output, volume) =>
      control({ kind: "setVolume", output, volume }),
    powerOn: (output, input) => control({ kind: "powerOn", output, input }),
    powerOff: (output) => control({ kind: "powerOff", output }),

    queryRoute: () => unknown<number>(),
    queryVolume: () => unknown<number>(),
    queryPower: () => unknown<boolean>(),

    isAvailable: () => transport.isAvailable(),
    getStats: () => transport.getStats(),
    close: () => transport.close(),
  };
}
