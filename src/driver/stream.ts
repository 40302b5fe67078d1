/**
 * Driver Module - Stream Dialect
 *
 * Request/response over the persistent connection. Every command is encoded
 * before anything is written, so a bad argument never reaches the device.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  type AmpCommand,
  type EncoderLimits,
  type ProtocolError,
  encodeStreamCommand,
  formatProtocolError,
  isAcknowledged,
  parsePowerReply,
  parseRouteReply,
  parseVolumeReply,
} from "../protocol/index.js";
import type { Transport } from "../transport/index.js";
import { commandRejected } from "./errors.js";
import type { AmpDriver, CommandResult, QueryResult } from "./schema.js";

const log = createLogger("driver");

export function createStreamDriver(
  transport: Transport,
  limits: EncoderLimits,
): AmpDriver {
  const encodeAll = (
    commands: ReadonlyArray<AmpCommand>,
  ): Result<string[], ProtocolError> => {
    const lines: string[] = [];
    for (const command of commands) {
      const encoded = encodeStreamCommand(command, limits);
      if (encoded.isErr()) {
        return err(encoded.error);
      }
      lines.push(encoded.value);
    }
    return ok(lines);
  };

  /**
   * Send commands in order, stopping at the first one not acknowledged.
   */
  async function control(
    ...commands: ReadonlyArray<AmpCommand>
  ): Promise<CommandResult> {
    const encoded = encodeAll(commands);
    if (encoded.isErr()) {
      return err(encoded.error);
    }

    for (const line of encoded.value) {
      const result = await transport.execute(line);
      if (result.isErr()) {
        return err(result.error);
      }
      const reply = result.value;
      if (reply.kind === "reply" && !isAcknowledged(reply.line)) {
        log.warn(
          { command: line, reply: reply.line },
          "Command not acknowledged",
        );
        return err(commandRejected(reply.line));
      }
    }
    return ok("confirmed");
  }

  async function query<T>(
    command: AmpCommand,
    parse: (reply: string) => Result<T, ProtocolError>,
  ): Promise<QueryResult<T>> {
    const encoded = encodeStreamCommand(command, limits);
    if (encoded.isErr()) {
      return err(encoded.error);
    }

    const result = await transport.execute(encoded.value);
    if (result.isErr()) {
      return err(result.error);
    }
    if (result.value.kind === "silent") {
      return ok(null);
    }

    const parsed = parse(result.value.line);
    if (parsed.isErr()) {
      log.warn(
        { command: encoded.value, error: formatProtocolError(parsed.error) },
        "Unusable query reply, state left unknown",
      );
      return ok(null);
    }
    return ok(parsed.value);
  }

  return {
    dialect: "stream",
    supportsQueries: true,
    limits,

    route: (output, input) => control({ kind: "route", output, input }),
    setVolume: (output, volume) =>
      control({ kind: "setVolume", output, volume }),
    powerOn: (output, input) =>
      control(
        { kind: "powerOn", output, input },
        { kind: "route", output, input },
      ),
    powerOff: (output) => control({ kind: "powerOff", output }),

    queryRoute: (output) =>
      query({ kind: "getRoute", output }, (reply) =>
        parseRouteReply(reply, limits),
      ),
    queryVolume: (output) =>
      query({ kind: "getVolume", output }, parseVolumeReply),
    queryPower: (output) => query({ kind: "getPower", output }, parsePowerReply),

    isAvailable: () => transport.isAvailable(),
    getStats: () => transport.getStats(),
    close: () => transport.close(),
  };
}
