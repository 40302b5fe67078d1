/**
 * Protocol Module - Pure Transformations
 *
 * Command validation, wire encoding for both dialects and reply parsing.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type ProtocolError,
  inputOutOfRange,
  malformedReply,
  outputOutOfRange,
  unsupportedCommand,
  volumeOutOfRange,
} from "./errors.js";
import {
  type AmpCommand,
  DATAGRAM_TERMINATOR,
  DATAGRAM_VOLUME_OFFSET,
  type Dialect,
  type EncoderLimits,
  MAX_DATAGRAM_INPUTS,
  MAX_OUTPUTS,
  MAX_STREAM_INPUTS,
  MAX_VOLUME,
  MIN_VOLUME,
  PACKET_COUNTER_PREFIX,
  QUERY_KINDS,
} from "./schema.js";

// =============================================================================
// Validation
// =============================================================================

/**
 * Highest input the dialect can address with the configured input count.
 */
export function maxInputFor(dialect: Dialect, limits: EncoderLimits): number {
  const dialectMax =
    dialect === "datagram" ? MAX_DATAGRAM_INPUTS : MAX_STREAM_INPUTS;
  return Math.min(limits.numInputs, dialectMax);
}

/**
 * Highest output addressable with the configured output count.
 */
export function maxOutputFor(limits: EncoderLimits): number {
  return Math.min(limits.numOutputs, MAX_OUTPUTS);
}

function isInRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Check every operand of a command against the configured ranges.
 */
export function validateCommand(
  command: AmpCommand,
  dialect: Dialect,
  limits: EncoderLimits,
): Result<AmpCommand, ProtocolError> {
  const maxOutput = maxOutputFor(limits);
  if (!isInRange(command.output, 1, maxOutput)) {
    return err(outputOutOfRange(command.output, maxOutput));
  }

  if (command.kind === "route" || command.kind === "powerOn") {
    const maxInput = maxInputFor(dialect, limits);
    if (!isInRange(command.input, 1, maxInput)) {
      return err(inputOutOfRange(command.input, maxInput));
    }
  }

  if (
    command.kind === "setVolume" &&
    !isInRange(command.volume, MIN_VOLUME, MAX_VOLUME)
  ) {
    return err(volumeOutOfRange(command.volume));
  }

  return ok(command);
}

// =============================================================================
// Stream Dialect
// =============================================================================

/**
 * Encode a command as a stream dialect line (terminator added by transport).
 *
 * @example
 * encodeStreamCommand({ kind: "route", output: 2, input: 5 }, limits)
 * // ok("ROUTE 2 5")
 */
export function encodeStreamCommand(
  command: AmpCommand,
  limits: EncoderLimits,
): Result<string, ProtocolError> {
  return validateCommand(command, "stream", limits).map((valid) => {
    switch (valid.kind) {
      case "route":
        return `ROUTE ${valid.output} ${valid.input}`;
      case "setVolume":
        return `SETVOL ${valid.output} ${valid.volume}`;
      case "powerOn":
        return `POWERON ${valid.output}`;
      case "powerOff":
        return `POWEROFF ${valid.output}`;
      case "getRoute":
        return `GETROUTE ${valid.output}`;
      case "getVolume":
        return `GETVOL ${valid.output}`;
      case "getPower":
        return `GETPOWER ${valid.output}`;
    }
  });
}

// =============================================================================
// Datagram Dialect
// =============================================================================

/**
 * Zero-pad an output to two decimal digits ("03", "16").
 */
export function formatDatagramOutput(output: number): string {
  return output.toString().padStart(2, "0");
}

/**
 * Encode an input as a leading "0" plus one lowercase hex digit ("01", "0a").
 */
export function formatDatagramInput(input: number): string {
  return `0${input.toString(16)}`;
}

/**
 * Hex of the offset volume, lowercase, unpadded (0 → "a0", 50 → "d2", 100 → "104").
 */
export function datagramVolumeHex(volume: number): string {
  return (volume + DATAGRAM_VOLUME_OFFSET).toString(16);
}

/**
 * Encode a command body for the datagram dialect.
 * Queries are rejected - the device cannot answer them.
 */
export function encodeDatagramCommand(
  command: AmpCommand,
  limits: EncoderLimits,
): Result<string, ProtocolError> {
  if (QUERY_KINDS.has(command.kind)) {
    return err(unsupportedCommand("datagram", command.kind));
  }

  return validateCommand(command, "datagram", limits).andThen((valid) => {
    const output = formatDatagramOutput(valid.output);
    switch (valid.kind) {
      case "route":
      case "powerOn":
        return ok(`c4.amp.out ${output} ${formatDatagramInput(valid.input)}`);
      case "powerOff":
        return ok(`c4.amp.out ${output} 00`);
      case "setVolume":
        return ok(`c4.amp.chvol ${output} ${datagramVolumeHex(valid.volume)}`);
      case "getRoute":
      case "getVolume":
      case "getPower":
        return err(unsupportedCommand("datagram", valid.kind));
    }
  });
}

/**
 * Build a packet counter: fixed prefix plus two random decimal digits.
 * Used as a loose correlation token; replies are not matched against it.
 */
export function buildPacketCounter(random: () => number = Math.random): string {
  const digits = Math.min(99, Math.max(0, Math.floor(random() * 100)));
  return `${PACKET_COUNTER_PREFIX}${digits.toString().padStart(2, "0")}`;
}

/**
 * Wrap a command body into a datagram packet.
 *
 * @example
 * wrapDatagramPacket("0s2a42", "c4.amp.out 03 0a")
 * // "0s2a42 c4.amp.out 03 0a \r\n"
 */
export function wrapDatagramPacket(counter: string, body: string): string {
  return `${counter} ${body}${DATAGRAM_TERMINATOR}`;
}

// =============================================================================
// Reply Parsing (stream dialect)
// =============================================================================

/**
 * Whether a reply acknowledges a set command.
 */
export function isAcknowledged(reply: string): boolean {
  return reply.includes("OK");
}

function parseKeywordNumber(
  reply: string,
  keyword: string,
): Result<number, ProtocolError> {
  const match = new RegExp(`\\b${keyword}\\s+(\\d+)\\b`).exec(reply);
  if (!match?.[1]) {
    return err(malformedReply(`Expected "${keyword} <n>"`, reply));
  }
  return ok(Number.parseInt(match[1], 10));
}

/**
 * Parse a `SOURCE <input>` reply to GETROUTE.
 */
export function parseRouteReply(
  reply: string,
  limits: EncoderLimits,
): Result<number, ProtocolError> {
  const maxInput = maxInputFor("stream", limits);
  return parseKeywordNumber(reply, "SOURCE").andThen((input) =>
    isInRange(input, 1, maxInput)
      ? ok(input)
      : err(malformedReply(`Source ${input} is outside 1-${maxInput}`, reply)),
  );
}

/**
 * Parse a `VOLUME <level>` reply to GETVOL.
 */
export function parseVolumeReply(reply: string): Result<number, ProtocolError> {
  return parseKeywordNumber(reply, "VOLUME").andThen((volume) =>
    isInRange(volume, MIN_VOLUME, MAX_VOLUME)
      ? ok(volume)
      : err(malformedReply(`Volume ${volume} is outside 0-100`, reply)),
  );
}

/**
 * Parse a GETPOWER reply by its ON / OFF token.
 */
export function parsePowerReply(reply: string): Result<boolean, ProtocolError> {
  if (/\bON\b/.test(reply)) {
    return ok(true);
  }
  if (/\bOFF\b/.test(reply)) {
    return ok(false);
  }
  return err(malformedReply("Expected ON or OFF", reply));
}
