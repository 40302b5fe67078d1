/**
 * Protocol Module - Schemas and Types
 *
 * Logical amplifier commands and the constants of both wire dialects.
 */

// =============================================================================
// Dialects
// =============================================================================

/**
 * Wire protocol dialects.
 * - stream: text verbs over a persistent TCP connection, request/response
 * - datagram: hex-encoded `c4.amp.*` packets over UDP, replies optional
 */
export const DIALECTS = ["stream", "datagram"] as const;

export type Dialect = (typeof DIALECTS)[number];

// =============================================================================
// Commands
// =============================================================================

/**
 * A logical control operation, encoded per dialect.
 * Exists only for the duration of encode → send → (optional) receive.
 */
export type AmpCommand =
  | { readonly kind: "route"; readonly output: number; readonly input: number }
  | {
      readonly kind: "setVolume";
      readonly output: number;
      readonly volume: number;
    }
  | {
      readonly kind: "powerOn";
      readonly output: number;
      readonly input: number;
    }
  | { readonly kind: "powerOff"; readonly output: number }
  | { readonly kind: "getRoute"; readonly output: number }
  | { readonly kind: "getVolume"; readonly output: number }
  | { readonly kind: "getPower"; readonly output: number };

export type AmpCommandKind = AmpCommand["kind"];

/**
 * Commands that read state back from the device.
 * Only the stream dialect can encode these.
 */
export const QUERY_KINDS: ReadonlySet<AmpCommandKind> = new Set([
  "getRoute",
  "getVolume",
  "getPower",
]);

/**
 * Configured zone/input counts the encoder validates against.
 */
export type EncoderLimits = Readonly<{
  numOutputs: number;
  numInputs: number;
}>;

// =============================================================================
// Wire Constants
// =============================================================================

export const MAX_OUTPUTS = 16;
export const MAX_STREAM_INPUTS = 16;
/** Datagram inputs are a single hex digit. */
export const MAX_DATAGRAM_INPUTS = 15;

export const MIN_VOLUME = 0;
export const MAX_VOLUME = 100;

/** Stream commands end with CRLF. */
export const STREAM_TERMINATOR = "\r\n";

/** Datagram packets end with a literal space, then CRLF. */
export const DATAGRAM_TERMINATOR = " \r\n";

/**
 * Added to the 0-100 volume before hex conversion on the datagram dialect.
 * Observed in device traffic (50 → 210 → "d2").
 */
export const DATAGRAM_VOLUME_OFFSET = 160;

/** Fixed four-character prefix of the datagram packet counter. */
export const PACKET_COUNTER_PREFIX = "0s2a";
