/**
 * Protocol Module - Public API
 *
 * Pure command encoding for the stream and datagram dialects.
 */

// Types
export type {
  AmpCommand,
  AmpCommandKind,
  Dialect,
  EncoderLimits,
} from "./schema.js";

export {
  DATAGRAM_VOLUME_OFFSET,
  DIALECTS,
  MAX_DATAGRAM_INPUTS,
  MAX_OUTPUTS,
  MAX_STREAM_INPUTS,
  MAX_VOLUME,
  MIN_VOLUME,
  PACKET_COUNTER_PREFIX,
  QUERY_KINDS,
  STREAM_TERMINATOR,
} from "./schema.js";

// Errors
export type { ProtocolError } from "./errors.js";
export { formatProtocolError } from "./errors.js";

// Pure transformations
export {
  buildPacketCounter,
  datagramVolumeHex,
  encodeDatagramCommand,
  encodeStreamCommand,
  isAcknowledged,
  maxInputFor,
  parsePowerReply,
  parseRouteReply,
  parseVolumeReply,
  validateCommand,
  wrapDatagramPacket,
} from "./transform.js";
