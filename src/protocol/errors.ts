/**
 * Protocol Module - Error Types
 *
 * Local validation and reply-parsing errors. None of these ever reach the wire.
 */
import type { AmpCommandKind, Dialect } from "./schema.js";

/**
 * All possible errors from encoding commands or parsing replies.
 */
export type ProtocolError =
  | {
      readonly type: "OUTPUT_OUT_OF_RANGE";
      readonly message: string;
      readonly output: number;
      readonly max: number;
    }
  | {
      readonly type: "INPUT_OUT_OF_RANGE";
      readonly message: string;
      readonly input: number;
      readonly max: number;
    }
  | {
      readonly type: "VOLUME_OUT_OF_RANGE";
      readonly message: string;
      readonly volume: number;
    }
  | {
      readonly type: "UNSUPPORTED_COMMAND";
      readonly message: string;
      readonly dialect: Dialect;
      readonly command: AmpCommandKind;
    }
  | {
      readonly type: "MALFORMED_REPLY";
      readonly message: string;
      readonly reply: string;
    };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function outputOutOfRange(output: number, max: number): ProtocolError {
  return {
    type: "OUTPUT_OUT_OF_RANGE",
    message: `Output ${output} is outside 1-${max}`,
    output,
    max,
  };
}

export function inputOutOfRange(input: number, max: number): ProtocolError {
  return {
    type: "INPUT_OUT_OF_RANGE",
    message: `Input ${input} is outside 1-${max}`,
    input,
    max,
  };
}

export function volumeOutOfRange(volume: number): ProtocolError {
  return {
    type: "VOLUME_OUT_OF_RANGE",
    message: `Volume ${volume} is outside 0-100`,
    volume,
  };
}

export function unsupportedCommand(
  dialect: Dialect,
  command: AmpCommandKind,
): ProtocolError {
  return {
    type: "UNSUPPORTED_COMMAND",
    message: `${command} is not supported by the ${dialect} dialect`,
    dialect,
    command,
  };
}

export function malformedReply(message: string, reply: string): ProtocolError {
  return { type: "MALFORMED_REPLY", message, reply };
}

/**
 * Format error for logging/display.
 */
export function formatProtocolError(error: ProtocolError): string {
  switch (error.type) {
    case "OUTPUT_OUT_OF_RANGE":
    case "INPUT_OUT_OF_RANGE":
    case "VOLUME_OUT_OF_RANGE":
      return `Invalid command: ${error.message}`;
    case "UNSUPPORTED_COMMAND":
      return `Unsupported command: ${error.message}`;
    case "MALFORMED_REPLY":
      return `Malformed reply "${error.reply}": ${error.message}`;
  }
}
