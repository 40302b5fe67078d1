/**
 * Driver Module - Error Types
 *
 * Encoder and transport errors pass through unchanged; the driver adds only
 * the case where the device answered but did not acknowledge.
 */
import { type ProtocolError, formatProtocolError } from "../protocol/index.js";
import {
  type TransportError,
  formatTransportError,
} from "../transport/index.js";

export type DriverError =
  | ProtocolError
  | TransportError
  | {
      readonly type: "COMMAND_REJECTED";
      readonly message: string;
      readonly reply: string;
    };

export function commandRejected(reply: string): DriverError {
  return {
    type: "COMMAND_REJECTED",
    message: "Device did not acknowledge the command",
    reply,
  };
}

export function formatDriverError(error: DriverError): string {
  switch (error.type) {
    case "OUTPUT_OUT_OF_RANGE":
    case "INPUT_OUT_OF_RANGE":
    case "VOLUME_OUT_OF_RANGE":
    case "UNSUPPORTED_COMMAND":
    case "MALFORMED_REPLY":
      return formatProtocolError(error);
    case "CONNECTION_FAILED":
    case "TIMEOUT":
    case "IO_ERROR":
    case "SOCKET_FAILED":
    case "CLOSED":
      return formatTransportError(error);
    case "COMMAND_REJECTED":
      return `Command rejected: "${error.reply}"`;
  }
}
