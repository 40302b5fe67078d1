/**
 * Zone Module - Error Types
 */
import { type DriverError, formatDriverError } from "../driver/index.js";
import type { ZoneOperation } from "./schema.js";

export type ZoneField = "output" | "input" | "volume" | "level" | "source";

export type ZoneError =
  | {
      readonly type: "VALIDATION_FAILED";
      readonly message: string;
      readonly field: ZoneField;
    }
  | {
      readonly type: "COMMAND_FAILED";
      readonly message: string;
      readonly operation: ZoneOperation;
      readonly cause: DriverError;
    };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function validationFailed(field: ZoneField, message: string): ZoneError {
  return { type: "VALIDATION_FAILED", message, field };
}

export function commandFailed(
  operation: ZoneOperation,
  cause: DriverError,
): ZoneError {
  return { type: "COMMAND_FAILED", message: cause.message, operation, cause };
}

/**
 * Range errors from the encoder are the caller's fault, not the device's.
 */
export function fromDriverError(
  operation: ZoneOperation,
  error: DriverError,
): ZoneError {
  switch (error.type) {
    case "OUTPUT_OUT_OF_RANGE":
      return validationFailed("output", error.message);
    case "INPUT_OUT_OF_RANGE":
      return validationFailed("input", error.message);
    case "VOLUME_OUT_OF_RANGE":
      return validationFailed("volume", error.message);
    default:
      return commandFailed(operation, error);
  }
}

export function formatZoneError(error: ZoneError): string {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return `Invalid ${error.field}: ${error.message}`;
    case "COMMAND_FAILED":
      return `${error.operation} failed: ${formatDriverError(error.cause)}`;
  }
}
