/**
 * Amplifier Module - Error Types
 */

export type AmplifierError =
  | {
      readonly type: "INVALID_CONFIG";
      readonly message: string;
      readonly issues: ReadonlyArray<string>;
    }
  | {
      readonly type: "ZONE_CONFLICT";
      readonly message: string;
      readonly uniqueId: string;
    };

export function invalidConfig(issues: ReadonlyArray<string>): AmplifierError {
  return {
    type: "INVALID_CONFIG",
    message: "Invalid amplifier configuration",
    issues,
  };
}

export function zoneConflict(uniqueId: string): AmplifierError {
  return {
    type: "ZONE_CONFLICT",
    message: `Zone ${uniqueId} is already registered`,
    uniqueId,
  };
}

export function formatAmplifierError(error: AmplifierError): string {
  switch (error.type) {
    case "INVALID_CONFIG":
      return `${error.message}: ${error.issues.join("; ")}`;
    case "ZONE_CONFLICT":
      return error.message;
  }
}
