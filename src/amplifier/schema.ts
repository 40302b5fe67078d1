/**
 * Amplifier Module - Schemas and Types
 *
 * One configured device: its driver, its tracker and one zone per output.
 */
import { z } from "zod";

import type { DriverDeps } from "../driver/index.js";
import {
  DIALECTS,
  type Dialect,
  MAX_DATAGRAM_INPUTS,
  MAX_OUTPUTS,
  MAX_STREAM_INPUTS,
} from "../protocol/index.js";
import type { TransportStats } from "../transport/index.js";
import type { Zone, ZoneResult } from "../zone/index.js";

const DEFAULT_PORTS: Readonly<Record<Dialect, number>> = {
  stream: 4999,
  datagram: 8750,
};

/**
 * Amplifier settings as entered by the user. Validated once at setup.
 */
export const AmplifierConfigSchema = z
  .object({
    host: z.string().trim().min(1, "Host is required"),
    port: z.number().int().min(1).max(65535).optional(),
    dialect: z.enum(DIALECTS).default("datagram"),
    name: z.string().trim().min(1).default("Matrix Amp"),
    numInputs: z.number().int().min(1).max(MAX_STREAM_INPUTS).default(6),
    numOutputs: z.number().int().min(1).max(MAX_OUTPUTS).default(16),
    entryId: z.string().trim().min(1).optional(),
    connectTimeoutMs: z.number().positive().default(10000),
    commandTimeoutMs: z.number().positive().default(5000),
    replyTimeoutMs: z.number().positive().default(2000),
  })
  .superRefine((value, ctx) => {
    if (value.dialect === "datagram" && value.numInputs > MAX_DATAGRAM_INPUTS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["numInputs"],
        message: `The datagram dialect addresses at most ${MAX_DATAGRAM_INPUTS} inputs`,
      });
    }
  })
  .transform((value) => ({
    ...value,
    port: value.port ?? DEFAULT_PORTS[value.dialect],
    entryId: value.entryId ?? value.host,
  }));

export type AmplifierConfigInput = z.input<typeof AmplifierConfigSchema>;
export type AmplifierConfig = z.output<typeof AmplifierConfigSchema>;

/**
 * Where zones are published for the host. Keyed by unique id.
 */
export interface ZoneRegistry {
  /** Returns false when the unique id is already taken. */
  register(zone: Zone): boolean;
  unregister(uniqueId: string): boolean;
  get(uniqueId: string): Zone | undefined;
  list(): ReadonlyArray<Zone>;
}

export type AmplifierDeps = DriverDeps &
  Readonly<{
    clock?: () => number;
  }>;

export interface Amplifier {
  readonly config: AmplifierConfig;
  readonly zones: ReadonlyArray<Zone>;
  getZone(output: number): Zone | undefined;
  /** Refresh every zone in output order. Caller decides when. */
  refreshAll(): Promise<ReadonlyArray<ZoneResult>>;
  isAvailable(): boolean;
  getStats(): TransportStats;
  /** Unregister zones, forget state and close the connection. */
  teardown(): Promise<void>;
}
