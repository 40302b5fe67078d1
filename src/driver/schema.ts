/**
 * Driver Module - Schemas and Types
 *
 * One driver per amplifier, tagged by dialect. Composes the encoder with a
 * transport; zones call into it and never touch sockets directly.
 */
import type { Result } from "neverthrow";

import type { Dialect, EncoderLimits } from "../protocol/index.js";
import type {
  DatagramSocketFactory,
  StreamConnector,
  TransportStats,
} from "../transport/index.js";
import type { DriverError } from "./errors.js";

/**
 * How sure we are that a control command took effect.
 * - confirmed: the device acknowledged it
 * - unconfirmed: sent, but the device stayed silent (datagram only)
 */
export type CommandOutcome = "confirmed" | "unconfirmed";

export type CommandResult = Result<CommandOutcome, DriverError>;

/** `null` when the dialect cannot read back or the reply was unusable. */
export type QueryResult<T> = Result<T | null, DriverError>;

export interface AmpDriver {
  readonly dialect: Dialect;
  readonly supportsQueries: boolean;
  readonly limits: EncoderLimits;

  route(output: number, input: number): Promise<CommandResult>;
  setVolume(output: number, volume: number): Promise<CommandResult>;
  powerOn(output: number, input: number): Promise<CommandResult>;
  powerOff(output: number): Promise<CommandResult>;

  queryRoute(output: number): Promise<QueryResult<number>>;
  queryVolume(output: number): Promise<QueryResult<number>>;
  queryPower(output: number): Promise<QueryResult<boolean>>;

  isAvailable(): boolean;
  getStats(): TransportStats;
  close(): Promise<void>;
}

export type DriverConfig = Readonly<{
  dialect: Dialect;
  host: string;
  port: number;
  numInputs: number;
  numOutputs: number;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  replyTimeoutMs: number;
}>;

/**
 * Seams for tests. Defaults open real sockets and use Math.random.
 */
export type DriverDeps = Readonly<{
  connector?: StreamConnector;
  socketFactory?: DatagramSocketFactory;
  random?: () => number;
}>;
