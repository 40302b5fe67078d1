/**
 * Transport Module - Schemas and Types
 *
 * Socket-level contracts shared by the stream and datagram transports.
 */
import type { Result } from "neverthrow";

import type { Dialect } from "../protocol/index.js";
import type { TransportError } from "./errors.js";

/**
 * Amplifier network address. Immutable per transport instance.
 */
export type DeviceEndpoint = Readonly<{
  host: string;
  port: number;
}>;

/**
 * Outcome of one exchange with the device.
 * - reply: the device answered with a line (trimmed)
 * - silent: nothing came back within the reply window (datagram only)
 */
export type TransportReply =
  | { readonly kind: "reply"; readonly line: string }
  | { readonly kind: "silent" };

// =============================================================================
// Socket Seams
// =============================================================================

/**
 * Line-oriented duplex connection used by the stream transport.
 */
export interface StreamConnection {
  write(data: string): Promise<void>;
  /** Resolves with the next line; rejects with a TimeoutError or I/O error. */
  readLine(timeoutMs: number): Promise<string>;
  /** Drop lines that arrived before a command was sent. Returns the count. */
  discardBuffered(): number;
  /** False once the peer has closed the connection or it errored. */
  isOpen(): boolean;
  close(): Promise<void>;
}

/**
 * Opens a stream connection, rejecting with a TimeoutError after `timeoutMs`.
 */
export type StreamConnector = (
  endpoint: DeviceEndpoint,
  timeoutMs: number,
) => Promise<StreamConnection>;

/**
 * Single-use datagram socket used by the datagram transport.
 */
export interface DatagramSocket {
  send(payload: string): Promise<void>;
  /** Resolves with the first reply, or null once `timeoutMs` elapses. */
  receive(timeoutMs: number): Promise<string | null>;
  close(): void;
}

export type DatagramSocketFactory = (
  endpoint: DeviceEndpoint,
) => Promise<DatagramSocket>;

// =============================================================================
// Transport Contract
// =============================================================================

/**
 * Counters exposed for health reporting and tests.
 */
export type TransportStats = Readonly<{
  connectAttempts: number;
  commandsSent: number;
  failures: number;
  silentReplies: number;
  lastError: string | null;
}>;

export const INITIAL_TRANSPORT_STATS: TransportStats = {
  connectAttempts: 0,
  commandsSent: 0,
  failures: 0,
  silentReplies: 0,
  lastError: null,
};

/**
 * One command at a time to completion, serialized by a per-device lock.
 */
export interface Transport {
  readonly dialect: Dialect;
  readonly endpoint: DeviceEndpoint;
  execute(wire: string): Promise<Result<TransportReply, TransportError>>;
  isAvailable(): boolean;
  getStats(): TransportStats;
  close(): Promise<void>;
}

export type StreamTransportOptions = Readonly<{
  endpoint: DeviceEndpoint;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  connector?: StreamConnector;
}>;

export type DatagramTransportOptions = Readonly<{
  endpoint: DeviceEndpoint;
  replyTimeoutMs: number;
  socketFactory?: DatagramSocketFactory;
}>;
