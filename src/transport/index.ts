/**
 * Transport Module - Public API
 *
 * Socket ownership, serialization and timeouts for both dialects.
 */

// Types
export type {
  DatagramSocket,
  DatagramSocketFactory,
  DeviceEndpoint,
  StreamConnection,
  StreamConnector,
  Transport,
  TransportReply,
  TransportStats,
} from "./schema.js";

export { INITIAL_TRANSPORT_STATS } from "./schema.js";

// Errors
export type { TransportError } from "./errors.js";
export { formatTransportError } from "./errors.js";

// Lock
export type { CommandLock } from "./lock.js";
export { createCommandLock } from "./lock.js";

// Socket adapters
export {
  connectStream,
  createDatagramSocket,
  createLineConnection,
  openDatagramSocket,
} from "./connection.js";

// Transports
export { createDatagramTransport } from "./datagram.js";
export { createStreamTransport } from "./stream.js";
