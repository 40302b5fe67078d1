/**
 * Transport Module - Datagram Transport
 *
 * Fresh UDP socket per command. Waits briefly for a reply, then closes the
 * socket whatever happened. Silence means "sent, outcome unknown", not failure.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { openDatagramSocket } from "./connection.js";
import {
  type TransportError,
  socketFailed,
  toError,
  transportClosed,
} from "./errors.js";
import { createCommandLock } from "./lock.js";
import {
  type DatagramSocket,
  type DatagramTransportOptions,
  INITIAL_TRANSPORT_STATS,
  type Transport,
  type TransportReply,
  type TransportStats,
} from "./schema.js";

const log = createLogger("transport");

export function createDatagramTransport(
  options: DatagramTransportOptions,
): Transport {
  const { endpoint, replyTimeoutMs } = options;
  const socketFactory = options.socketFactory ?? openDatagramSocket;
  const address = `${endpoint.host}:${endpoint.port}`;
  const lock = createCommandLock();

  let available = true;
  let closed = false;
  let stats: TransportStats = INITIAL_TRANSPORT_STATS;

  const recordFailure = (message: string): void => {
    available = false;
    stats = { ...stats, failures: stats.failures + 1, lastError: message };
  };

  function release(socket: DatagramSocket): void {
    try {
      socket.close();
    } catch (error) {
      log.warn({ address, error: toError(error).message }, "Error closing socket");
    }
  }

  async function awaitReply(
    socket: DatagramSocket,
    packet: string,
  ): Promise<TransportReply> {
    try {
      const reply = await socket.receive(replyTimeoutMs);
      if (reply !== null) {
        const line = reply.trim();
        log.debug({ address, packet: packet.trim(), reply: line }, "Reply received");
        return { kind: "reply", line };
      }
    } catch (error) {
      // The packet already left the host; a receive fault says nothing about delivery.
      log.warn(
        { address, error: toError(error).message },
        "Error waiting for reply",
      );
    }

    stats = { ...stats, silentReplies: stats.silentReplies + 1 };
    log.debug(
      { address, packet: packet.trim(), replyTimeoutMs },
      "No reply (treated as accepted)",
    );
    return { kind: "silent" };
  }

  async function exchange(
    packet: string,
  ): Promise<Result<TransportReply, TransportError>> {
    if (closed) {
      return err(transportClosed());
    }

    let socket: DatagramSocket;
    try {
      socket = await socketFactory(endpoint);
    } catch (error) {
      const cause = toError(error);
      recordFailure(cause.message);
      log.error({ address, error: cause.message }, "Unable to open socket");
      return err(socketFailed(cause.message, cause));
    }

    try {
      await socket.send(packet);
      stats = { ...stats, commandsSent: stats.commandsSent + 1 };
      available = true;
      return ok(await awaitReply(socket, packet));
    } catch (error) {
      const cause = toError(error);
      recordFailure(cause.message);
      log.error(
        { address, packet: packet.trim(), error: cause.message },
        "Error sending packet",
      );
      return err(socketFailed(cause.message, cause));
    } finally {
      release(socket);
    }
  }

  return {
    dialect: "datagram",
    endpoint,

    execute(packet: string): Promise<Result<TransportReply, TransportError>> {
      return lock.run(() => exchange(packet));
    },

    isAvailable: () => available && !closed,

    getStats: () => stats,

    async close(): Promise<void> {
      await lock.run(async () => {
        closed = true;
      });
    },
  };
}
