/**
 * Transport Module - Stream Transport
 *
 * One persistent TCP connection per amplifier. Connects lazily, sends one
 * line and reads one line per command, and tears the connection down on any
 * timeout or I/O error so the next command reconnects from scratch. A
 * connection the amplifier has closed is replaced before the next write.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { STREAM_TERMINATOR } from "../protocol/index.js";
import { connectStream } from "./connection.js";
import {
  type TransportError,
  connectionFailed,
  ioError,
  isTimeoutError,
  timeout,
  toError,
  transportClosed,
} from "./errors.js";
import { createCommandLock } from "./lock.js";
import {
  INITIAL_TRANSPORT_STATS,
  type StreamConnection,
  type StreamTransportOptions,
  type Transport,
  type TransportReply,
  type TransportStats,
} from "./schema.js";

const log = createLogger("transport");

export function createStreamTransport(
  options: StreamTransportOptions,
): Transport {
  const { endpoint, connectTimeoutMs, commandTimeoutMs } = options;
  const connector = options.connector ?? connectStream;
  const address = `${endpoint.host}:${endpoint.port}`;
  const lock = createCommandLock();

  let connection: StreamConnection | null = null;
  let available = true;
  let closed = false;
  let stats: TransportStats = INITIAL_TRANSPORT_STATS;

  const recordFailure = (message: string): void => {
    stats = { ...stats, failures: stats.failures + 1, lastError: message };
  };

  // ===========================================================================
  // Connection Lifecycle
  // ===========================================================================

  async function ensureConnected(): Promise<
    Result<StreamConnection, TransportError>
  > {
    if (connection?.isOpen()) {
      return ok(connection);
    }
    if (connection) {
      await teardown("connection closed by peer");
    }

    stats = { ...stats, connectAttempts: stats.connectAttempts + 1 };
    log.info(
      { address, attempt: stats.connectAttempts },
      "Connecting to amplifier...",
    );

    try {
      connection = await connector(endpoint, connectTimeoutMs);
      available = true;
      log.info({ address }, "Connected to amplifier");
      return ok(connection);
    } catch (error) {
      const cause = toError(error);
      available = false;
      recordFailure(cause.message);

      if (isTimeoutError(cause)) {
        log.error({ address, timeoutMs: connectTimeoutMs }, "Connect timed out");
        return err(timeout("connect", connectTimeoutMs));
      }

      log.error({ address, error: cause.message }, "Failed to connect");
      return err(connectionFailed(cause.message, address, cause));
    }
  }

  async function teardown(reason: string): Promise<void> {
    const current = connection;
    connection = null;
    if (!current) {
      return;
    }

    log.warn({ address, reason }, "Dropping amplifier connection");
    try {
      await current.close();
    } catch (error) {
      log.debug(
        { address, error: toError(error).message },
        "Error while closing connection",
      );
    }
  }

  // ===========================================================================
  // Command Exchange
  // ===========================================================================

  async function exchange(
    wire: string,
  ): Promise<Result<TransportReply, TransportError>> {
    if (closed) {
      return err(transportClosed());
    }

    const connected = await ensureConnected();
    if (connected.isErr()) {
      return err(connected.error);
    }
    const active = connected.value;

    const stale = active.discardBuffered();
    if (stale > 0) {
      log.debug({ address, stale }, "Discarded unsolicited lines");
    }

    try {
      await active.write(`${wire}${STREAM_TERMINATOR}`);
      stats = { ...stats, commandsSent: stats.commandsSent + 1 };

      const line = (await active.readLine(commandTimeoutMs)).trim();
      log.debug({ address, command: wire, reply: line }, "Command answered");
      return ok({ kind: "reply", line });
    } catch (error) {
      const cause = toError(error);
      recordFailure(cause.message);
      await teardown(cause.message);

      if (isTimeoutError(cause)) {
        log.error(
          { address, command: wire, timeoutMs: commandTimeoutMs },
          "Timed out waiting for reply",
        );
        return err(timeout("reply", commandTimeoutMs));
      }

      log.error(
        { address, command: wire, error: cause.message },
        "Error sending command",
      );
      return err(ioError(cause.message, cause));
    }
  }

  return {
    dialect: "stream",
    endpoint,

    execute(wire: string): Promise<Result<TransportReply, TransportError>> {
      return lock.run(() => exchange(wire));
    },

    isAvailable: () => available && !closed,

    getStats: () => stats,

    async close(): Promise<void> {
      await lock.run(async () => {
        closed = true;
        await teardown("transport closed");
      });
    },
  };
}
