/**
 * Transport Module - Node Socket Adapters
 *
 * Default socket seams: a line-framed TCP connection for the stream dialect
 * and a single-use UDP socket for the datagram dialect.
 */
import dgram from "node:dgram";
import net from "node:net";
import type { Duplex } from "node:stream";

import { timeoutError, toError } from "./errors.js";
import type {
  DatagramSocket,
  DatagramSocketFactory,
  DeviceEndpoint,
  StreamConnection,
  StreamConnector,
} from "./schema.js";

// =============================================================================
// Stream (TCP)
// =============================================================================

type PendingRead = {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
};

/**
 * Frame a duplex byte stream into CRLF / LF terminated lines.
 */
export function createLineConnection(socket: Duplex): StreamConnection {
  let buffer = "";
  const lines: string[] = [];
  let pending: PendingRead | null = null;
  let failure: Error | null = null;

  const deliver = (line: string): void => {
    if (pending) {
      const read = pending;
      pending = null;
      clearTimeout(read.timer);
      read.resolve(line);
      return;
    }
    lines.push(line);
  };

  const fail = (error: Error): void => {
    const reason = failure ?? error;
    failure = reason;
    if (pending) {
      const read = pending;
      pending = null;
      clearTimeout(read.timer);
      read.reject(reason);
    }
  };

  socket.on("data", (chunk: Buffer | string) => {
    buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    let index = buffer.indexOf("\n");
    while (index !== -1) {
      deliver(buffer.slice(0, index).replace(/\r$/, ""));
      buffer = buffer.slice(index + 1);
      index = buffer.indexOf("\n");
    }
  });
  socket.on("error", (error: Error) => fail(error));
  socket.on("end", () => fail(new Error("Connection closed by peer")));
  socket.on("close", () => fail(new Error("Connection closed")));

  return {
    write(data: string): Promise<void> {
      if (failure) {
        return Promise.reject(failure);
      }
      return new Promise((resolve, reject) => {
        socket.write(data, "utf8", (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },

    readLine(timeoutMs: number): Promise<string> {
      const next = lines.shift();
      if (next !== undefined) {
        return Promise.resolve(next);
      }
      if (failure) {
        return Promise.reject(failure);
      }
      return new Promise((resolve, reject) => {
        const timer = setTimeout(() => {
          pending = null;
          reject(timeoutError(`No reply within ${timeoutMs}ms`));
        }, timeoutMs);
        pending = { resolve, reject, timer };
      });
    },

    discardBuffered(): number {
      const count = lines.length;
      lines.length = 0;
      return count;
    },

    isOpen: () => failure === null,

    close(): Promise<void> {
      fail(new Error("Connection closed"));
      socket.destroy();
      return Promise.resolve();
    },
  };
}

/**
 * Open a TCP connection to the amplifier.
 */
export const connectStream: StreamConnector = (endpoint, timeoutMs) =>
  new Promise((resolve, reject) => {
    const socket = net.createConnection({
      host: endpoint.host,
      port: endpoint.port,
    });

    const onError = (error: Error): void => {
      clearTimeout(timer);
      socket.destroy();
      reject(error);
    };

    const timer = setTimeout(() => {
      socket.removeListener("error", onError);
      socket.destroy();
      reject(timeoutError(`Connect timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timer);
      socket.removeListener("error", onError);
      socket.setNoDelay(true);
      resolve(createLineConnection(socket));
    });
  });

// =============================================================================
// Datagram (UDP)
// =============================================================================

/**
 * Wrap a dgram socket bound for one command exchange with `endpoint`.
 */
export function createDatagramSocket(
  socket: dgram.Socket,
  endpoint: DeviceEndpoint,
): DatagramSocket {
  const replies: string[] = [];
  let waiter: ((reply: string | null) => void) | null = null;
  let failure: Error | null = null;
  let closed = false;

  socket.on("message", (message: Buffer) => {
    const reply = message.toString("ascii");
    if (waiter) {
      const wake = waiter;
      waiter = null;
      wake(reply);
      return;
    }
    replies.push(reply);
  });
  socket.on("error", (error: Error) => {
    failure = error;
  });

  return {
    send(payload: string): Promise<void> {
      return new Promise((resolve, reject) => {
        socket.send(
          Buffer.from(payload, "ascii"),
          endpoint.port,
          endpoint.host,
          (error) => {
            if (error) {
              reject(error);
            } else {
              resolve();
            }
          },
        );
      });
    },

    receive(timeoutMs: number): Promise<string | null> {
      const next = replies.shift();
      if (next !== undefined) {
        return Promise.resolve(next);
      }
      if (failure) {
        return Promise.reject(failure);
      }
      return new Promise((resolve) => {
        const timer = setTimeout(() => {
          waiter = null;
          resolve(null);
        }, timeoutMs);
        waiter = (reply) => {
          clearTimeout(timer);
          resolve(reply);
        };
      });
    },

    close(): void {
      if (closed) {
        return;
      }
      closed = true;
      waiter?.(null);
      waiter = null;
      socket.removeAllListeners("message");
      socket.close();
    },
  };
}

/**
 * Open a fresh UDP socket for one command.
 */
export const openDatagramSocket: DatagramSocketFactory = (endpoint) => {
  try {
    const family = net.isIPv6(endpoint.host) ? "udp6" : "udp4";
    return Promise.resolve(
      createDatagramSocket(dgram.createSocket(family), endpoint),
    );
  } catch (error) {
    return Promise.reject(toError(error));
  }
};
