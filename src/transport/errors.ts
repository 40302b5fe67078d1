/**
 * Transport Module - Error Types
 *
 * Typed error union for socket-level failures.
 * Datagram silence is not an error and never appears here.
 */

/**
 * All possible errors from executing a command on the wire.
 */
export type TransportError =
  | {
      readonly type: "CONNECTION_FAILED";
      readonly message: string;
      readonly endpoint: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly phase: "connect" | "reply";
      readonly timeoutMs: number;
    }
  | { readonly type: "IO_ERROR"; readonly message: string; readonly cause?: Error }
  | {
      readonly type: "SOCKET_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | { readonly type: "CLOSED"; readonly message: string };

// =============================================================================
// Error Factory Functions
// =============================================================================

export function connectionFailed(
  message: string,
  endpoint: string,
  cause?: Error,
): TransportError {
  return cause !== undefined
    ? { type: "CONNECTION_FAILED", message, endpoint, cause }
    : { type: "CONNECTION_FAILED", message, endpoint };
}

export function timeout(
  phase: "connect" | "reply",
  timeoutMs: number,
): TransportError {
  const message =
    phase === "connect" ? "No connection established" : "No reply received";
  return { type: "TIMEOUT", message, phase, timeoutMs };
}

export function ioError(message: string, cause?: Error): TransportError {
  return cause !== undefined
    ? { type: "IO_ERROR", message, cause }
    : { type: "IO_ERROR", message };
}

export function socketFailed(message: string, cause?: Error): TransportError {
  return cause !== undefined
    ? { type: "SOCKET_FAILED", message, cause }
    : { type: "SOCKET_FAILED", message };
}

export function transportClosed(): TransportError {
  return { type: "CLOSED", message: "Transport has been closed" };
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create an Error tagged as a timeout, matching AbortSignal.timeout() naming.
 */
export function timeoutError(message: string): Error {
  const error = new Error(message);
  error.name = "TimeoutError";
  return error;
}

export function isTimeoutError(error: Error): boolean {
  return error.name === "TimeoutError";
}

/**
 * Format error for logging/display.
 */
export function formatTransportError(error: TransportError): string {
  switch (error.type) {
    case "CONNECTION_FAILED":
      return `Connection to ${error.endpoint} failed: ${error.message}`;
    case "TIMEOUT":
      return `Timeout after ${error.timeoutMs}ms (${error.phase}): ${error.message}`;
    case "IO_ERROR":
      return `I/O error: ${error.message}`;
    case "SOCKET_FAILED":
      return `Socket failed: ${error.message}`;
    case "CLOSED":
      return `Transport closed: ${error.message}`;
  }
}
