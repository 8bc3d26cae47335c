// Error types for telnet-relay clients.

/**
 * A transport failure. Every kind is retryable by the reconnecting client.
 *
 * - `connect`: the TCP connection could not be opened (refused, DNS, timeout).
 * - `io`: the socket failed while reading.
 * - `closed`: the server closed the connection.
 */
export class ConnectionError extends Error {
  constructor(
    public kind: "connect" | "io" | "closed",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }

  static connect(address: string, reason: string, cause?: unknown): ConnectionError {
    return new ConnectionError("connect", `failed to connect to ${address}: ${reason}`, { cause });
  }

  static io(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("io", message, { cause });
  }

  static closed(): ConnectionError {
    return new ConnectionError("closed", "connection closed by server");
  }
}

/** Raised by the reconnecting client once its attempt budget is spent. */
export class ReconnectExhaustedError extends Error {
  constructor(
    public attempts: number,
    public lastError: Error,
  ) {
    super(`Reconnection failed after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    this.name = "ReconnectExhaustedError";
  }
}

/** Link configuration that cannot be turned into a client config. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Normalize a thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
