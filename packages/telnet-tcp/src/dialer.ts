// Opening TCP connections for the reconnecting client.

import net from "node:net";
import { ConnectionError, logger } from "@telnet-relay/core";
import { SocketReader, type ByteStream } from "./reader.ts";

/**
 * Opens a byte stream to `host:port`.
 *
 * Must reject with the signal's reason if `signal` aborts before the stream
 * is open.
 */
export type Dialer = (host: string, port: number, signal: AbortSignal) => Promise<ByteStream>;

export interface TcpDialerOptions {
  /** Give up on a connection attempt after this many milliseconds. Default: no timeout. */
  connectTimeoutMs?: number;
}

/**
 * Create a Dialer that opens plain TCP connections.
 *
 * Connection failures (refused, DNS, timeout) reject with a `connect`
 * ConnectionError.
 */
export function tcpDialer(options: TcpDialerOptions = {}): Dialer {
  const { connectTimeoutMs } = options;

  return (host, port, signal) =>
    new Promise<ByteStream>((resolve, reject) => {
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }

      const address = `${host}:${port}`;
      const socket = net.createConnection({ host, port });
      // Attach the reader before any data can arrive.
      const reader = new SocketReader(socket);

      const cleanup = () => {
        signal.removeEventListener("abort", onAbort);
        socket.off("connect", onConnect);
        socket.off("error", onError);
        socket.off("timeout", onTimeout);
        socket.setTimeout(0);
      };
      const onConnect = () => {
        cleanup();
        logger.client("tcp connected to %s", address);
        resolve(reader);
      };
      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(ConnectionError.connect(address, err.message, err));
      };
      const onTimeout = () => {
        cleanup();
        socket.destroy();
        reject(ConnectionError.connect(address, `timed out after ${connectTimeoutMs}ms`));
      };
      const onAbort = () => {
        cleanup();
        socket.destroy();
        reject(signal.reason);
      };

      socket.once("connect", onConnect);
      socket.once("error", onError);
      signal.addEventListener("abort", onAbort, { once: true });
      if (connectTimeoutMs !== undefined && connectTimeoutMs > 0) {
        socket.setTimeout(connectTimeoutMs);
        socket.once("timeout", onTimeout);
      }
    });
}
