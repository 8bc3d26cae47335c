// Chunked reads over a TCP socket.

import net from "node:net";
import { ConnectionError, logger } from "@telnet-relay/core";

/** Largest chunk handed out by a single read. */
export const READ_BUFFER_SIZE = 4096;

/** Queued chunks above which the socket is paused until the reader catches up. */
const HIGH_WATER_CHUNKS = 64;

/**
 * A source of raw bytes, read one chunk at a time.
 *
 * `read()` resolves to `null` once the peer has closed the stream and
 * rejects if the stream failed.
 */
export interface ByteStream {
  read(): Promise<Uint8Array | null>;
  close(): void;
}

/**
 * Pull-style reader over a socket's `data` events.
 *
 * Incoming data is split into chunks of at most READ_BUFFER_SIZE bytes and
 * queued until read. The socket is paused while the queue is full.
 */
export class SocketReader implements ByteStream {
  private socket: net.Socket;
  private chunks: Uint8Array[] = [];
  private waiter: (() => void) | null = null;
  private ended = false;
  private error: Error | null = null;

  constructor(socket: net.Socket) {
    this.socket = socket;

    socket.on("data", (data: Buffer) => {
      for (let offset = 0; offset < data.length; offset += READ_BUFFER_SIZE) {
        this.chunks.push(new Uint8Array(data.subarray(offset, offset + READ_BUFFER_SIZE)));
      }
      if (this.chunks.length >= HIGH_WATER_CHUNKS) {
        logger.reader("read queue full (%d chunks), pausing socket", this.chunks.length);
        socket.pause();
      }
      this.wake();
    });

    socket.on("error", (err: Error) => {
      this.error = err;
      this.wake();
    });

    socket.on("close", () => {
      this.ended = true;
      this.wake();
    });
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  /** Get the underlying socket. */
  getSocket(): net.Socket {
    return this.socket;
  }

  /**
   * Read the next chunk.
   *
   * Queued data is returned before a close or error is reported. A socket
   * error rejects exactly once; later reads return `null`.
   */
  async read(): Promise<Uint8Array | null> {
    for (;;) {
      const chunk = this.chunks.shift();
      if (chunk !== undefined) {
        if (this.socket.isPaused() && this.chunks.length < HIGH_WATER_CHUNKS / 2) {
          this.socket.resume();
        }
        return chunk;
      }

      if (this.error) {
        const err = this.error;
        this.error = null;
        this.ended = true;
        throw ConnectionError.io(err.message, err);
      }
      if (this.ended) {
        return null;
      }

      if (this.waiter) {
        throw new Error("SocketReader: concurrent read");
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  /** Destroy the socket. Pending and later reads return `null`. */
  close(): void {
    this.socket.destroy();
  }
}
