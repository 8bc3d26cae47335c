// Reconnecting, receive-only Telnet client.
//
// Keeps a connection to one server open, strips Telnet control sequences
// from what arrives and hands the remaining payload to a consumer. Any
// transport failure (connect error, read error, server closing the
// connection) leads to a backoff and a new connection attempt, until the
// attempt budget runs out.

import { setTimeout as delay } from "node:timers/promises";
import {
  Backoff,
  ConnectionError,
  ReconnectExhaustedError,
  configAddress,
  logger,
  toConsumer,
  toError,
  type ClientConfig,
  type DeliverFn,
  type MessageConsumer,
} from "@telnet-relay/core";
import { TelnetFilter } from "@telnet-relay/wire";
import { tcpDialer, type Dialer } from "./dialer.ts";
import type { ByteStream } from "./reader.ts";

const log = logger.client;

/**
 * Client state.
 *
 * `connecting` → `streaming` → `backoff` → `connecting` ... until either
 * `given-up` (attempt budget spent) or `stopped` (aborted by the owner).
 */
export type ClientState = "idle" | "connecting" | "streaming" | "backoff" | "given-up" | "stopped";

/** Abortable wait used between reconnection attempts. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

/**
 * When a new connection restores the full attempt budget.
 *
 * - `first-data`: once the first bytes arrive on the new connection. A
 *   server that accepts and immediately closes keeps using up the budget.
 * - `connect`: as soon as the TCP connection is open.
 */
export type BackoffReset = "first-data" | "connect";

export interface TelnetClientOptions {
  /** Opens connections. Default: tcpDialer(). */
  dialer?: Dialer;
  /** Waits between attempts. Default: an abortable timer. */
  sleep?: Sleep;
  /** Default: "first-data". */
  resetBackoffOn?: BackoffReset;
  /** Called when the client state changes. */
  onStateChange?: (state: ClientState) => void;
  /** Called before waiting for a reconnection attempt. */
  onReconnectAttempt?: (attempt: number, delay: number) => void;
  /** Called when the client gives up. */
  onReconnectFailed?: (error: ReconnectExhaustedError) => void;
  /** Called when the consumer throws or rejects. */
  onDeliveryError?: (error: Error) => void;
}

const defaultSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

/** Error thrown when run() is called while a run is in progress. */
export class ClientBusyError extends Error {
  constructor() {
    super("Client is already running");
    this.name = "ClientBusyError";
  }
}

/**
 * Reconnecting Telnet client.
 *
 * @example
 * ```typescript
 * const client = new TelnetClient(createClientConfig({ host: "localhost", port: 2323 }));
 * const controller = new AbortController();
 * await client.run((payload) => console.log(payload), controller.signal);
 * ```
 */
export class TelnetClient {
  readonly config: ClientConfig;
  readonly address: string;

  private dialer: Dialer;
  private sleep: Sleep;
  private resetBackoffOn: BackoffReset;
  private onStateChange?: (state: ClientState) => void;
  private onReconnectAttempt?: (attempt: number, delay: number) => void;
  private onReconnectFailed?: (error: ReconnectExhaustedError) => void;
  private onDeliveryError?: (error: Error) => void;

  private state: ClientState = "idle";
  private running = false;

  constructor(config: ClientConfig, options: TelnetClientOptions = {}) {
    this.config = config;
    this.address = configAddress(config);
    this.dialer = options.dialer ?? tcpDialer();
    this.sleep = options.sleep ?? defaultSleep;
    this.resetBackoffOn = options.resetBackoffOn ?? "first-data";
    this.onStateChange = options.onStateChange;
    this.onReconnectAttempt = options.onReconnectAttempt;
    this.onReconnectFailed = options.onReconnectFailed;
    this.onDeliveryError = options.onDeliveryError;
  }

  /** Get the current state. */
  getState(): ClientState {
    return this.state;
  }

  /**
   * Connect and deliver payloads until stopped or out of attempts.
   *
   * Resolves once `signal` aborts; the socket is closed and no further
   * payloads are delivered. Rejects with ReconnectExhaustedError when
   * `maxReconnectAttempts` is nonzero and has been used up.
   */
  async run(consumer: MessageConsumer | DeliverFn, signal?: AbortSignal): Promise<void> {
    if (this.running) {
      throw new ClientBusyError();
    }
    this.running = true;
    try {
      await this.loop(toConsumer(consumer), signal ?? new AbortController().signal);
    } finally {
      this.running = false;
    }
  }

  private async loop(consumer: MessageConsumer, signal: AbortSignal): Promise<void> {
    const backoff = new Backoff(this.config.initialBackoffMs, this.config.maxBackoffMs);
    let stream: ByteStream | null = null;
    let lastError: Error = ConnectionError.closed();

    this.setState("connecting");
    for (;;) {
      if (signal.aborted) {
        stream?.close();
        this.setState("stopped");
        return;
      }

      switch (this.state) {
        case "connecting": {
          log("connecting to %s", this.address);
          try {
            stream = await this.dialer(this.config.host, this.config.port, signal);
          } catch (error) {
            if (signal.aborted) continue;
            lastError = toError(error);
            this.setState("backoff");
            continue;
          }
          log("connection established to %s", this.address);
          if (this.resetBackoffOn === "connect") {
            backoff.reset();
          }
          this.setState("streaming");
          continue;
        }

        case "streaming": {
          if (stream === null) {
            this.setState("connecting");
            continue;
          }
          const failure = await this.pump(stream, consumer, backoff, signal);
          stream.close();
          stream = null;
          if (failure === null) continue;
          lastError = failure;
          this.setState("backoff");
          continue;
        }

        case "backoff": {
          log("connection to %s failed: %s", this.address, lastError.message);
          const maxAttempts = this.config.maxReconnectAttempts;
          if (backoff.exhausted(maxAttempts)) {
            log("maximum reconnection attempts (%d) reached", maxAttempts);
            const error = new ReconnectExhaustedError(backoff.attempts, lastError);
            this.setState("given-up");
            this.onReconnectFailed?.(error);
            throw error;
          }

          const wait = backoff.next();
          log("attempting reconnection #%d after %dms", backoff.attempts, wait);
          this.onReconnectAttempt?.(backoff.attempts, wait);
          try {
            await this.sleep(wait, signal);
          } catch (error) {
            if (signal.aborted) continue;
            throw error;
          }
          this.setState("connecting");
          continue;
        }

        default:
          throw new Error(`unexpected client state: ${this.state}`);
      }
    }
  }

  /**
   * Read from one connection until it fails.
   *
   * Returns the error that ended the connection, or `null` if the signal
   * aborted.
   */
  private async pump(
    stream: ByteStream,
    consumer: MessageConsumer,
    backoff: Backoff,
    signal: AbortSignal,
  ): Promise<Error | null> {
    // Fresh per connection: a control sequence never spans a reconnect.
    const filter = new TelnetFilter();
    const onAbort = () => stream.close();
    signal.addEventListener("abort", onAbort, { once: true });
    let flowing = false;

    try {
      for (;;) {
        let chunk: Uint8Array | null;
        try {
          chunk = await stream.read();
        } catch (error) {
          if (signal.aborted) return null;
          const err = toError(error);
          return err instanceof ConnectionError ? err : ConnectionError.io(err.message, err);
        }
        if (signal.aborted) return null;
        if (chunk === null) {
          log("connection closed by %s", this.address);
          return ConnectionError.closed();
        }
        if (chunk.length === 0) continue;

        if (!flowing) {
          flowing = true;
          if (this.resetBackoffOn === "first-data") {
            backoff.reset();
          }
        }

        const payload = filter.push(chunk);
        if (payload.length === 0) {
          log("received Telnet negotiation only, skipping");
          continue;
        }

        log("received data: %d bytes", payload.length);
        if (payload.length > this.config.maxMessageSizeBytes) {
          log(
            "message size %d exceeds limit %d, skipping",
            payload.length,
            this.config.maxMessageSizeBytes,
          );
          continue;
        }

        await this.deliver(consumer, payload);
      }
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
  }

  private async deliver(consumer: MessageConsumer, payload: Uint8Array): Promise<void> {
    try {
      await consumer.deliver(payload);
    } catch (error) {
      const err = toError(error);
      log("consumer failed to handle message from %s: %s", this.address, err.message);
      this.onDeliveryError?.(err);
    }
  }

  private setState(state: ClientState): void {
    if (this.state !== state) {
      this.state = state;
      this.onStateChange?.(state);
    }
  }
}

/** How a started client finished. */
export type ClientOutcome = { kind: "stopped" } | { kind: "given-up"; error: ReconnectExhaustedError };

/** Handle to a client started with startClient(). */
export interface RunningClient {
  readonly client: TelnetClient;
  /** Settles when the client stops or gives up; never rejects for either. */
  readonly done: Promise<ClientOutcome>;
  /** Abort the client and wait for it to finish. */
  stop(): Promise<ClientOutcome>;
}

/**
 * Start a client in the background.
 *
 * @example
 * ```typescript
 * const running = startClient(config, loggingConsumer(consumer));
 * // ...
 * await running.stop();
 * ```
 */
export function startClient(
  config: ClientConfig,
  consumer: MessageConsumer | DeliverFn,
  options: TelnetClientOptions = {},
): RunningClient {
  const client = new TelnetClient(config, options);
  const controller = new AbortController();
  const done = client.run(consumer, controller.signal).then(
    (): ClientOutcome => ({ kind: "stopped" }),
    (error: unknown): ClientOutcome => {
      if (error instanceof ReconnectExhaustedError) {
        return { kind: "given-up", error };
      }
      throw error;
    },
  );

  return {
    client,
    done,
    stop(): Promise<ClientOutcome> {
      controller.abort();
      return done;
    },
  };
}
