// One reconnecting client per linked component.
//
// The host hands in a link (source id + string config); the registry starts
// a client for it and forwards every payload to the component as a broker
// message. Deleting the link or shutting down aborts the client.

import {
  brokerMessage,
  clientConfigFromValues,
  configAddress,
  logger,
  type BrokerMessage,
  type ClientConfig,
  type LinkValues,
  type MessageConsumer,
  type MessageHandler,
} from "@telnet-relay/core";
import { startClient, type RunningClient, type TelnetClientOptions } from "./client.ts";

const log = logger.links;

interface LinkEntry {
  config: ClientConfig;
  running: RunningClient;
}

export interface LinkRegistryOptions {
  /** Options passed to every client the registry starts. */
  client?: TelnetClientOptions;
}

/**
 * Consumer that forwards payloads to a component without waiting for the
 * handler, so a slow component never stalls the read loop.
 */
export class ForwardingConsumer implements MessageConsumer {
  constructor(
    private handler: MessageHandler,
    private target: string,
    private address: string,
  ) {}

  deliver(payload: Uint8Array): void {
    const message: BrokerMessage = brokerMessage(payload, this.address);
    this.handler.handleMessage(this.target, message).then(
      () => log("message successfully sent to component %s", this.target),
      (error: unknown) =>
        log(
          "failed to send message to component %s: %s",
          this.target,
          error instanceof Error ? error.message : String(error),
        ),
    );
  }
}

/** Tracks the running client of every linked component. */
export class LinkRegistry {
  private links = new Map<string, LinkEntry>();
  private handler: MessageHandler;
  private clientOptions: TelnetClientOptions;

  constructor(handler: MessageHandler, options: LinkRegistryOptions = {}) {
    this.handler = handler;
    this.clientOptions = options.client ?? {};
  }

  /**
   * Start a client for `sourceId` from its link values.
   *
   * Throws ConfigError if the values are unusable. A client already running
   * for the same source is replaced; the returned promise settles once it
   * has stopped.
   */
  async putLink(sourceId: string, values: LinkValues): Promise<ClientConfig> {
    log("received link configuration from component: %s", sourceId);
    const config = clientConfigFromValues(values);

    const previous = this.links.get(sourceId);

    log("starting Telnet client for %s:%d", config.host, config.port);
    const consumer = new ForwardingConsumer(this.handler, sourceId, configAddress(config));
    const running = startClient(config, consumer, this.clientOptions);
    const entry: LinkEntry = { config, running };
    // Registered before any await, so a concurrent putLink for the same
    // source finds this entry and stops it.
    this.links.set(sourceId, entry);

    running.done.then(
      (outcome) => {
        if (outcome.kind === "given-up") {
          log("Telnet client error for component %s: %s", sourceId, outcome.error.message);
          if (this.links.get(sourceId) === entry) {
            this.links.delete(sourceId);
          }
        }
      },
      (error: unknown) =>
        log(
          "Telnet client for component %s crashed: %s",
          sourceId,
          error instanceof Error ? error.message : String(error),
        ),
    );

    if (previous) {
      log("replacing existing link for component: %s", sourceId);
      await previous.running.stop();
    }

    return config;
  }

  /**
   * Stop the client for `sourceId`.
   *
   * Returns false if there was no such link.
   */
  async deleteLink(sourceId: string): Promise<boolean> {
    log("deleting link with component: %s", sourceId);
    const entry = this.links.get(sourceId);
    if (!entry) {
      log("no connection found for component: %s", sourceId);
      return false;
    }
    this.links.delete(sourceId);
    await entry.running.stop();
    log("Telnet connection closed for component: %s", sourceId);
    return true;
  }

  /** Stop every client. */
  async shutdown(): Promise<void> {
    log("shutting down link registry");
    const entries = [...this.links.entries()];
    this.links.clear();
    await Promise.all(
      entries.map(async ([sourceId, entry]) => {
        log("closing Telnet connection for component: %s", sourceId);
        await entry.running.stop();
      }),
    );
    log("link registry shutdown complete");
  }

  has(sourceId: string): boolean {
    return this.links.has(sourceId);
  }

  get size(): number {
    return this.links.size;
  }

  linkIds(): string[] {
    return [...this.links.keys()];
  }

  /** Configuration of a linked component. */
  getConfig(sourceId: string): ClientConfig | undefined {
    return this.links.get(sourceId)?.config;
  }
}
