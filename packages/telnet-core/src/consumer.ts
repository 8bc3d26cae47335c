// Delivery boundary between the Telnet client and whatever consumes its
// payloads.

/**
 * Receives clean payloads from a client, one call per message, in the order
 * the bytes arrived. A thrown error or rejected promise is reported by the
 * client and does not affect the connection.
 */
export interface MessageConsumer {
  deliver(payload: Uint8Array): void | Promise<void>;
}

export type DeliverFn = (payload: Uint8Array) => void | Promise<void>;

/** Accept either a consumer or a bare callback. */
export function toConsumer(consumer: MessageConsumer | DeliverFn): MessageConsumer {
  return typeof consumer === "function" ? { deliver: consumer } : consumer;
}

/** A payload wrapped for a messaging handler. */
export interface BrokerMessage {
  /** `telnet.<host>:<port>` of the originating connection. */
  subject: string;
  body: Uint8Array;
  replyTo?: string;
}

/** Wrap a payload received from `address` (`host:port`). */
export function brokerMessage(body: Uint8Array, address: string): BrokerMessage {
  return {
    subject: `telnet.${address}`,
    body,
  };
}

/**
 * Remote target that broker messages are forwarded to. How the call travels
 * (RPC, queue, in-process) is up to the implementation.
 */
export interface MessageHandler {
  handleMessage(target: string, message: BrokerMessage): Promise<void>;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Short printable form of a payload: UTF-8 text cut at `limit` characters,
 * or a size marker for binary data.
 */
export function payloadPreview(body: Uint8Array, limit = 100): string {
  let text: string;
  try {
    text = utf8.decode(body);
  } catch {
    return `[binary data: ${body.length} bytes]`;
  }
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}
