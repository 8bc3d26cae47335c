// Logging for telnet-relay.
//
// Built on the debug package: nothing is printed unless the namespace is
// enabled, through DEBUG=telnet:* or enableLogging().

import createDebug from "debug";
import type { BrokerMessage, MessageConsumer, MessageHandler } from "./consumer.ts";
import { payloadPreview } from "./consumer.ts";

/** Namespaced loggers used across the packages. */
export const logger = {
  client: createDebug("telnet:client"),
  reader: createDebug("telnet:reader"),
  links: createDebug("telnet:links"),
  consumer: createDebug("telnet:consumer"),
};

/**
 * Enable logging for a namespace pattern, e.g. `telnet:*` or
 * `telnet:*,-telnet:reader`. Replaces whatever DEBUG enabled.
 */
export function enableLogging(pattern = "telnet:*"): void {
  createDebug.enable(pattern);
}

export function disableLogging(): void {
  createDebug.disable();
}

export interface LoggingConsumerOptions {
  /**
   * Namespace to log under. Defaults to "telnet:consumer".
   */
  namespace?: string;

  /**
   * Include a preview of the payload in the delivery log. Defaults to true.
   */
  logPayload?: boolean;

  /**
   * Minimum duration (ms) to log an outcome. Faster deliveries are skipped.
   * Defaults to 0 (log all deliveries).
   */
  minDuration?: number;
}

/**
 * Wrap a consumer so each delivery is logged with its outcome and timing.
 *
 * Logs structured objects:
 * - Delivery: `→ deliver N bytes` with `{ type: "deliver", size, payload? }`
 * - Outcome: `← delivered ✓ 1.23ms` or `← delivered ✗ 1.23ms` with
 *   `{ type: "outcome", ok, duration, error? }`
 *
 * Errors from the wrapped consumer are rethrown unchanged.
 *
 * @example
 * ```typescript
 * const consumer = loggingConsumer({ deliver: (payload) => queue.push(payload) });
 * await client.run(consumer, controller.signal);
 * ```
 */
export function loggingConsumer(
  consumer: MessageConsumer,
  options: LoggingConsumerOptions = {},
): MessageConsumer {
  const log = createDebug(options.namespace ?? "telnet:consumer");
  const logPayload = options.logPayload ?? true;
  const minDuration = options.minDuration ?? 0;

  const logOutcome = (start: number, error?: unknown): void => {
    const duration = performance.now() - start;
    if (duration < minDuration || !log.enabled) return;

    const logObj: Record<string, unknown> = {
      type: "outcome",
      ok: error === undefined,
      duration: `${duration.toFixed(2)}ms`,
    };
    if (error === undefined) {
      log(`← delivered ✓ ${duration.toFixed(2)}ms`, logObj);
      return;
    }
    logObj.error =
      error instanceof Error ? { name: error.name, message: error.message } : error;
    log(`← delivered ✗ ${duration.toFixed(2)}ms`, logObj);
  };

  return {
    async deliver(payload: Uint8Array): Promise<void> {
      const start = performance.now();

      if (log.enabled) {
        const logObj: Record<string, unknown> = { type: "deliver", size: payload.length };
        if (logPayload) {
          logObj.payload = payloadPreview(payload);
        }
        log(`→ deliver ${payload.length} bytes`, logObj);
      }

      try {
        await consumer.deliver(payload);
      } catch (error) {
        logOutcome(start, error);
        throw error;
      }
      logOutcome(start);
    },
  };
}

/**
 * A MessageHandler that only logs what it receives. Useful as a sink when
 * running a registry without a real downstream.
 */
export function loggingHandler(namespace = "telnet:handler"): MessageHandler {
  const log = createDebug(namespace);
  return {
    async handleMessage(target: string, message: BrokerMessage): Promise<void> {
      log(`Received message for ${target} - Subject: ${message.subject}, Size: ${message.body.length} bytes`);
      log(`Message payload: ${payloadPreview(message.body)}`);
      if (message.replyTo !== undefined) {
        log(`Reply-to: ${message.replyTo}`);
      }
    },
  };
}
