// @telnet-relay/core - configuration, backoff, errors and delivery types
// shared by the telnet-relay packages.

export {
  type ClientConfig,
  type ClientConfigInput,
  type LinkValues,
  createClientConfig,
  clientConfigFromValues,
  configAddress,
  DEFAULT_PORT,
  DEFAULT_MAX_RECONNECT_ATTEMPTS,
  DEFAULT_INITIAL_BACKOFF_MS,
  DEFAULT_MAX_BACKOFF_MS,
  DEFAULT_MAX_MESSAGE_SIZE,
  MAX_TIMER_DELAY_MS,
} from "./config.ts";

export { Backoff } from "./backoff.ts";

export { ConnectionError, ReconnectExhaustedError, ConfigError, toError } from "./errors.ts";

export {
  type MessageConsumer,
  type DeliverFn,
  type BrokerMessage,
  type MessageHandler,
  toConsumer,
  brokerMessage,
  payloadPreview,
} from "./consumer.ts";

export {
  logger,
  enableLogging,
  disableLogging,
  loggingConsumer,
  loggingHandler,
  type LoggingConsumerOptions,
} from "./logging.ts";
