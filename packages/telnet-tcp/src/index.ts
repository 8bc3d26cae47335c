// @telnet-relay/tcp - reconnecting Telnet client over TCP (Node.js only)
//
// Provides the socket reader, the TCP dialer, the reconnecting client and
// the per-component link registry.

export { SocketReader, READ_BUFFER_SIZE, type ByteStream } from "./reader.ts";
export { tcpDialer, type Dialer, type TcpDialerOptions } from "./dialer.ts";
export {
  TelnetClient,
  ClientBusyError,
  startClient,
  type ClientState,
  type ClientOutcome,
  type RunningClient,
  type Sleep,
  type BackoffReset,
  type TelnetClientOptions,
} from "./client.ts";
export { LinkRegistry, ForwardingConsumer, type LinkRegistryOptions } from "./links.ts";

// Re-export core and wire types for convenience
export {
  type ClientConfig,
  type MessageConsumer,
  type MessageHandler,
  type BrokerMessage,
  createClientConfig,
  clientConfigFromValues,
  ConnectionError,
  ReconnectExhaustedError,
  ConfigError,
  loggingConsumer,
  loggingHandler,
  enableLogging,
} from "@telnet-relay/core";
export { TelnetFilter, filterTelnet, createFilterState } from "@telnet-relay/wire";
