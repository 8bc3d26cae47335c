// Client configuration.
//
// A ClientConfig is built once per link and never mutated. Links arrive as
// string maps; clientConfigFromValues turns one into a config, falling back
// to defaults for values that are missing or malformed.

import { z } from "zod";
import { ConfigError } from "./errors.ts";

/** Configuration for one reconnecting Telnet client. */
export interface ClientConfig {
  /** Telnet server host. */
  readonly host: string;
  /** Telnet server port. */
  readonly port: number;
  /** Reconnection attempts before giving up; 0 retries forever. */
  readonly maxReconnectAttempts: number;
  /** Delay before the first reconnection attempt, in milliseconds. */
  readonly initialBackoffMs: number;
  /** Upper bound for the reconnection delay, in milliseconds. */
  readonly maxBackoffMs: number;
  /** Payloads longer than this many bytes are dropped. */
  readonly maxMessageSizeBytes: number;
}

export const DEFAULT_PORT = 23;
export const DEFAULT_MAX_RECONNECT_ATTEMPTS = 0;
export const DEFAULT_INITIAL_BACKOFF_MS = 1000;
export const DEFAULT_MAX_BACKOFF_MS = 60_000;
export const DEFAULT_MAX_MESSAGE_SIZE = 1024 * 1024;

/** Longest delay a Node.js timer can wait; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const MISSING_HOST = "Missing required config: telnet_host";

const U16_MAX = 0xffff;
const U32_MAX = 0xffff_ffff;

const count = (max: number) => z.number().int().min(0).max(max);

const clientConfigSchema = z.object({
  host: z.string().min(1, "host must not be empty"),
  port: count(U16_MAX).default(DEFAULT_PORT),
  maxReconnectAttempts: count(U32_MAX).default(DEFAULT_MAX_RECONNECT_ATTEMPTS),
  initialBackoffMs: count(MAX_TIMER_DELAY_MS).default(DEFAULT_INITIAL_BACKOFF_MS),
  maxBackoffMs: count(MAX_TIMER_DELAY_MS).default(DEFAULT_MAX_BACKOFF_MS),
  maxMessageSizeBytes: count(Number.MAX_SAFE_INTEGER).default(DEFAULT_MAX_MESSAGE_SIZE),
});

export type ClientConfigInput = z.input<typeof clientConfigSchema>;

/**
 * Build a ClientConfig, filling in defaults.
 *
 * Throws ConfigError if a field is out of range.
 */
export function createClientConfig(input: ClientConfigInput): ClientConfig {
  const parsed = clientConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return Object.freeze(parsed.data);
}

/** `host:port` for log lines and message subjects. */
export function configAddress(config: ClientConfig): string {
  return `${config.host}:${config.port}`;
}

// Link values are strings. Anything that is not a plain unsigned integer in
// range becomes undefined, and the field takes its default.
const unsigned = (max: number, fallback: number) =>
  z
    .preprocess(
      (value) => (typeof value === "string" && /^\d+$/.test(value) ? Number(value) : undefined),
      count(max),
    )
    .catch(fallback);

const linkValuesSchema = z.object({
  telnet_host: z.string({ required_error: MISSING_HOST }).min(1, MISSING_HOST),
  telnet_port: unsigned(U16_MAX, DEFAULT_PORT),
  max_reconnect_attempts: unsigned(U32_MAX, DEFAULT_MAX_RECONNECT_ATTEMPTS),
  initial_reconnect_delay_ms: unsigned(MAX_TIMER_DELAY_MS, DEFAULT_INITIAL_BACKOFF_MS),
  max_reconnect_delay_ms: unsigned(MAX_TIMER_DELAY_MS, DEFAULT_MAX_BACKOFF_MS),
  max_message_size: unsigned(Number.MAX_SAFE_INTEGER, DEFAULT_MAX_MESSAGE_SIZE),
});

/** Raw link configuration, as supplied by the host. */
export type LinkValues = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

/**
 * Parse a link's string values into a ClientConfig.
 *
 * Recognized keys: `telnet_host` (required), `telnet_port`,
 * `max_reconnect_attempts`, `initial_reconnect_delay_ms`,
 * `max_reconnect_delay_ms`, `max_message_size`.
 */
export function clientConfigFromValues(values: LinkValues): ClientConfig {
  const record = values instanceof Map ? Object.fromEntries(values) : values;
  const parsed = linkValuesSchema.safeParse(record);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error, false));
  }
  const link = parsed.data;
  return createClientConfig({
    host: link.telnet_host,
    port: link.telnet_port,
    maxReconnectAttempts: link.max_reconnect_attempts,
    initialBackoffMs: link.initial_reconnect_delay_ms,
    maxBackoffMs: link.max_reconnect_delay_ms,
    maxMessageSizeBytes: link.max_message_size,
  });
}

function formatIssues(error: z.ZodError, withPath = true): string {
  return error.issues
    .map((issue) =>
      withPath && issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}
