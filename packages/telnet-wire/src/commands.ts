/**
 * Telnet command bytes (RFC 854).
 *
 * Every command is introduced by IAC. WILL/WONT/DO/DONT carry one option
 * byte, SB opens a sub-negotiation that runs until IAC SE, and the rest are
 * two-byte commands.
 */

export const TelnetCommand = {
  /** End of sub-negotiation. */
  SE: 240,
  /** No operation. */
  NOP: 241,
  /** Data mark. */
  DM: 242,
  /** Break. */
  BRK: 243,
  /** Interrupt process. */
  IP: 244,
  /** Abort output. */
  AO: 245,
  /** Are you there. */
  AYT: 246,
  /** Erase character. */
  EC: 247,
  /** Erase line. */
  EL: 248,
  /** Go ahead. */
  GA: 249,
  /** Start of sub-negotiation. */
  SB: 250,
  WILL: 251,
  WONT: 252,
  DO: 253,
  DONT: 254,
  /** Interpret as command. */
  IAC: 255,
} as const;

export type TelnetCommand = (typeof TelnetCommand)[keyof typeof TelnetCommand];

/**
 * Check whether a byte is one of the option negotiation verbs, which take
 * exactly one option byte.
 */
export function isNegotiation(byte: number): boolean {
  return byte >= TelnetCommand.WILL && byte <= TelnetCommand.DONT;
}

const NAMES = new Map<number, string>(
  Object.entries(TelnetCommand).map(([name, value]) => [value, name]),
);

/** Human-readable name for a command byte, for log output. */
export function commandName(byte: number): string {
  return NAMES.get(byte) ?? `0x${byte.toString(16).padStart(2, "0")}`;
}
