// Telnet control-sequence filter.
//
// Strips IAC sequences from a byte stream and keeps the application payload.
// The filter state is carried between chunks, so a sequence split across two
// socket reads is still recognized.

import { TelnetCommand, isNegotiation } from "./commands.ts";

const { IAC, SB, SE } = TelnetCommand;

/**
 * Where the filter is inside a control sequence.
 *
 * - `normal`: copying payload bytes.
 * - `command`: saw IAC, waiting for the command byte.
 * - `option`: saw IAC WILL/WONT/DO/DONT, waiting for the option byte.
 * - `subnegotiation`: inside IAC SB ..., dropping bytes.
 * - `subnegotiation-iac`: saw IAC inside a sub-negotiation, waiting to see
 *   whether it is the SE terminator.
 */
export type FilterMode = "normal" | "command" | "option" | "subnegotiation" | "subnegotiation-iac";

/** Mutable filter state, one per connection. */
export interface FilterState {
  mode: FilterMode;
}

export function createFilterState(): FilterState {
  return { mode: "normal" };
}

/**
 * Remove Telnet control sequences from `data`, returning the payload bytes.
 *
 * `state` is updated in place and must be passed to the next call for the
 * same connection.
 */
export function filterTelnet(data: Uint8Array, state: FilterState): Uint8Array {
  const out = new Uint8Array(data.length);
  let n = 0;
  let mode = state.mode;

  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    switch (mode) {
      case "normal":
        if (byte === IAC) {
          mode = "command";
        } else {
          out[n++] = byte;
        }
        break;

      case "command":
        if (byte === IAC) {
          // Escaped 0xFF
          out[n++] = IAC;
          mode = "normal";
        } else if (isNegotiation(byte)) {
          mode = "option";
        } else if (byte === SB) {
          mode = "subnegotiation";
        } else {
          mode = "normal";
        }
        break;

      case "option":
        mode = "normal";
        break;

      case "subnegotiation":
        if (byte === IAC) {
          mode = "subnegotiation-iac";
        }
        break;

      case "subnegotiation-iac":
        mode = byte === SE ? "normal" : "subnegotiation";
        break;
    }
  }

  state.mode = mode;
  return out.subarray(0, n);
}

/**
 * Stateful filter for one connection.
 *
 * @example
 * ```typescript
 * const filter = new TelnetFilter();
 * filter.push(new Uint8Array([65, 255])); // [65]
 * filter.push(new Uint8Array([251, 1, 66])); // [66]
 * ```
 */
export class TelnetFilter {
  private state: FilterState = createFilterState();

  /** Current mode; `normal` when no sequence is pending. */
  get mode(): FilterMode {
    return this.state.mode;
  }

  /** Filter the next chunk of the stream. */
  push(chunk: Uint8Array): Uint8Array {
    return filterTelnet(chunk, this.state);
  }

  /** Drop any partial sequence. */
  reset(): void {
    this.state = createFilterState();
  }
}
