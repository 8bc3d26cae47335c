// Tests for the Telnet control-sequence filter

import { describe, it, expect } from "vitest";
import { createFilterState, filterTelnet, TelnetFilter } from "./filter.ts";
import { commandName, isNegotiation, TelnetCommand } from "./commands.ts";

function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

function text(s: string): Uint8Array {
  return new TextEncoder().encode(s);
}

describe("filterTelnet", () => {
  it("passes payload without IAC through unchanged", () => {
    const state = createFilterState();
    const input = text("hello, world\r\n");
    expect(filterTelnet(input, state)).toEqual(input);
    expect(state.mode).toBe("normal");
  });

  it("returns empty output for empty input", () => {
    const state = createFilterState();
    expect(filterTelnet(bytes(), state)).toEqual(bytes());
    expect(state.mode).toBe("normal");
  });

  it("drops negotiation sequences", () => {
    for (const verb of [251, 252, 253, 254]) {
      const state = createFilterState();
      expect(filterTelnet(bytes(255, verb, 1), state)).toEqual(bytes());
      expect(state.mode).toBe("normal");
    }
  });

  it("drops a sub-negotiation", () => {
    const state = createFilterState();
    expect(filterTelnet(bytes(255, 250, 1, 2, 3, 255, 240), state)).toEqual(bytes());
    expect(state.mode).toBe("normal");
  });

  it("emits a single 0xFF for IAC IAC", () => {
    const state = createFilterState();
    expect(filterTelnet(bytes(65, 255, 255, 66), state)).toEqual(bytes(65, 255, 66));
  });

  it("drops two-byte commands", () => {
    const state = createFilterState();
    expect(filterTelnet(bytes(65, 255, TelnetCommand.GA, 66, 255, TelnetCommand.NOP), state)).toEqual(
      bytes(65, 66),
    );
  });

  it("keeps payload around control sequences", () => {
    const state = createFilterState();
    const input = bytes(72, 255, 253, 24, 105, 255, 250, 24, 1, 255, 240, 33);
    expect(filterTelnet(input, state)).toEqual(text("Hi!"));
  });

  it("treats IAC IAC inside a sub-negotiation as data, not a terminator", () => {
    const state = createFilterState();
    expect(filterTelnet(bytes(255, 250, 1, 255, 255, 240, 65), state)).toEqual(bytes());
    expect(state.mode).toBe("subnegotiation");
    expect(filterTelnet(bytes(255, 240, 66), state)).toEqual(bytes(66));
  });

  describe("across chunk boundaries", () => {
    it("holds a trailing IAC for the next chunk", () => {
      const state = createFilterState();
      expect(filterTelnet(bytes(65, 255), state)).toEqual(bytes(65));
      expect(state.mode).toBe("command");
      expect(filterTelnet(bytes(255, 66), state)).toEqual(bytes(255, 66));
      expect(state.mode).toBe("normal");
    });

    it("completes a sub-negotiation started in the previous chunk", () => {
      const state = createFilterState();
      expect(filterTelnet(bytes(255), state)).toEqual(bytes());
      expect(filterTelnet(bytes(250, 1, 255, 240), state)).toEqual(bytes());
      expect(state.mode).toBe("normal");
    });

    it("recognizes a terminator split between chunks", () => {
      const state = createFilterState();
      expect(filterTelnet(bytes(255, 250, 31, 0, 80, 255), state)).toEqual(bytes());
      expect(state.mode).toBe("subnegotiation-iac");
      expect(filterTelnet(bytes(240, 79, 75), state)).toEqual(text("OK"));
    });

    it("consumes a negotiation option byte from the next chunk", () => {
      const state = createFilterState();
      expect(filterTelnet(bytes(65, 255, 251), state)).toEqual(bytes(65));
      expect(state.mode).toBe("option");
      expect(filterTelnet(bytes(1, 66), state)).toEqual(bytes(66));
    });

    it("produces the same output as a single call for every split point", () => {
      const input = bytes(65, 255, 251, 1, 66, 255, 250, 24, 0, 255, 240, 255, 255, 67, 255, 249, 68);
      const whole = filterTelnet(input, createFilterState());
      expect(whole).toEqual(bytes(65, 66, 255, 67, 68));

      for (let split = 0; split <= input.length; split++) {
        const state = createFilterState();
        const first = filterTelnet(input.subarray(0, split), state);
        const second = filterTelnet(input.subarray(split), state);
        expect(Uint8Array.from([...first, ...second])).toEqual(whole);
      }
    });
  });
});

describe("TelnetFilter", () => {
  it("threads state between pushes", () => {
    const filter = new TelnetFilter();
    expect(filter.push(bytes(65, 255))).toEqual(bytes(65));
    expect(filter.push(bytes(251, 1, 66))).toEqual(bytes(66));
    expect(filter.mode).toBe("normal");
  });

  it("forgets a partial sequence on reset", () => {
    const filter = new TelnetFilter();
    filter.push(bytes(255, 250, 1));
    expect(filter.mode).toBe("subnegotiation");
    filter.reset();
    expect(filter.mode).toBe("normal");
    expect(filter.push(text("ok"))).toEqual(text("ok"));
  });
});

describe("commands", () => {
  it("classifies negotiation verbs", () => {
    expect(isNegotiation(TelnetCommand.WILL)).toBe(true);
    expect(isNegotiation(TelnetCommand.DONT)).toBe(true);
    expect(isNegotiation(TelnetCommand.SB)).toBe(false);
    expect(isNegotiation(TelnetCommand.IAC)).toBe(false);
  });

  it("names command bytes", () => {
    expect(commandName(253)).toBe("DO");
    expect(commandName(240)).toBe("SE");
    expect(commandName(7)).toBe("0x07");
  });
});
