// Tests for delivery logging

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import createDebug from "debug";
import { disableLogging, enableLogging, loggingConsumer, loggingHandler } from "./logging.ts";

describe("loggingConsumer", () => {
  let lines: unknown[][] = [];
  const originalLog = createDebug.log;

  beforeEach(() => {
    lines = [];
    createDebug.log = (...args: unknown[]) => {
      lines.push(args);
    };
    enableLogging("telnet:*");
  });

  afterEach(() => {
    createDebug.log = originalLog;
    disableLogging();
  });

  it("logs the delivery and its outcome", async () => {
    const inner = { deliver: vi.fn() };
    const consumer = loggingConsumer(inner);

    await consumer.deliver(new TextEncoder().encode("hello"));

    expect(inner.deliver).toHaveBeenCalledTimes(1);
    expect(lines).toHaveLength(2);
    expect(String(lines[0][0])).toContain("→ deliver 5 bytes");
    expect(lines[0][1]).toEqual({ type: "deliver", size: 5, payload: "hello" });
    expect(String(lines[1][0])).toContain("← delivered ✓");
    expect(lines[1][1]).toMatchObject({ type: "outcome", ok: true });
  });

  it("omits the payload when disabled", async () => {
    const consumer = loggingConsumer({ deliver: vi.fn() }, { logPayload: false });
    await consumer.deliver(new Uint8Array([1, 2]));
    expect(lines[0][1]).toEqual({ type: "deliver", size: 2 });
  });

  it("logs and rethrows delivery errors", async () => {
    const error = new Error("handler down");
    const consumer = loggingConsumer({
      deliver: () => {
        throw error;
      },
    });

    await expect(consumer.deliver(new Uint8Array([1]))).rejects.toBe(error);
    expect(String(lines[1][0])).toContain("← delivered ✗");
    expect(lines[1][1]).toMatchObject({
      ok: false,
      error: { name: "Error", message: "handler down" },
    });
  });

  it("skips fast outcomes when minDuration is set", async () => {
    const consumer = loggingConsumer({ deliver: vi.fn() }, { minDuration: 60_000 });
    await consumer.deliver(new Uint8Array([1]));
    expect(lines).toHaveLength(1);
  });

  it("logs nothing when the namespace is disabled", async () => {
    enableLogging("other:*");
    const inner = { deliver: vi.fn() };
    await loggingConsumer(inner).deliver(new Uint8Array([1]));
    expect(inner.deliver).toHaveBeenCalledTimes(1);
    expect(lines).toHaveLength(0);
  });

  it("respects a custom namespace", async () => {
    enableLogging("relay:out");
    await loggingConsumer({ deliver: vi.fn() }, { namespace: "relay:out" }).deliver(new Uint8Array([1]));
    expect(lines).toHaveLength(2);
  });
});

describe("loggingHandler", () => {
  let lines: unknown[][] = [];
  const originalLog = createDebug.log;

  beforeEach(() => {
    lines = [];
    createDebug.log = (...args: unknown[]) => {
      lines.push(args);
    };
    enableLogging("telnet:handler");
  });

  afterEach(() => {
    createDebug.log = originalLog;
    disableLogging();
  });

  it("logs subject, size and preview", async () => {
    await loggingHandler().handleMessage("component-a", {
      subject: "telnet.localhost:23",
      body: new TextEncoder().encode("ready"),
      replyTo: "inbox.1",
    });
    expect(lines).toHaveLength(3);
    expect(String(lines[0][0])).toContain(
      "Received message for component-a - Subject: telnet.localhost:23, Size: 5 bytes",
    );
    expect(String(lines[1][0])).toContain("Message payload: ready");
    expect(String(lines[2][0])).toContain("Reply-to: inbox.1");
  });
});
