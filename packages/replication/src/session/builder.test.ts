import { describe, expect, test, vi } from "vitest";
import { BuildError } from "../errors.js";
import { FailingSessionBuilder, MemorySessionBuilder } from "../test-utils.js";
import { CloseSignal } from "./builder.js";

describe("OneShotSessionBuilder", () => {
  test("should build once and refuse a second build", () => {
    const builder = new MemorySessionBuilder();
    expect(builder.state).toBe("negotiating");

    const session = builder.build(() => {});

    expect(session).toBe(builder.session);
    expect(builder.state).toBe("built");
    expect(() => builder.build(() => {})).toThrow("[SessionBuilder] stream builder already built");
  });

  test("should wrap negotiation failures in BuildError", () => {
    const builder = new FailingSessionBuilder();

    expect(() => builder.build(() => {})).toThrow(BuildError);
    expect(builder.state).toBe("failed");
    expect(() => builder.build(() => {})).toThrow("[SessionBuilder] stream builder already failed");
  });

  test("should keep the cause of a failed negotiation", () => {
    const builder = new FailingSessionBuilder();
    try {
      builder.build(() => {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(BuildError);
      if (!(error instanceof BuildError)) return;
      expect(error.message).toBe("[SessionBuilder] stream negotiation failed: handshake rejected");
      expect(error.code).toBe("build-failed");
      expect(error.cause).toBeInstanceOf(Error);
    }
  });
});

describe("CloseSignal", () => {
  test("should run handlers exactly once", () => {
    const signal = new CloseSignal();
    const handler = vi.fn();
    signal.add(handler);

    signal.fire();
    signal.fire();

    expect(signal.closed).toBe(true);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  test("should run late handlers immediately", () => {
    const signal = new CloseSignal();
    signal.fire();
    const handler = vi.fn();

    signal.add(handler);

    expect(handler).toHaveBeenCalledTimes(1);
  });
});
