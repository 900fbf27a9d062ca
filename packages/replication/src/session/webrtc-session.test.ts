import { describe, expect, test, vi } from "vitest";
import { NotImplementedError } from "../errors.js";
import { WebrtcSession, WebrtcSessionBuilder } from "./webrtc-session.js";

describe("WebRTC transport", () => {
  test("build should fail with NotImplementedError", () => {
    const builder = new WebrtcSessionBuilder();

    expect(() => builder.build(() => {})).toThrow(NotImplementedError);
    expect(builder.state).toBe("failed");
  });

  test("NotImplementedError should carry its own code", () => {
    const builder = new WebrtcSessionBuilder();
    try {
      builder.build(() => {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NotImplementedError);
      if (!(error instanceof NotImplementedError)) return;
      expect(error.code).toBe("not-implemented");
      expect(error.message).toBe("[WebrtcSessionBuilder] build() not implemented");
    }
  });

  test("session should refuse to send", () => {
    const session = new WebrtcSession("peer-1");
    expect(() => session.sendPacket()).toThrow("[WebrtcSession] sendPacket() not implemented");
  });

  test("maxPacketLen should warn and return 1200", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const session = new WebrtcSession("peer-1");

    expect(session.maxPacketLen()).toBe(1200);
    expect(warn).toHaveBeenCalledWith(
      "[WebrtcSession] Returning max WebRTC message length as 1200, but in practice it's likely lower",
    );
    warn.mockRestore();
  });

  test("close should fire close handlers once", () => {
    const session = new WebrtcSession("peer-1");
    const handler = vi.fn();
    session.onClose(handler);

    session.close();
    session.close();

    expect(session.isOpen()).toBe(false);
    expect(handler).toHaveBeenCalledTimes(1);
  });
});
