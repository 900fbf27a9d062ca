import { beforeEach, describe, expect, test } from "vitest";
import { ConnectionKey } from "../core/connection-key.js";
import { SendError } from "../errors.js";
import { MemorySession } from "../test-utils.js";
import { createReplicationContext, type ReplicationContext } from "./context.js";

describe("ConnectionRegistry", () => {
  let context: ReplicationContext;
  const health = { entity: 1, name: "health" };

  beforeEach(() => {
    context = createReplicationContext();
  });

  describe("register", () => {
    test("should hand out distinct keys", () => {
      const a = context.connections.register(new MemorySession());
      const b = context.connections.register(new MemorySession());

      expect(a.equals(b)).toBe(false);
      expect(context.connections.size).toBe(2);
      expect(context.connections.keys()).toEqual([a, b]);
    });

    test("should refuse closed sessions", () => {
      const session = new MemorySession({ remote: "gone" });
      session.close();

      expect(() => context.connections.register(session)).toThrow(
        "[ConnectionRegistry] Cannot register closed stream session gone",
      );
    });

    test("should reuse a freed slot with a bumped generation", () => {
      const first = context.connections.register(new MemorySession());
      context.connections.deregister(first);
      const second = context.connections.register(new MemorySession());

      expect(second.slot).toBe(first.slot);
      expect(second.generation).toBe(first.generation + 1);
      expect(context.connections.isLive(first)).toBe(false);
      expect(context.connections.isLive(second)).toBe(true);
    });
  });

  describe("deregister", () => {
    test("should close the session and drop its subscriptions", () => {
      const session = new MemorySession();
      const key = context.connections.register(session);
      context.subscriptions.subscribe(health, key);

      expect(context.connections.deregister(key)).toBe(true);
      expect(session.isOpen()).toBe(false);
      expect(context.subscriptions.subscribersOf(health)).toEqual([]);
      expect(context.connections.size).toBe(0);
    });

    test("should return false for stale keys", () => {
      const key = context.connections.register(new MemorySession());
      context.connections.deregister(key);

      expect(context.connections.deregister(key)).toBe(false);
      expect(context.connections.deregister(new ConnectionKey(42, 0))).toBe(false);
    });

    test("should run when the session closes on its own", () => {
      const session = new MemorySession();
      const key = context.connections.register(session);

      session.close();

      expect(context.connections.isLive(key)).toBe(false);
      expect(context.connections.get(key)).toBeUndefined();
    });
  });

  describe("deliver", () => {
    test("should encode and send the message", () => {
      const session = new MemorySession();
      const key = context.connections.register(session);

      context.connections.deliver(key, { type: "removed", entity: 4, property: "hull" });

      expect(session.messages()).toEqual([{ type: "removed", entity: 4, property: "hull" }]);
    });

    test("should be a silent no-op for a key deregistered just before", () => {
      const session = new MemorySession();
      const key = context.connections.register(session);
      context.connections.deregister(key);

      expect(() => context.connections.deliver(key, { type: "removed", entity: 1, property: "health" })).not.toThrow();
      expect(session.sent).toHaveLength(0);
    });

    test("should never reach the new occupant of a recycled slot", () => {
      const stale = context.connections.register(new MemorySession());
      context.connections.deregister(stale);
      const current = new MemorySession();
      context.connections.register(current);

      context.connections.deliver(stale, { type: "removed", entity: 1, property: "health" });

      expect(current.sent).toHaveLength(0);
    });

    test("should reject messages above the session's packet limit", () => {
      const session = new MemorySession({ maxPacketLen: 16 });
      const key = context.connections.register(session);

      expect(() => context.connections.deliver(key, { type: "removed", entity: 1, property: "health" })).toThrow(
        SendError,
      );
      expect(session.sent).toHaveLength(0);
      expect(context.connections.isLive(key)).toBe(true);
    });

    test("should wrap transport failures in SendError", () => {
      const session = new MemorySession();
      const key = context.connections.register(session);
      session.failNextSend = new Error("EPIPE");

      expect(() => context.connections.deliver(key, { type: "removed", entity: 1, property: "health" })).toThrow(
        `[ConnectionRegistry] Delivery to ${key.toString()} failed: EPIPE`,
      );
    });

    test("should deregister a session found closed during delivery", () => {
      const session = new MemorySession();
      const key = context.connections.register(session);
      const sendPacket = session.sendPacket.bind(session);
      session.sendPacket = (data) => {
        session.close();
        sendPacket(data);
      };

      expect(() => context.connections.deliver(key, { type: "removed", entity: 1, property: "health" })).toThrow(
        SendError,
      );
      expect(context.connections.isLive(key)).toBe(false);
    });
  });
});
