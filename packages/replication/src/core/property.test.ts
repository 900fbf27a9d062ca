import { beforeEach, describe, expect, test, vi } from "vitest";
import { InvalidValueError, PropertyGoneError, SendError, SubscriptionError } from "../errors.js";
import { createReplicationContext, type ReplicationContext } from "../server/context.js";
import { MemorySession } from "../test-utils.js";
import { integerCodec, vectorCodec } from "./codecs.js";
import type { ConnectionKey } from "./connection-key.js";
import { integer, scalar, text } from "./encodable.js";
import { ReplicatedProperty, cell, type PropertyBinding } from "./property.js";

describe("ReplicatedProperty", () => {
  let context: ReplicationContext;
  let property: ReplicatedProperty<bigint>;

  beforeEach(() => {
    context = createReplicationContext();
    property = new ReplicatedProperty(context, {
      id: { entity: 1, name: "health" },
      codec: integerCodec({ min: 0n, max: 100n }),
      binding: cell(100n),
    });
  });

  const connect = (): { key: ConnectionKey; session: MemorySession } => {
    const session = new MemorySession();
    return { key: context.connections.register(session), session };
  };

  describe("getValue / setValue", () => {
    test("should expose the current value as an Encodable", () => {
      expect(property.getValue()).toEqual(integer(100));
      expect(property.read()).toBe(100n);
    });

    test("should store valid values", () => {
      property.setValue(integer(40));
      expect(property.getValue()).toEqual(integer(40));
    });

    test("should leave the value unchanged and throw InvalidValueError on out-of-range input", () => {
      property.setValue(integer(70));

      expect(() => property.setValue(integer(101))).toThrow(InvalidValueError);
      expect(() => property.setValue(text("full"))).toThrow(
        '[Property] 1.health expects integer[0, 100], got text("full")',
      );
      expect(property.getValue()).toEqual(integer(70));
    });

    test("should read and write through the binding", () => {
      const state = { position: { x: 0, y: 0 } };
      const binding: PropertyBinding<{ x: number; y: number }> = {
        get: () => state.position,
        set: (value) => {
          state.position = value;
        },
      };
      const position = new ReplicatedProperty(context, {
        id: { entity: 2, name: "position" },
        codec: vectorCodec,
        binding,
      });

      position.update({ x: 3, y: 4 });
      expect(state.position).toEqual({ x: 3, y: 4 });

      state.position = { x: 5, y: 6 };
      expect(position.getValue()).toEqual({ kind: "record", fields: { x: scalar(5), y: scalar(6) } });
    });

    test("should default to not remotely writable", () => {
      expect(property.remoteWritable).toBe(false);
    });
  });

  describe("notifications", () => {
    test("should send one update per subscriber per set", () => {
      const a = connect();
      const b = connect();
      property.subscribe(a.key);
      property.subscribe(b.key);

      property.setValue(integer(50));

      const expected = { type: "update", entity: 1, property: "health", value: integer(50) };
      expect(a.session.messages()).toEqual([expected]);
      expect(b.session.messages()).toEqual([expected]);
    });

    test("should deliver exactly once after subscribing twice", () => {
      const a = connect();
      property.subscribe(a.key);
      property.subscribe(a.key);

      property.setValue(integer(10));

      expect(a.session.sent).toHaveLength(1);
    });

    test("should stop delivering after unsubscribe", () => {
      const a = connect();
      property.subscribe(a.key);
      property.setValue(integer(1));
      property.unsubscribe(a.key);
      property.setValue(integer(2));
      property.setValue(integer(3));

      expect(a.session.messages()).toEqual([{ type: "update", entity: 1, property: "health", value: integer(1) }]);
    });

    test("should refuse a connection that has already been deregistered", () => {
      const a = connect();
      context.connections.deregister(a.key);

      expect(() => property.subscribe(a.key)).toThrow(SubscriptionError);
      expect(context.subscriptions.size).toBe(0);
      expect(context.subscriptions.subscribersOf(property.id)).toEqual([]);
    });

    test("should treat unsubscribing an absent key as a no-op", () => {
      const a = connect();
      expect(() => property.unsubscribe(a.key)).not.toThrow();
      expect(context.subscriptions.size).toBe(0);
    });

    test("should deliver successive values in set order", () => {
      const a = connect();
      property.subscribe(a.key);
      for (const value of [1, 2, 3]) {
        property.setValue(integer(value));
      }

      expect(a.session.messages().map((message) => (message.type === "update" ? message.value : null))).toEqual([
        integer(1),
        integer(2),
        integer(3),
      ]);
    });

    test("should notify subscribers in subscription order", () => {
      const order: string[] = [];
      const sessions = ["first", "second", "third"].map((remote) => {
        const session = new MemorySession({ remote });
        const send = session.sendPacket.bind(session);
        session.sendPacket = (data) => {
          order.push(remote);
          send(data);
        };
        return session;
      });
      const keys = sessions.map((session) => context.connections.register(session));
      for (const key of [keys[2], keys[0], keys[1]]) {
        if (key) property.subscribe(key);
      }

      property.setValue(integer(5));

      expect(order).toEqual(["third", "first", "second"]);
    });

    test("should keep notifying others when one delivery fails", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const a = connect();
      const b = connect();
      property.subscribe(a.key);
      property.subscribe(b.key);
      a.session.failNextSend = new SendError("link down");

      property.setValue(integer(60));

      expect(a.session.sent).toHaveLength(0);
      expect(b.session.sent).toHaveLength(1);
      expect(warn).toHaveBeenCalledWith(
        `[Property] Failed to notify ${a.key.toString()} about 1.health: link down`,
      );
      warn.mockRestore();
    });

    test("should skip subscribers whose connection is gone", () => {
      const a = connect();
      property.subscribe(a.key);
      a.session.close();

      property.setValue(integer(20));

      expect(a.session.sent).toHaveLength(0);
      expect(context.subscriptions.size).toBe(0);
    });
  });

  describe("finalize", () => {
    test("should make every later access report PropertyGone", () => {
      const a = connect();
      property.finalize();

      expect(property.finalized).toBe(true);
      expect(() => property.getValue()).toThrow(PropertyGoneError);
      expect(() => property.setValue(integer(1))).toThrow(PropertyGoneError);
      expect(() => property.subscribe(a.key)).toThrow("[Property] 1.health has been finalized");
      expect(() => property.unsubscribe(a.key)).not.toThrow();
    });

    test("should notify subscribers of the removal and drop them", () => {
      const a = connect();
      property.subscribe(a.key);

      property.finalize();
      property.finalize();

      expect(a.session.messages()).toEqual([{ type: "removed", entity: 1, property: "health" }]);
      expect(context.subscriptions.subscriptionsOf(a.key)).toEqual([]);
    });
  });
});
