import superjson from "superjson";
import { describe, expect, test } from "vitest";
import { integer, list, record, scalar, text } from "./core/encodable.js";
import { decodeClientMessage, decodeServerMessage, encodeMessage } from "./protocol.js";

const encodeRaw = (value: unknown): Uint8Array => new TextEncoder().encode(superjson.stringify(value));

describe("Wire protocol", () => {
  describe("decodeClientMessage", () => {
    test("should decode every request type", () => {
      expect(decodeClientMessage(encodeMessage({ type: "subscribe", entity: 1, property: "hull" }))).toEqual({
        type: "subscribe",
        entity: 1,
        property: "hull",
      });
      expect(decodeClientMessage(encodeMessage({ type: "unsubscribe", entity: 1, property: "hull" }))).toEqual({
        type: "unsubscribe",
        entity: 1,
        property: "hull",
      });
    });

    test("should preserve 64-bit integers in set requests", () => {
      const value = record({ score: integer(9007199254740993n), trail: list([scalar(0.5), text("a")]) });
      const decoded = decodeClientMessage(encodeMessage({ type: "set", entity: 3, property: "stats", value }));

      expect(decoded).toEqual({ type: "set", entity: 3, property: "stats", value });
    });

    test("should drop unknown fields", () => {
      const decoded = decodeClientMessage(encodeRaw({ type: "subscribe", entity: 2, property: "hull", admin: true }));
      expect(decoded).toEqual({ type: "subscribe", entity: 2, property: "hull" });
    });

    test("should return null for malformed input", () => {
      expect(decodeClientMessage(new Uint8Array([0xff, 0xfe]))).toBeNull();
      expect(decodeClientMessage(new TextEncoder().encode("not json"))).toBeNull();
      expect(decodeClientMessage(encodeRaw(["subscribe", 1, "hull"]))).toBeNull();
      expect(decodeClientMessage(encodeRaw({ type: "subscribe", entity: "1", property: "hull" }))).toBeNull();
      expect(decodeClientMessage(encodeRaw({ type: "subscribe", entity: 1, property: "" }))).toBeNull();
      expect(decodeClientMessage(encodeRaw({ type: "set", entity: 1, property: "hull", value: 5 }))).toBeNull();
      expect(decodeClientMessage(encodeRaw({ type: "update", entity: 1, property: "hull" }))).toBeNull();
    });
  });

  describe("decodeServerMessage", () => {
    test("should decode notifications", () => {
      expect(
        decodeServerMessage(encodeMessage({ type: "update", entity: 1, property: "hull", value: integer(3) })),
      ).toEqual({ type: "update", entity: 1, property: "hull", value: integer(3) });
      expect(decodeServerMessage(encodeMessage({ type: "removed", entity: 1, property: "hull" }))).toEqual({
        type: "removed",
        entity: 1,
        property: "hull",
      });
    });

    test("should decode errors with and without a target", () => {
      expect(decodeServerMessage(encodeMessage({ type: "error", code: "malformed", message: "bad" }))).toEqual({
        type: "error",
        code: "malformed",
        message: "bad",
      });
      expect(
        decodeServerMessage(
          encodeMessage({ type: "error", code: "read-only", message: "no", entity: 2, property: "uptime" }),
        ),
      ).toEqual({ type: "error", code: "read-only", message: "no", entity: 2, property: "uptime" });
    });

    test("should reject unknown error codes", () => {
      expect(decodeServerMessage(encodeRaw({ type: "error", code: "teapot", message: "x" }))).toBeNull();
    });
  });
});
