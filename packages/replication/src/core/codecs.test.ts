import { describe, expect, test } from "vitest";
import { booleanCodec, integerCodec, listCodec, scalarCodec, textCodec, vectorCodec } from "./codecs.js";
import { NULL, boolean, integer, list, record, scalar, text } from "./encodable.js";

describe("Value codecs", () => {
  test("booleanCodec should only accept booleans", () => {
    expect(booleanCodec.decode(boolean(true))).toBe(true);
    expect(booleanCodec.decode(integer(1))).toBeUndefined();
  });

  describe("integerCodec", () => {
    test("should enforce the range inclusively", () => {
      const codec = integerCodec({ min: 0n, max: 10n });
      expect(codec.kind).toBe("integer[0, 10]");
      expect(codec.decode(integer(0))).toBe(0n);
      expect(codec.decode(integer(10))).toBe(10n);
      expect(codec.decode(integer(11))).toBeUndefined();
      expect(codec.decode(integer(-1))).toBeUndefined();
    });

    test("should describe open ranges", () => {
      expect(integerCodec().kind).toBe("integer");
      expect(integerCodec({ min: 1n }).kind).toBe("integer[1, +inf]");
      expect(integerCodec({ max: 5n }).kind).toBe("integer[-inf, 5]");
    });

    test("should reject other kinds", () => {
      expect(integerCodec().decode(scalar(1))).toBeUndefined();
    });
  });

  test("scalarCodec should enforce the range", () => {
    const codec = scalarCodec({ min: -1, max: 1 });
    expect(codec.kind).toBe("scalar[-1, 1]");
    expect(codec.decode(scalar(0.5))).toBe(0.5);
    expect(codec.decode(scalar(1.5))).toBeUndefined();
    expect(codec.decode(integer(0))).toBeUndefined();
  });

  test("textCodec should enforce maxLength", () => {
    const codec = textCodec({ maxLength: 3 });
    expect(codec.kind).toBe("text(<= 3 chars)");
    expect(codec.decode(text("abc"))).toBe("abc");
    expect(codec.decode(text("abcd"))).toBeUndefined();
  });

  describe("vectorCodec", () => {
    test("should encode as an {x, y} record", () => {
      expect(vectorCodec.encode({ x: 1, y: -2 })).toEqual(record({ x: scalar(1), y: scalar(-2) }));
    });

    test("should reject missing or extra fields", () => {
      expect(vectorCodec.decode(record({ x: scalar(1) }))).toBeUndefined();
      expect(vectorCodec.decode(record({ x: scalar(1), y: scalar(2), z: scalar(3) }))).toBeUndefined();
      expect(vectorCodec.decode(record({ x: scalar(1), y: text("2") }))).toBeUndefined();
      expect(vectorCodec.decode(record({ x: scalar(3), y: scalar(4) }))).toEqual({ x: 3, y: 4 });
    });
  });

  describe("listCodec", () => {
    const codec = listCodec(integerCodec({ min: 0n }), { maxLength: 2 });

    test("should describe its element kind", () => {
      expect(codec.kind).toBe("list<integer[0, +inf]>");
    });

    test("should decode every element", () => {
      expect(codec.decode(list([integer(1), integer(2)]))).toEqual([1n, 2n]);
    });

    test("should reject the list if one element is invalid", () => {
      expect(codec.decode(list([integer(1), integer(-2)]))).toBeUndefined();
      expect(codec.decode(list([NULL]))).toBeUndefined();
    });

    test("should reject lists longer than maxLength", () => {
      expect(codec.decode(list([integer(1), integer(2), integer(3)]))).toBeUndefined();
    });
  });
});
