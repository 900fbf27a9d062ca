/**
 * Value codecs map a property's internal representation to and from
 * {@link Encodable}.
 *
 * `encode` must be total over valid internal values. `decode` returns
 * `undefined` for anything outside the property's domain (wrong kind, out of
 * range), which the property reports as an invalid value.
 *
 * @module core/codecs
 */

import type { Encodable } from "./encodable.js";

export interface ValueCodec<T> {
  /** Human-readable description of the accepted domain, used in error messages. */
  readonly kind: string;
  encode(value: T): Encodable;
  decode(value: Encodable): T | undefined;
}

export interface Vector2 {
  x: number;
  y: number;
}

export const booleanCodec: ValueCodec<boolean> = {
  kind: "boolean",
  encode: (value) => ({ kind: "boolean", value }),
  decode: (value) => (value.kind === "boolean" ? value.value : undefined),
};

export function integerCodec(range: { min?: bigint; max?: bigint } = {}): ValueCodec<bigint> {
  const { min, max } = range;
  return {
    kind: `integer${describeRange(min, max)}`,
    encode: (value) => ({ kind: "integer", value }),
    decode: (value) => {
      if (value.kind !== "integer") return undefined;
      if (min !== undefined && value.value < min) return undefined;
      if (max !== undefined && value.value > max) return undefined;
      return value.value;
    },
  };
}

export function scalarCodec(range: { min?: number; max?: number } = {}): ValueCodec<number> {
  const { min, max } = range;
  return {
    kind: `scalar${describeRange(min, max)}`,
    encode: (value) => ({ kind: "scalar", value }),
    decode: (value) => {
      if (value.kind !== "scalar" || !Number.isFinite(value.value)) return undefined;
      if (min !== undefined && value.value < min) return undefined;
      if (max !== undefined && value.value > max) return undefined;
      return value.value;
    },
  };
}

export function textCodec(options: { maxLength?: number } = {}): ValueCodec<string> {
  const { maxLength } = options;
  return {
    kind: maxLength === undefined ? "text" : `text(<= ${maxLength} chars)`,
    encode: (value) => ({ kind: "text", value }),
    decode: (value) => {
      if (value.kind !== "text") return undefined;
      if (maxLength !== undefined && value.value.length > maxLength) return undefined;
      return value.value;
    },
  };
}

/**
 * Two-dimensional vector carried as a `record` with finite `x` and `y` scalars.
 */
export const vectorCodec: ValueCodec<Vector2> = {
  kind: "vector{x, y}",
  encode: (value) => ({
    kind: "record",
    fields: {
      x: { kind: "scalar", value: value.x },
      y: { kind: "scalar", value: value.y },
    },
  }),
  decode: (value) => {
    if (value.kind !== "record") return undefined;
    const { x, y, ...rest } = value.fields;
    if (Object.keys(rest).length > 0) return undefined;
    if (x?.kind !== "scalar" || y?.kind !== "scalar") return undefined;
    if (!Number.isFinite(x.value) || !Number.isFinite(y.value)) return undefined;
    return { x: x.value, y: y.value };
  },
};

export function listCodec<T>(inner: ValueCodec<T>, options: { maxLength?: number } = {}): ValueCodec<T[]> {
  const { maxLength } = options;
  return {
    kind: `list<${inner.kind}>`,
    encode: (values) => ({ kind: "list", items: values.map((value) => inner.encode(value)) }),
    decode: (value) => {
      if (value.kind !== "list") return undefined;
      if (maxLength !== undefined && value.items.length > maxLength) return undefined;
      const decoded: T[] = [];
      for (const item of value.items) {
        const next = inner.decode(item);
        if (next === undefined) return undefined;
        decoded.push(next);
      }
      return decoded;
    },
  };
}

function describeRange(min: bigint | number | undefined, max: bigint | number | undefined): string {
  if (min === undefined && max === undefined) return "";
  return `[${min?.toString() ?? "-inf"}, ${max?.toString() ?? "+inf"}]`;
}
