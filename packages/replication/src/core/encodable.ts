/**
 * The closed set of value kinds that can cross the network boundary.
 *
 * Every value exchanged between a property and a remote client is an
 * {@link Encodable}. The union is tagged on `kind` so consumers can match it
 * exhaustively.
 *
 * @module core/encodable
 */

export type Encodable =
  | { readonly kind: "null" }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "integer"; readonly value: bigint }
  | { readonly kind: "scalar"; readonly value: number }
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "list"; readonly items: readonly Encodable[] }
  | { readonly kind: "record"; readonly fields: Readonly<Record<string, Encodable>> };

export type EncodableKind = Encodable["kind"];

export const NULL: Encodable = { kind: "null" };

export function boolean(value: boolean): Encodable {
  return { kind: "boolean", value };
}

/**
 * Integers travel as `bigint` so 64-bit values survive the trip.
 * Plain numbers must already be safe integers.
 */
export function integer(value: bigint | number): Encodable {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new RangeError(`integer() expects a safe integer, got ${value}`);
  }
  return { kind: "integer", value: BigInt(value) };
}

export function scalar(value: number): Encodable {
  if (!Number.isFinite(value)) {
    throw new RangeError(`scalar() expects a finite number, got ${value}`);
  }
  return { kind: "scalar", value };
}

export function text(value: string): Encodable {
  return { kind: "text", value };
}

export function list(items: readonly Encodable[]): Encodable {
  return { kind: "list", items };
}

export function record(fields: Readonly<Record<string, Encodable>>): Encodable {
  return { kind: "record", fields };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Structural check for values arriving from the network.
 */
export function isEncodable(value: unknown): value is Encodable {
  if (!isPlainObject(value)) return false;

  switch (value.kind) {
    case "null":
      return true;
    case "boolean":
      return typeof value.value === "boolean";
    case "integer":
      return typeof value.value === "bigint";
    case "scalar":
      return typeof value.value === "number" && Number.isFinite(value.value);
    case "text":
      return typeof value.value === "string";
    case "list":
      return Array.isArray(value.items) && value.items.every((item: unknown) => isEncodable(item));
    case "record": {
      const fields = value.fields;
      return isPlainObject(fields) && Object.values(fields).every((field) => isEncodable(field));
    }
    default:
      return false;
  }
}

/**
 * Deep structural equality between two Encodables.
 */
export function encodableEquals(a: Encodable, b: Encodable): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "boolean":
    case "integer":
    case "scalar":
    case "text":
      return b.kind === a.kind && "value" in b && b.value === a.value;
    case "list": {
      if (b.kind !== "list" || b.items.length !== a.items.length) return false;
      return a.items.every((item, index) => {
        const other = b.items[index];
        return other !== undefined && encodableEquals(item, other);
      });
    }
    case "record": {
      if (b.kind !== "record") return false;
      const keys = Object.keys(a.fields);
      if (keys.length !== Object.keys(b.fields).length) return false;
      return keys.every((key) => {
        const left = a.fields[key];
        const right = b.fields[key];
        return left !== undefined && right !== undefined && encodableEquals(left, right);
      });
    }
  }
}

/**
 * Short human-readable rendering, used in error messages.
 */
export function describeEncodable(value: Encodable): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "boolean":
    case "scalar":
      return `${value.kind}(${value.value})`;
    case "integer":
      return `integer(${value.value.toString()})`;
    case "text":
      return `text(${JSON.stringify(value.value)})`;
    case "list":
      return `list[${value.items.length}]`;
    case "record":
      return `record{${Object.keys(value.fields).join(", ")}}`;
  }
}
