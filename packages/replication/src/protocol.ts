/**
 * Wire protocol spoken over every session.
 *
 * Messages are serialized with superjson (so `bigint` integers survive) and
 * UTF-8 encoded. Decoding never throws: anything that does not parse or does
 * not match the message shapes comes back as `null`.
 *
 * @module protocol
 */

import superjson from "superjson";
import { isEncodable, type Encodable } from "./core/encodable.js";
import { isEntityId, type EntityId } from "./core/types.js";

/**
 * Client -> server requests.
 */
export type ClientMessage =
  | { type: "subscribe"; entity: EntityId; property: string }
  | { type: "unsubscribe"; entity: EntityId; property: string }
  | { type: "set"; entity: EntityId; property: string; value: Encodable };

export type ClientErrorCode = "malformed" | "unknown-property" | "property-gone" | "read-only" | "invalid-value";

/**
 * Server -> client notifications.
 */
export type ServerMessage =
  | { type: "update"; entity: EntityId; property: string; value: Encodable }
  | { type: "removed"; entity: EntityId; property: string }
  | { type: "error"; code: ClientErrorCode; message: string; entity?: EntityId; property?: string };

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

export function encodeMessage(message: ServerMessage | ClientMessage): Uint8Array {
  return textEncoder.encode(superjson.stringify(message));
}

function parsePacket(data: Uint8Array): unknown {
  try {
    return superjson.parse(textDecoder.decode(data));
  } catch {
    return undefined;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasTarget(value: Record<string, unknown>): value is Record<string, unknown> & {
  entity: EntityId;
  property: string;
} {
  return isEntityId(value.entity) && typeof value.property === "string" && value.property.length > 0;
}

/**
 * Decode a request sent by a client (untrusted input).
 */
export function decodeClientMessage(data: Uint8Array): ClientMessage | null {
  const packet = parsePacket(data);
  if (!isObject(packet) || !hasTarget(packet)) return null;

  const { entity, property } = packet;
  switch (packet.type) {
    case "subscribe":
      return { type: "subscribe", entity, property };
    case "unsubscribe":
      return { type: "unsubscribe", entity, property };
    case "set":
      if (!isEncodable(packet.value)) return null;
      return { type: "set", entity, property, value: packet.value };
    default:
      return null;
  }
}

const ERROR_CODES: ReadonlySet<string> = new Set<ClientErrorCode>([
  "malformed",
  "unknown-property",
  "property-gone",
  "read-only",
  "invalid-value",
]);

function isClientErrorCode(value: unknown): value is ClientErrorCode {
  return typeof value === "string" && ERROR_CODES.has(value);
}

/**
 * Decode a notification sent by the server. Used by clients and tests.
 */
export function decodeServerMessage(data: Uint8Array): ServerMessage | null {
  const packet = parsePacket(data);
  if (!isObject(packet)) return null;

  if (packet.type === "error") {
    if (!isClientErrorCode(packet.code) || typeof packet.message !== "string") return null;
    const message: Extract<ServerMessage, { type: "error" }> = { type: "error", code: packet.code, message: packet.message };
    if (isEntityId(packet.entity)) message.entity = packet.entity;
    if (typeof packet.property === "string") message.property = packet.property;
    return message;
  }

  if (!hasTarget(packet)) return null;
  const { entity, property } = packet;
  switch (packet.type) {
    case "update":
      if (!isEncodable(packet.value)) return null;
      return { type: "update", entity, property, value: packet.value };
    case "removed":
      return { type: "removed", entity, property };
    default:
      return null;
  }
}
