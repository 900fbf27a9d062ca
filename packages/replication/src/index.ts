/**
 * @starlane/replication - State replication core for multiplayer simulation servers
 *
 * Provides:
 * - Subscription-based replication of entity properties to remote clients
 * - Transport-agnostic sessions over Socket.IO streams and UDP datagrams
 * - HTTP(S) listeners with bounded graceful shutdown and an HTTPS redirect mode
 */

// =============================================================================
// High-Level API (Recommended)
// =============================================================================
export { ReplicationServer } from "./server/replication-server.js";
export type { ReplicationServerConfig } from "./server/replication-server.js";

export { HttpListener } from "./listener/http-listener.js";
export type {
  ListenAddress,
  ListenerMode,
  ListenerOptions,
  ListenerState,
  ShutdownOutcome,
  TlsFiles,
} from "./listener/http-listener.js";
export { createRedirectHandler, redirectToHttps } from "./listener/redirect.js";
export type { RedirectPolicy, RedirectResponse } from "./listener/redirect.js";

// =============================================================================
// Values & Properties
// =============================================================================
export type { Encodable, EncodableKind } from "./core/encodable.js";
export {
  NULL,
  boolean,
  integer,
  scalar,
  text,
  list,
  record,
  isEncodable,
  encodableEquals,
  describeEncodable,
} from "./core/encodable.js";

export type { ValueCodec, Vector2 } from "./core/codecs.js";
export { booleanCodec, integerCodec, scalarCodec, textCodec, vectorCodec, listCodec } from "./core/codecs.js";

export type { Property, PropertyBinding, ReplicatedPropertyOptions } from "./core/property.js";
export { ReplicatedProperty, cell } from "./core/property.js";

export { Entity, EntityDirectory } from "./core/entity.js";
export type { DefinePropertyOptions } from "./core/entity.js";

export type { EntityId, PropertyId } from "./core/types.js";
export { propertyKey } from "./core/types.js";

// =============================================================================
// Registries
// =============================================================================
export { ConnectionKey } from "./core/connection-key.js";
export { ConnectionRegistry } from "./server/connection-registry.js";
export { SubscriptionRegistry } from "./server/subscription-registry.js";
export { createReplicationContext } from "./server/context.js";
export type { ReplicationContext } from "./server/context.js";

// =============================================================================
// Sessions
// =============================================================================
export type {
  PacketHandler,
  Session,
  SessionBuilder,
  SessionBuilderState,
  TransportKind,
} from "./session/types.js";
export { CloseSignal, OneShotSessionBuilder } from "./session/builder.js";
export { StreamSession, StreamSessionBuilder } from "./session/stream-session.js";
export { DatagramSession, DatagramSessionBuilder, peerId } from "./session/datagram-session.js";
export type { DatagramPeer, DatagramRouter } from "./session/datagram-session.js";
export { DatagramEndpoint } from "./session/datagram-endpoint.js";
export type { DatagramEndpointConfig } from "./session/datagram-endpoint.js";
export { WebrtcSession, WebrtcSessionBuilder } from "./session/webrtc-session.js";

// =============================================================================
// Wire Protocol
// =============================================================================
export { encodeMessage, decodeClientMessage, decodeServerMessage } from "./protocol.js";
export type { ClientMessage, ClientErrorCode, ServerMessage } from "./protocol.js";

// =============================================================================
// Errors
// =============================================================================
export {
  ReplicationError,
  InvalidValueError,
  PropertyGoneError,
  SubscriptionError,
  BuildError,
  NotImplementedError,
  BindFailedError,
  SendError,
  ShutdownTimeoutError,
  describeError,
} from "./errors.js";
export type { ReplicationErrorCode } from "./errors.js";

// =============================================================================
// Constants
// =============================================================================
export {
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  DEFAULT_STREAM_MAX_PACKET_LEN,
  MAX_DATAGRAM_PACKET_LEN,
  MAX_WEBRTC_MESSAGE_LEN,
  STREAM_PACKET_EVENT,
  DEFAULT_BIND_HOST,
} from "./constants.js";
