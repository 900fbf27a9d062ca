/**
 * Transport-agnostic session contracts.
 *
 * The set of transports is closed: every session and builder carries a
 * {@link TransportKind} tag so callers can match on it exhaustively.
 *
 * @module session/types
 */

/**
 * - `stream`: reliable and ordered (Socket.IO)
 * - `datagram`: unreliable, unordered, small payloads (UDP)
 * - `webrtc`: unreliable data channel, negotiation not available yet
 */
export type TransportKind = "stream" | "datagram" | "webrtc";

/**
 * Callback receiving every inbound message of one session.
 */
export type PacketHandler = (data: Uint8Array) => void;

/**
 * Duplex channel to one remote endpoint.
 *
 * This is the capability contract consumed by the simulation layer.
 */
export interface Session {
  readonly kind: TransportKind;
  /** Human-readable description of the remote end */
  readonly remote: string;

  /**
   * Queue or transmit one message.
   * @throws SendError if the session is closed or `data` exceeds {@link maxPacketLen}
   */
  sendPacket(data: Uint8Array): void;

  /**
   * Largest payload `sendPacket` accepts. Callers must fragment or reject
   * anything bigger before sending.
   */
  maxPacketLen(): number;

  isOpen(): boolean;

  /** Close the session. Idempotent. */
  close(): void;

  /** Register a callback fired once when the session closes, from either side. */
  onClose(handler: () => void): void;
}

export type SessionBuilderState = "negotiating" | "built" | "failed";

/**
 * Turns one inbound connection attempt into a {@link Session}.
 * A builder is consumed by its first `build` call, successful or not.
 */
export interface SessionBuilder {
  readonly kind: TransportKind;
  readonly state: SessionBuilderState;

  /**
   * @throws BuildError if negotiation fails or the builder was already used
   * @throws NotImplementedError if the transport has no working negotiation
   */
  build(onPacket: PacketHandler): Session;
}
