import type { Socket } from "socket.io";
import { DEFAULT_STREAM_MAX_PACKET_LEN, STREAM_PACKET_EVENT } from "../constants.js";
import { SendError } from "../errors.js";
import { CloseSignal, OneShotSessionBuilder } from "./builder.js";
import type { PacketHandler, Session } from "./types.js";

function toBytes(payload: unknown): Uint8Array | null {
  if (payload instanceof Uint8Array) return payload;
  if (payload instanceof ArrayBuffer) return new Uint8Array(payload);
  return null;
}

/**
 * Reliable, ordered session over a Socket.IO server socket.
 * Packets travel as binary attachments of the `packet` event.
 */
export class StreamSession implements Session {
  readonly kind = "stream" as const;
  readonly remote: string;
  private socket: Socket;
  private maxLen: number;
  private closeSignal = new CloseSignal();

  constructor(socket: Socket, onPacket: PacketHandler, maxPacketLen: number = DEFAULT_STREAM_MAX_PACKET_LEN) {
    this.socket = socket;
    this.maxLen = maxPacketLen;
    this.remote = `${socket.handshake.address} (${socket.id})`;

    socket.on(STREAM_PACKET_EVENT, (payload: unknown) => {
      const data = toBytes(payload);
      if (data === null) {
        console.warn(`[StreamSession] Ignoring non-binary packet from ${this.remote}`);
        return;
      }
      onPacket(data);
    });
    socket.once("disconnect", () => this.closeSignal.fire());
  }

  sendPacket(data: Uint8Array): void {
    if (!this.isOpen()) {
      throw new SendError(`[StreamSession] Cannot send to ${this.remote}: session is closed`);
    }
    if (data.byteLength > this.maxLen) {
      throw new SendError(
        `[StreamSession] Packet of ${data.byteLength} bytes exceeds the ${this.maxLen}-byte limit`,
      );
    }
    this.socket.emit(STREAM_PACKET_EVENT, data);
  }

  maxPacketLen(): number {
    return this.maxLen;
  }

  isOpen(): boolean {
    return !this.closeSignal.closed && this.socket.connected;
  }

  close(): void {
    if (this.closeSignal.closed) return;
    this.socket.disconnect(true);
    this.closeSignal.fire();
  }

  onClose(handler: () => void): void {
    this.closeSignal.add(handler);
  }
}

/**
 * Builder for a Socket.IO connection. The Socket.IO handshake has already
 * completed when the server emits `connection`, so building only fails if the
 * socket dropped in between.
 */
export class StreamSessionBuilder extends OneShotSessionBuilder {
  readonly kind = "stream" as const;
  private socket: Socket;
  private maxPacketLen: number;

  constructor(socket: Socket, maxPacketLen?: number) {
    super();
    this.socket = socket;
    // Same ceiling the server enforces on inbound messages
    const serverLimit = socket.nsp.server.engine.opts.maxHttpBufferSize;
    this.maxPacketLen = maxPacketLen ?? serverLimit ?? DEFAULT_STREAM_MAX_PACKET_LEN;
  }

  protected negotiate(onPacket: PacketHandler): Session {
    if (!this.socket.connected) {
      throw new Error(`socket ${this.socket.id} disconnected before the session was built`);
    }
    return new StreamSession(this.socket, onPacket, this.maxPacketLen);
  }
}
