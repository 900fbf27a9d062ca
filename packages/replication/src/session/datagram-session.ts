import type { Socket as UdpSocket } from "node:dgram";
import { MAX_DATAGRAM_PACKET_LEN } from "../constants.js";
import { SendError } from "../errors.js";
import { CloseSignal, OneShotSessionBuilder } from "./builder.js";
import type { PacketHandler, Session } from "./types.js";

/**
 * Remote end of a datagram session.
 */
export interface DatagramPeer {
  address: string;
  port: number;
}

export function peerId(peer: DatagramPeer): string {
  return peer.address.includes(":") ? `[${peer.address}]:${peer.port}` : `${peer.address}:${peer.port}`;
}

/**
 * What a datagram session needs from the endpoint that owns the UDP socket.
 */
export interface DatagramRouter {
  readonly socket: UdpSocket;
  attach(session: DatagramSession): void;
  detach(session: DatagramSession): void;
}

/**
 * Unreliable, unordered session multiplexed over a shared UDP socket.
 * Each inbound datagram is one packet; nothing is retransmitted.
 */
export class DatagramSession implements Session {
  readonly kind = "datagram" as const;
  readonly peer: DatagramPeer;
  readonly remote: string;
  private router: DatagramRouter;
  private onPacket: PacketHandler;
  private closeSignal = new CloseSignal();

  constructor(router: DatagramRouter, peer: DatagramPeer, onPacket: PacketHandler) {
    this.router = router;
    this.peer = peer;
    this.remote = peerId(peer);
    this.onPacket = onPacket;
  }

  /**
   * Called by the endpoint for every datagram from this peer.
   */
  receive(data: Uint8Array): void {
    if (this.closeSignal.closed) return;
    this.onPacket(data);
  }

  sendPacket(data: Uint8Array): void {
    if (this.closeSignal.closed) {
      throw new SendError(`[DatagramSession] Cannot send to ${this.remote}: session is closed`);
    }
    if (data.byteLength > MAX_DATAGRAM_PACKET_LEN) {
      throw new SendError(
        `[DatagramSession] Packet of ${data.byteLength} bytes exceeds the ${MAX_DATAGRAM_PACKET_LEN}-byte limit`,
      );
    }
    this.router.socket.send(data, this.peer.port, this.peer.address, (error) => {
      if (error) {
        console.warn(`[DatagramSession] Send to ${this.remote} failed: ${error.message}`);
      }
    });
  }

  maxPacketLen(): number {
    return MAX_DATAGRAM_PACKET_LEN;
  }

  isOpen(): boolean {
    return !this.closeSignal.closed;
  }

  close(): void {
    if (this.closeSignal.closed) return;
    this.router.detach(this);
    this.closeSignal.fire();
  }

  onClose(handler: () => void): void {
    this.closeSignal.add(handler);
  }
}

/**
 * Builder created by the endpoint when a datagram arrives from an unknown peer.
 * The opening datagram is delivered to the new session right after `build` returns.
 */
export class DatagramSessionBuilder extends OneShotSessionBuilder {
  readonly kind = "datagram" as const;
  readonly peer: DatagramPeer;
  private router: DatagramRouter;
  private opening: Uint8Array | null;

  constructor(router: DatagramRouter, peer: DatagramPeer, opening: Uint8Array | null = null) {
    super();
    this.router = router;
    this.peer = peer;
    this.opening = opening;
  }

  protected negotiate(onPacket: PacketHandler): Session {
    const session = new DatagramSession(this.router, this.peer, onPacket);
    this.router.attach(session);

    const opening = this.opening;
    this.opening = null;
    if (opening !== null) {
      queueMicrotask(() => session.receive(opening));
    }
    return session;
  }
}
