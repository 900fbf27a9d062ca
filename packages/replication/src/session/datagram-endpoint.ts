import { createSocket, type RemoteInfo, type Socket as UdpSocket } from "node:dgram";
import type { AddressInfo } from "node:net";
import { DEFAULT_BIND_HOST, DEFAULT_DATAGRAM_IDLE_TIMEOUT_MS, MAX_DATAGRAM_PACKET_LEN } from "../constants.js";
import { BindFailedError, describeError } from "../errors.js";
import {
  DatagramSessionBuilder,
  peerId,
  type DatagramRouter,
  type DatagramSession,
} from "./datagram-session.js";

export interface DatagramEndpointConfig {
  /** Host to bind (default: DEFAULT_BIND_HOST) */
  host?: string;
  /** UDP port; 0 picks a free one */
  port: number;
  /** Close a session after this long without a datagram from its peer (default: DEFAULT_DATAGRAM_IDLE_TIMEOUT_MS) */
  idleTimeoutMs?: number;
  /** Called with a builder for every datagram from a peer that has no session yet */
  onConnection: (builder: DatagramSessionBuilder) => void;
}

/**
 * A bound UDP socket shared by every datagram session.
 *
 * Inbound datagrams are routed by peer address. A datagram from a peer with no
 * session produces a {@link DatagramSessionBuilder}; oversized datagrams are dropped.
 * A session whose peer stays silent for `idleTimeoutMs` is closed.
 */
export class DatagramEndpoint implements DatagramRouter {
  readonly socket: UdpSocket;
  private sessions: Map<string, DatagramSession> = new Map();
  private idleTimers: Map<DatagramSession, NodeJS.Timeout> = new Map();
  private onConnection: (builder: DatagramSessionBuilder) => void;
  private idleTimeoutMs: number;
  private closing: Promise<void> | null = null;

  private constructor(
    socket: UdpSocket,
    onConnection: (builder: DatagramSessionBuilder) => void,
    idleTimeoutMs: number,
  ) {
    this.socket = socket;
    this.onConnection = onConnection;
    this.idleTimeoutMs = idleTimeoutMs;

    socket.on("message", (message: Buffer, rinfo: RemoteInfo) => this.route(message, rinfo));
    socket.on("error", (error) => {
      console.error(`[DatagramEndpoint] Socket error: ${error.message}`);
    });
  }

  /**
   * Bind a UDP socket. Rejects with {@link BindFailedError} if the address is unusable.
   */
  static async bind(config: DatagramEndpointConfig): Promise<DatagramEndpoint> {
    const host = config.host ?? DEFAULT_BIND_HOST;
    if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
      throw new BindFailedError(`[DatagramEndpoint] port must be an integer in [0, 65535]. Got: ${config.port}`);
    }
    const idleTimeoutMs = config.idleTimeoutMs ?? DEFAULT_DATAGRAM_IDLE_TIMEOUT_MS;
    if (!Number.isFinite(idleTimeoutMs) || idleTimeoutMs <= 0) {
      throw new Error(`[DatagramEndpoint] idleTimeoutMs must be a positive number. Got: ${idleTimeoutMs}`);
    }

    const socket = createSocket(host.includes(":") ? "udp6" : "udp4");
    try {
      await new Promise<void>((resolve, reject) => {
        socket.once("error", reject);
        socket.bind(config.port, host, () => {
          socket.off("error", reject);
          resolve();
        });
      });
    } catch (error) {
      socket.close();
      throw new BindFailedError(
        `[DatagramEndpoint] failed to bind UDP socket to ${host}:${config.port}: ${describeError(error)}`,
        error,
      );
    }

    const endpoint = new DatagramEndpoint(socket, config.onConnection, idleTimeoutMs);
    const { address, port } = endpoint.address();
    console.log(`[DatagramEndpoint] Listening on ${address}:${port}`);
    return endpoint;
  }

  address(): AddressInfo {
    return this.socket.address();
  }

  attach(session: DatagramSession): void {
    const id = peerId(session.peer);
    if (this.closing) {
      throw new Error(`endpoint is closed, cannot attach ${id}`);
    }
    if (this.sessions.has(id)) {
      throw new Error(`a session for ${id} already exists`);
    }
    this.sessions.set(id, session);
    this.armIdleTimer(session);
  }

  detach(session: DatagramSession): void {
    clearTimeout(this.idleTimers.get(session));
    this.idleTimers.delete(session);

    const id = peerId(session.peer);
    if (this.sessions.get(id) === session) {
      this.sessions.delete(id);
    }
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Close every session, then the socket. Idempotent.
   */
  close(): Promise<void> {
    if (this.closing) return this.closing;

    this.closing = new Promise<void>((resolve) => {
      for (const session of Array.from(this.sessions.values())) {
        session.close();
      }
      this.socket.close(() => {
        console.log("[DatagramEndpoint] Closed");
        resolve();
      });
    });
    return this.closing;
  }

  private route(message: Buffer, rinfo: RemoteInfo): void {
    if (this.closing) return;
    if (message.byteLength > MAX_DATAGRAM_PACKET_LEN) {
      console.warn(`[DatagramEndpoint] Dropping ${message.byteLength}-byte datagram from ${rinfo.address}:${rinfo.port}`);
      return;
    }

    const peer = { address: rinfo.address, port: rinfo.port };
    const data = new Uint8Array(message);
    const session = this.sessions.get(peerId(peer));
    if (session) {
      this.armIdleTimer(session);
      session.receive(data);
      return;
    }
    this.onConnection(new DatagramSessionBuilder(this, peer, data));
  }

  private armIdleTimer(session: DatagramSession): void {
    clearTimeout(this.idleTimers.get(session));
    const timer = setTimeout(() => {
      console.log(`[DatagramEndpoint] Closing idle session ${session.remote} after ${this.idleTimeoutMs}ms`);
      session.close();
    }, this.idleTimeoutMs);
    timer.unref();
    this.idleTimers.set(session, timer);
  }
}
