import type { Server, Socket } from "socket.io";
import type { ConnectionKey } from "../core/connection-key.js";
import { EntityDirectory } from "../core/entity.js";
import type { Property } from "../core/property.js";
import { propertyKey } from "../core/types.js";
import {
  BuildError,
  InvalidValueError,
  NotImplementedError,
  PropertyGoneError,
  SendError,
  SubscriptionError,
  describeError,
} from "../errors.js";
import { decodeClientMessage, type ClientErrorCode, type ClientMessage, type ServerMessage } from "../protocol.js";
import { DatagramEndpoint } from "../session/datagram-endpoint.js";
import { StreamSessionBuilder } from "../session/stream-session.js";
import type { Session, SessionBuilder } from "../session/types.js";
import { createReplicationContext, type ReplicationContext } from "./context.js";

export interface ReplicationServerConfig {
  /** Registries to use (default: a fresh context) */
  context?: ReplicationContext;
  /** Called after a session is registered */
  onConnect?: (key: ConnectionKey) => void;
  /** Called after a session is deregistered */
  onDisconnect?: (key: ConnectionKey) => void;
}

/**
 * Joins transports, registries and entities.
 *
 * Every inbound connection attempt arrives as a {@link SessionBuilder}; the
 * server builds it, registers the session and then serves the client's
 * subscribe / unsubscribe / set requests against the entity directory.
 * Failures are confined to the connection that caused them.
 *
 * @example
 * ```ts
 * const server = new ReplicationServer();
 * const ship = server.entities.spawn();
 * const hull = ship.defineProperty("hull", { codec: integerCodec({ min: 0n }), initial: 100n });
 *
 * const listener = await HttpListener.plain(handler, { port: 3000 });
 * server.attachSocketServer(new Server(listener.server));
 *
 * hull.update(90n); // every subscriber receives an update
 * ```
 */
export class ReplicationServer {
  readonly context: ReplicationContext;
  readonly entities: EntityDirectory;
  private config: ReplicationServerConfig;
  private detachers: Array<() => void> = [];
  private endpoints: Set<DatagramEndpoint> = new Set();

  constructor(config: ReplicationServerConfig = {}) {
    this.config = config;
    this.context = config.context ?? createReplicationContext();
    this.entities = new EntityDirectory(this.context);
  }

  /**
   * Accept every Socket.IO connection as a stream session.
   * Returns a function that stops accepting new connections.
   */
  attachSocketServer(io: Server): () => void {
    const connectionHandler = (socket: Socket) => {
      this.accept(new StreamSessionBuilder(socket));
    };
    io.on("connection", connectionHandler);

    const detach = () => {
      io.off("connection", connectionHandler);
    };
    this.detachers.push(detach);
    return detach;
  }

  /**
   * Bind a UDP endpoint whose peers become datagram sessions.
   */
  async bindDatagramEndpoint(address: { host?: string; port: number; idleTimeoutMs?: number }): Promise<DatagramEndpoint> {
    const endpoint = await DatagramEndpoint.bind({
      ...address,
      onConnection: (builder) => {
        this.accept(builder);
      },
    });
    this.endpoints.add(endpoint);
    return endpoint;
  }

  /**
   * Build and register a session. Returns null if the builder failed; the
   * failure is logged and never escapes. A throwing `onConnect` hook is logged
   * and leaves the connection registered.
   */
  accept(builder: SessionBuilder): ConnectionKey | null {
    const accepted = this.buildAndRegister(builder);
    if (!accepted) return null;

    const { key, session } = accepted;
    console.log(`[ReplicationServer] Client connected: ${key.toString()} over ${session.kind} from ${session.remote}`);

    session.onClose(() => {
      console.log(`[ReplicationServer] Client disconnected: ${key.toString()}`);
      this.runHook("onDisconnect", () => this.config.onDisconnect?.(key));
    });
    this.runHook("onConnect", () => this.config.onConnect?.(key));
    return key;
  }

  /**
   * Get number of connected clients
   */
  getClientCount(): number {
    return this.context.connections.size;
  }

  /**
   * Stop accepting connections, close every session and every datagram endpoint.
   */
  async close(): Promise<void> {
    for (const detach of this.detachers.splice(0)) {
      detach();
    }
    for (const key of this.context.connections.keys()) {
      this.context.connections.get(key)?.close();
    }
    const endpoints = Array.from(this.endpoints);
    this.endpoints.clear();
    await Promise.all(endpoints.map((endpoint) => endpoint.close()));
  }

  private buildAndRegister(builder: SessionBuilder): { key: ConnectionKey; session: Session } | null {
    let key: ConnectionKey | null = null;
    try {
      const session = builder.build((data) => {
        if (key !== null) {
          this.handlePacket(key, data);
        }
      });
      const registered = this.context.connections.register(session);
      key = registered;
      return { key: registered, session };
    } catch (error) {
      if (error instanceof NotImplementedError) {
        console.error(`[ReplicationServer] ${builder.kind} transport is not available: ${error.message}`);
        return null;
      }
      if (error instanceof BuildError) {
        console.warn(`[ReplicationServer] Could not build ${builder.kind} session: ${error.message}`);
        return null;
      }
      console.error(`[ReplicationServer] Unexpected error accepting ${builder.kind} connection: ${describeError(error)}`);
      return null;
    }
  }

  private runHook(name: "onConnect" | "onDisconnect", hook: () => void): void {
    try {
      hook();
    } catch (error) {
      console.error(`[ReplicationServer] ${name} hook failed: ${describeError(error)}`);
    }
  }

  private handlePacket(key: ConnectionKey, data: Uint8Array): void {
    const message = decodeClientMessage(data);
    if (message === null) {
      this.reply(key, { type: "error", code: "malformed", message: "Unrecognized message" });
      return;
    }

    try {
      this.handleMessage(key, message);
    } catch (error) {
      console.error(
        `[ReplicationServer] Failed to handle ${message.type} from ${key.toString()}: ${describeError(error)}`,
      );
    }
  }

  private handleMessage(key: ConnectionKey, message: ClientMessage): void {
    const id = { entity: message.entity, name: message.property };
    const property = this.entities.findProperty(id);
    if (!property) {
      const error = new SubscriptionError(`[ReplicationServer] Unknown property ${propertyKey(id)}`);
      this.rejectRequest(key, message, "unknown-property", error);
      return;
    }

    try {
      switch (message.type) {
        case "subscribe":
          property.subscribe(key);
          this.sendCurrentValue(key, property);
          return;
        case "unsubscribe":
          property.unsubscribe(key);
          return;
        case "set":
          if (!property.remoteWritable) {
            const error = new InvalidValueError(`[ReplicationServer] Property ${propertyKey(id)} is read-only`);
            this.rejectRequest(key, message, "read-only", error);
            return;
          }
          property.setValue(message.value);
          return;
      }
    } catch (error) {
      if (error instanceof PropertyGoneError) {
        this.rejectRequest(key, message, "property-gone", error);
        return;
      }
      if (error instanceof InvalidValueError) {
        this.rejectRequest(key, message, "invalid-value", error);
        return;
      }
      if (error instanceof SubscriptionError) {
        console.warn(`[ReplicationServer] Dropped ${message.type} from ${key.toString()}: ${error.message}`);
        return;
      }
      throw error;
    }
  }

  private sendCurrentValue(key: ConnectionKey, property: Property): void {
    this.reply(key, {
      type: "update",
      entity: property.id.entity,
      property: property.id.name,
      value: property.getValue(),
    });
  }

  private rejectRequest(key: ConnectionKey, request: ClientMessage, code: ClientErrorCode, error: Error): void {
    console.warn(`[ReplicationServer] Rejected ${request.type} from ${key.toString()}: ${error.message}`);
    this.reply(key, {
      type: "error",
      code,
      message: error.message,
      entity: request.entity,
      property: request.property,
    });
  }

  private reply(key: ConnectionKey, message: ServerMessage): void {
    try {
      this.context.connections.deliver(key, message);
    } catch (error) {
      if (!(error instanceof SendError)) throw error;
      console.warn(`[ReplicationServer] Failed to reply to ${key.toString()}: ${error.message}`);
    }
  }
}
