/**
 * Test utilities: in-memory sessions and polling helpers.
 */

import { request as httpRequest, type IncomingHttpHeaders } from "node:http";
import { request as httpsRequest } from "node:https";
import { SendError } from "./errors.js";
import { decodeServerMessage, encodeMessage, type ClientMessage, type ServerMessage } from "./protocol.js";
import { CloseSignal, OneShotSessionBuilder } from "./session/builder.js";
import type { PacketHandler, Session, TransportKind } from "./session/types.js";

const DEFAULT_TIMEOUT_MS = 5000;
const POLL_INTERVAL_MS = 10;

export const waitFor = async (predicate: () => boolean, timeoutMs: number = DEFAULT_TIMEOUT_MS): Promise<void> => {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (predicate()) return;
    await new Promise((resolve) => setTimeout(resolve, POLL_INTERVAL_MS));
  }
  throw new Error("Timeout waiting for condition");
};

export interface FetchResult {
  status: number;
  headers: IncomingHttpHeaders;
  body: string;
}

export interface FetchOptions {
  port: number;
  path?: string;
  /** Host header to send; null sends none */
  host?: string | null;
  secure?: boolean;
}

/**
 * One request on a fresh connection to 127.0.0.1. Certificates are not verified.
 */
export const fetchLocal = (options: FetchOptions): Promise<FetchResult> =>
  new Promise((resolve, reject) => {
    const host = options.host === undefined ? `127.0.0.1:${options.port}` : options.host;
    const requestOptions = {
      hostname: "127.0.0.1",
      port: options.port,
      path: options.path ?? "/",
      agent: false,
      setHost: false,
      rejectUnauthorized: false,
      headers: host === null ? {} : { host },
    };
    const request = options.secure ? httpsRequest(requestOptions) : httpRequest(requestOptions);
    request.on("response", (response) => {
      let body = "";
      response.setEncoding("utf8");
      response.on("data", (chunk: string) => {
        body += chunk;
      });
      response.on("end", () => resolve({ status: response.statusCode ?? 0, headers: response.headers, body }));
      response.on("error", reject);
    });
    request.on("error", reject);
    request.end();
  });

export interface MemorySessionOptions {
  kind?: TransportKind;
  remote?: string;
  maxPacketLen?: number;
}

/**
 * Session that records every packet sent to it.
 */
export class MemorySession implements Session {
  readonly kind: TransportKind;
  readonly remote: string;
  readonly sent: Uint8Array[] = [];
  /** When set, the next `sendPacket` throws this error */
  failNextSend: Error | null = null;
  private maxLen: number;
  private closeSignal = new CloseSignal();

  constructor(options: MemorySessionOptions = {}) {
    this.kind = options.kind ?? "stream";
    this.remote = options.remote ?? "memory";
    this.maxLen = options.maxPacketLen ?? 64 * 1024;
  }

  sendPacket(data: Uint8Array): void {
    const failure = this.failNextSend;
    if (failure) {
      this.failNextSend = null;
      throw failure;
    }
    if (this.closeSignal.closed) {
      throw new SendError(`[MemorySession] ${this.remote} is closed`);
    }
    this.sent.push(data);
  }

  maxPacketLen(): number {
    return this.maxLen;
  }

  isOpen(): boolean {
    return !this.closeSignal.closed;
  }

  close(): void {
    this.closeSignal.fire();
  }

  onClose(handler: () => void): void {
    this.closeSignal.add(handler);
  }

  /**
   * Decode everything sent so far.
   */
  messages(): ServerMessage[] {
    return this.sent.map((packet) => {
      const message = decodeServerMessage(packet);
      if (message === null) {
        throw new Error(`MemorySession ${this.remote} received an undecodable packet`);
      }
      return message;
    });
  }
}

/**
 * Builder producing a {@link MemorySession}, with a handle on the packet
 * handler so tests can play the client side.
 */
export class MemorySessionBuilder extends OneShotSessionBuilder {
  readonly kind: TransportKind;
  readonly session: MemorySession;
  private onPacket: PacketHandler | null = null;

  constructor(options: MemorySessionOptions = {}) {
    super();
    this.session = new MemorySession(options);
    this.kind = this.session.kind;
  }

  /** Send a raw packet as the client */
  receive(data: Uint8Array): void {
    if (!this.onPacket) {
      throw new Error("MemorySessionBuilder has not been built");
    }
    this.onPacket(data);
  }

  /** Send a protocol message as the client */
  send(message: ClientMessage): void {
    this.receive(encodeMessage(message));
  }

  protected negotiate(onPacket: PacketHandler): Session {
    this.onPacket = onPacket;
    return this.session;
  }
}

/**
 * Builder whose negotiation always fails.
 */
export class FailingSessionBuilder extends OneShotSessionBuilder {
  readonly kind = "stream" as const;

  protected negotiate(): Session {
    throw new Error("handshake rejected");
  }
}
