import { readFileSync } from "node:fs";
import { createServer as createHttpServer, type RequestListener, type Server as HttpServer } from "node:http";
import { createServer as createHttpsServer, type Server as HttpsServer } from "node:https";
import type { AddressInfo, Server as NetServer } from "node:net";
import { DEFAULT_BIND_HOST, DEFAULT_SHUTDOWN_TIMEOUT_MS } from "../constants.js";
import { BindFailedError, ShutdownTimeoutError, describeError } from "../errors.js";
import { createRedirectHandler } from "./redirect.js";

export type ListenerMode = "plain" | "encrypted" | "redirect";

export type ListenerState = "starting" | "running" | "shutting-down" | "stopped";

/**
 * How a shutdown ended. Shutdown never throws; failures are only logged.
 */
export type ShutdownOutcome = "clean" | "timeout" | "error";

export interface ListenAddress {
  /** Host to bind (default: DEFAULT_BIND_HOST) */
  host?: string;
  /** TCP port; 0 picks a free one */
  port: number;
}

export interface TlsFiles {
  certPath: string;
  keyPath: string;
}

export interface ListenerOptions {
  /** Upper bound on waiting for the serving task during shutdown (default: DEFAULT_SHUTDOWN_TIMEOUT_MS) */
  shutdownTimeoutMs?: number;
}

const MODE_NAMES: Record<ListenerMode, string> = {
  plain: "Unencrypted HTTP",
  encrypted: "Encrypted HTTPS",
  redirect: "HTTP-to-HTTPS redirect",
};

/**
 * A bound HTTP(S) endpoint that owns its graceful shutdown.
 *
 * Instances are created by the async factories, which resolve only once the
 * socket is listening and reject with {@link BindFailedError} otherwise.
 *
 * Shutdown is two-phase: abort the listen signal (stop accepting, drop idle
 * connections), then wait at most `shutdownTimeoutMs` for the server to close
 * before abandoning it. It runs once per instance.
 *
 * @example
 * ```ts
 * const listener = await HttpListener.plain(handler, { port: 3000 });
 * const io = new Server(listener.server);
 * // ...
 * await listener.shutdown();
 * ```
 */
export class HttpListener {
  readonly mode: ListenerMode;
  readonly name: string;
  readonly server: HttpServer | HttpsServer;
  private shutdownTimeoutMs: number;
  private abortController = new AbortController();
  private serving: Promise<Error | null>;
  private servingError: Error | null = null;
  private shutdownPromise: Promise<ShutdownOutcome> | null = null;
  private currentState: ListenerState = "starting";

  private constructor(mode: ListenerMode, server: HttpServer | HttpsServer, options: ListenerOptions) {
    const shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    if (!Number.isFinite(shutdownTimeoutMs) || shutdownTimeoutMs < 0) {
      throw new Error(`[HttpListener] shutdownTimeoutMs must be a non-negative number. Got: ${shutdownTimeoutMs}`);
    }
    this.mode = mode;
    this.name = MODE_NAMES[mode];
    this.server = server;
    this.shutdownTimeoutMs = shutdownTimeoutMs;
    const socketServer: NetServer = server;
    this.serving = new Promise((resolve) => {
      socketServer.once("close", () => resolve(this.servingError));
    });
  }

  /**
   * Serve `handler` over unencrypted HTTP.
   */
  static async plain(
    handler: RequestListener,
    address: ListenAddress,
    options: ListenerOptions = {},
  ): Promise<HttpListener> {
    return new HttpListener("plain", createHttpServer(handler), options).listen(address);
  }

  /**
   * Serve `handler` over HTTPS. Unreadable or invalid certificate/key files fail
   * here; the listener never falls back to plaintext.
   */
  static async encrypted(
    handler: RequestListener,
    address: ListenAddress,
    tls: TlsFiles,
    options: ListenerOptions = {},
  ): Promise<HttpListener> {
    const cert = readTlsFile(tls.certPath, "certificate");
    const key = readTlsFile(tls.keyPath, "private key");

    let server: HttpsServer;
    try {
      server = createHttpsServer({ cert, key }, handler);
    } catch (error) {
      throw new BindFailedError(`[HttpListener] invalid TLS certificate or key: ${describeError(error)}`, error);
    }
    return new HttpListener("encrypted", server, options).listen(address);
  }

  /**
   * Answer every request with a redirect to its HTTPS equivalent.
   */
  static async redirect(address: ListenAddress, options: ListenerOptions = {}): Promise<HttpListener> {
    // Requests without a Host header must reach the policy, which answers 404
    const server = createHttpServer({ requireHostHeader: false }, createRedirectHandler());
    return new HttpListener("redirect", server, options).listen(address);
  }

  /**
   * Scoped acquisition: run `body` with a started listener and shut the
   * listener down on every exit path, including thrown errors.
   */
  static async use<T>(starting: Promise<HttpListener>, body: (listener: HttpListener) => T | Promise<T>): Promise<T> {
    const listener = await starting;
    try {
      return await body(listener);
    } finally {
      await listener.shutdown();
    }
  }

  get state(): ListenerState {
    return this.currentState;
  }

  get address(): AddressInfo {
    const address = this.server.address();
    if (address === null || typeof address === "string") {
      throw new Error(`[HttpListener] ${this.name} server is not bound to a TCP address`);
    }
    return address;
  }

  /**
   * Stop accepting connections and wait, within the timeout, for the server to
   * finish. Safe to call any number of times; every call returns the outcome of
   * the first.
   */
  shutdown(): Promise<ShutdownOutcome> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  toString(): string {
    if (!this.server.listening) return `${this.name} server`;
    const { address, port } = this.address;
    return `${this.name} server on ${address}:${port}`;
  }

  private async listen(address: ListenAddress): Promise<HttpListener> {
    const host = address.host ?? DEFAULT_BIND_HOST;
    const server: NetServer = this.server;
    console.log(`[HttpListener] Starting ${this.name} server on ${host}:${address.port}`);

    try {
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen({ host, port: address.port, signal: this.abortController.signal }, () => {
          server.off("error", reject);
          resolve();
        });
      });
    } catch (error) {
      this.currentState = "stopped";
      throw new BindFailedError(
        `[HttpListener] failed to bind ${this.name} server to ${host}:${address.port}: ${describeError(error)}`,
        error,
      );
    }

    server.on("error", (error) => {
      this.servingError = error;
      console.error(`[HttpListener] ${this.name} server error: ${error.message}`);
    });
    this.currentState = "running";
    return this;
  }

  private async runShutdown(): Promise<ShutdownOutcome> {
    this.currentState = "shutting-down";

    if (this.server.listening) {
      this.abortController.abort();
    } else {
      console.error(`[HttpListener] Failed to send ${this.name} server shutdown request: server is not listening`);
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.shutdownTimeoutMs);
    });

    const result = await Promise.race([this.serving, timedOut]);
    clearTimeout(timer);
    this.currentState = "stopped";

    if (result === "timeout") {
      console.warn(`[HttpListener] ${new ShutdownTimeoutError(this.name, this.shutdownTimeoutMs).message}`);
      return "timeout";
    }
    if (result !== null) {
      console.error(`[HttpListener] Failed to join ${this.name} server: ${result.message}`);
      return "error";
    }
    console.log(`[HttpListener] ${this.name} server shut down`);
    return "clean";
  }
}

function readTlsFile(path: string, what: string): Buffer {
  try {
    return readFileSync(path);
  } catch (error) {
    throw new BindFailedError(`[HttpListener] failed to read TLS ${what} from ${path}: ${describeError(error)}`, error);
  }
}
