/**
 * Error taxonomy for the replication core.
 *
 * Recoverable, per-connection errors (`InvalidValueError`, `PropertyGoneError`,
 * `SubscriptionError`, `SendError`, `BuildError`) are caught at the connection
 * boundary. `BindFailedError` propagates to whoever constructs a listener.
 * `ShutdownTimeoutError` is only ever logged.
 *
 * @module errors
 */

export type ReplicationErrorCode =
  | "invalid-value"
  | "property-gone"
  | "subscription"
  | "build-failed"
  | "not-implemented"
  | "bind-failed"
  | "send-failed"
  | "shutdown-timeout";

/**
 * Base class for every error raised by the replication core.
 */
export class ReplicationError extends Error {
  readonly code: ReplicationErrorCode;

  constructor(code: ReplicationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A value failed a property's kind or range check. */
export class InvalidValueError extends ReplicationError {
  constructor(message: string) {
    super("invalid-value", message);
  }
}

/** An operation was attempted on a finalized property. */
export class PropertyGoneError extends ReplicationError {
  constructor(property: string) {
    super("property-gone", `[Property] ${property} has been finalized`);
  }
}

/** A subscription request could not be honoured (e.g. it names no known property). */
export class SubscriptionError extends ReplicationError {
  constructor(message: string) {
    super("subscription", message);
  }
}

/** A session builder could not produce a working session. */
export class BuildError extends ReplicationError {
  constructor(message: string, options?: { cause?: unknown; code?: "build-failed" | "not-implemented" }) {
    super(options?.code ?? "build-failed", message, options);
  }
}

/**
 * The transport has no working implementation.
 * Callers must treat this as a missing capability, never as a transient failure.
 */
export class NotImplementedError extends BuildError {
  constructor(operation: string) {
    super(`${operation} not implemented`, { code: "not-implemented" });
  }
}

/** A listener or endpoint could not start (bad address, port in use, bad certificate). */
export class BindFailedError extends ReplicationError {
  constructor(message: string, cause?: unknown) {
    super("bind-failed", message, { cause });
  }
}

/** A transport refused or failed to deliver a packet. */
export class SendError extends ReplicationError {
  constructor(message: string, cause?: unknown) {
    super("send-failed", message, { cause });
  }
}

/** A graceful shutdown exceeded its time bound and was abandoned. */
export class ShutdownTimeoutError extends ReplicationError {
  constructor(name: string, timeoutMs: number) {
    super("shutdown-timeout", `shutting down ${name} server timed out after ${timeoutMs}ms`);
  }
}

/**
 * Render an unknown thrown value for log lines and error bodies.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
