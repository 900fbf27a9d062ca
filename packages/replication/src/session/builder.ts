import { BuildError, describeError } from "../errors.js";
import type { PacketHandler, Session, SessionBuilder, SessionBuilderState, TransportKind } from "./types.js";

/**
 * Enforces the `negotiating -> built | failed` lifecycle shared by every builder.
 * Subclasses only implement the transport-specific negotiation.
 */
export abstract class OneShotSessionBuilder implements SessionBuilder {
  abstract readonly kind: TransportKind;
  private currentState: SessionBuilderState = "negotiating";

  get state(): SessionBuilderState {
    return this.currentState;
  }

  build(onPacket: PacketHandler): Session {
    if (this.currentState !== "negotiating") {
      throw new BuildError(`[SessionBuilder] ${this.kind} builder already ${this.currentState}`);
    }
    try {
      const session = this.negotiate(onPacket);
      this.currentState = "built";
      return session;
    } catch (error) {
      this.currentState = "failed";
      if (error instanceof BuildError) throw error;
      throw new BuildError(`[SessionBuilder] ${this.kind} negotiation failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  protected abstract negotiate(onPacket: PacketHandler): Session;
}

/**
 * Close-callback bookkeeping shared by session implementations.
 * Handlers run once; handlers registered after closing run immediately.
 */
export class CloseSignal {
  private handlers: Array<() => void> = [];
  private fired = false;

  get closed(): boolean {
    return this.fired;
  }

  add(handler: () => void): void {
    if (this.fired) {
      handler();
      return;
    }
    this.handlers.push(handler);
  }

  fire(): void {
    if (this.fired) return;
    this.fired = true;
    const handlers = this.handlers;
    this.handlers = [];
    for (const handler of handlers) {
      handler();
    }
  }
}
