import { ConnectionKey } from "../core/connection-key.js";
import { SendError, describeError } from "../errors.js";
import { encodeMessage, type ServerMessage } from "../protocol.js";
import type { Session } from "../session/types.js";
import type { SubscriptionRegistry } from "./subscription-registry.js";

interface Slot {
  generation: number;
  session: Session | null;
}

/**
 * Maps connection keys to live sessions.
 *
 * Keys are generational indices into a slot arena. A slot only returns to the
 * free list after the subscription registry has forgotten its key, and reusing
 * it bumps the generation, so stale keys never reach a newer session.
 */
export class ConnectionRegistry {
  private subscriptions: SubscriptionRegistry;
  private slots: Slot[] = [];
  private freeSlots: number[] = [];
  private liveCount = 0;

  constructor(subscriptions: SubscriptionRegistry) {
    this.subscriptions = subscriptions;
  }

  /**
   * Register a session under a fresh key. The session is deregistered
   * automatically when it closes.
   */
  register(session: Session): ConnectionKey {
    if (!session.isOpen()) {
      throw new Error(`[ConnectionRegistry] Cannot register closed ${session.kind} session ${session.remote}`);
    }

    let key: ConnectionKey;
    const reused = this.freeSlots.pop();
    if (reused !== undefined) {
      const slot = this.slots[reused];
      if (!slot) {
        throw new Error(`[ConnectionRegistry] Free list points at missing slot ${reused}`);
      }
      slot.generation++;
      slot.session = session;
      key = new ConnectionKey(reused, slot.generation);
    } else {
      this.slots.push({ generation: 0, session });
      key = new ConnectionKey(this.slots.length - 1, 0);
    }

    this.liveCount++;
    session.onClose(() => {
      this.deregister(key);
    });
    return key;
  }

  /**
   * Remove a session and every subscription it holds. Returns false for stale keys.
   */
  deregister(key: ConnectionKey): boolean {
    const slot = this.liveSlot(key);
    if (!slot) return false;

    const session = slot.session;
    slot.session = null;
    this.liveCount--;
    this.subscriptions.removeConnection(key);
    this.freeSlots.push(key.slot);

    if (session?.isOpen()) {
      session.close();
    }
    return true;
  }

  get(key: ConnectionKey): Session | undefined {
    return this.liveSlot(key)?.session ?? undefined;
  }

  isLive(key: ConnectionKey): boolean {
    return this.liveSlot(key) !== undefined;
  }

  /**
   * Encode a message and send it to one connection.
   *
   * A stale key is a silent no-op: notifications racing a disconnect are dropped.
   *
   * @throws SendError if the transport refuses the packet; the connection is
   *   deregistered first when its session turns out to be closed
   */
  deliver(key: ConnectionKey, message: ServerMessage): void {
    const session = this.get(key);
    if (!session) return;

    const packet = encodeMessage(message);
    const limit = session.maxPacketLen();
    if (packet.byteLength > limit) {
      throw new SendError(
        `[ConnectionRegistry] ${message.type} message of ${packet.byteLength} bytes exceeds the ${limit}-byte limit of ${key.toString()}`,
      );
    }

    try {
      session.sendPacket(packet);
    } catch (error) {
      if (!session.isOpen()) {
        this.deregister(key);
      }
      if (error instanceof SendError) throw error;
      throw new SendError(`[ConnectionRegistry] Delivery to ${key.toString()} failed: ${describeError(error)}`, error);
    }
  }

  keys(): ConnectionKey[] {
    const keys: ConnectionKey[] = [];
    this.slots.forEach((slot, index) => {
      if (slot.session) {
        keys.push(new ConnectionKey(index, slot.generation));
      }
    });
    return keys;
  }

  /** Number of live connections */
  get size(): number {
    return this.liveCount;
  }

  private liveSlot(key: ConnectionKey): Slot | undefined {
    const slot = this.slots[key.slot];
    if (!slot || slot.generation !== key.generation || slot.session === null) {
      return undefined;
    }
    return slot;
  }
}
