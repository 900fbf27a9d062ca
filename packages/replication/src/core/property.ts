import { InvalidValueError, PropertyGoneError, SendError, SubscriptionError } from "../errors.js";
import type { ReplicationContext } from "../server/context.js";
import type { ConnectionKey } from "./connection-key.js";
import type { ValueCodec } from "./codecs.js";
import { describeEncodable, type Encodable } from "./encodable.js";
import { propertyKey, type PropertyId } from "./types.js";

/**
 * A named, subscribable, network-visible attribute of a simulation entity.
 *
 * This is the capability contract consumed by the simulation layer and by
 * remote-write handlers.
 */
export interface Property {
  readonly id: PropertyId;
  /** Whether remote clients may call `setValue` through the wire protocol. */
  readonly remoteWritable: boolean;
  readonly finalized: boolean;

  /**
   * Current value.
   * @throws PropertyGoneError once finalized
   */
  getValue(): Encodable;

  /**
   * Validate and store a new value, then notify every subscriber once.
   * @throws InvalidValueError if the value is outside the property's domain (state is unchanged)
   * @throws PropertyGoneError once finalized
   */
  setValue(value: Encodable): void;

  /**
   * Idempotent.
   * @throws PropertyGoneError once finalized
   * @throws SubscriptionError if the connection is no longer registered
   */
  subscribe(key: ConnectionKey): void;

  /** Idempotent. Removing an absent key is a no-op. */
  unsubscribe(key: ConnectionKey): void;

  /**
   * Notify every subscriber of the removal and drop them. Irreversible.
   */
  finalize(): void;
}

/**
 * Read/write access to the authoritative state a property exposes.
 */
export interface PropertyBinding<T> {
  get(): T;
  set(value: T): void;
}

/**
 * Binding over a private cell, for properties whose entity keeps no other state.
 */
export function cell<T>(initial: T): PropertyBinding<T> {
  let current = initial;
  return {
    get: () => current,
    set: (value) => {
      current = value;
    },
  };
}

export interface ReplicatedPropertyOptions<T> {
  id: PropertyId;
  codec: ValueCodec<T>;
  binding: PropertyBinding<T>;
  /** Allow remote clients to write this property (default: false) */
  remoteWritable?: boolean;
}

/**
 * Property backed by a {@link PropertyBinding} and validated by a {@link ValueCodec}.
 */
export class ReplicatedProperty<T> implements Property {
  readonly id: PropertyId;
  readonly remoteWritable: boolean;
  private codec: ValueCodec<T>;
  private binding: PropertyBinding<T>;
  private context: ReplicationContext;
  private isFinalized = false;

  constructor(context: ReplicationContext, options: ReplicatedPropertyOptions<T>) {
    this.context = context;
    this.id = options.id;
    this.codec = options.codec;
    this.binding = options.binding;
    this.remoteWritable = options.remoteWritable ?? false;
  }

  get finalized(): boolean {
    return this.isFinalized;
  }

  getValue(): Encodable {
    this.assertLive();
    return this.codec.encode(this.binding.get());
  }

  setValue(value: Encodable): void {
    this.assertLive();
    const decoded = this.codec.decode(value);
    if (decoded === undefined) {
      throw new InvalidValueError(
        `[Property] ${propertyKey(this.id)} expects ${this.codec.kind}, got ${describeEncodable(value)}`,
      );
    }
    this.binding.set(decoded);
    this.broadcast(this.codec.encode(decoded));
  }

  /**
   * Typed write for simulation code. Runs the same validation as `setValue`.
   */
  update(value: T): void {
    this.setValue(this.codec.encode(value));
  }

  /**
   * Typed read for simulation code.
   */
  read(): T {
    this.assertLive();
    return this.binding.get();
  }

  subscribe(key: ConnectionKey): void {
    this.assertLive();
    if (!this.context.connections.isLive(key)) {
      throw new SubscriptionError(
        `[Property] Cannot subscribe closed connection ${key.toString()} to ${propertyKey(this.id)}`,
      );
    }
    this.context.subscriptions.subscribe(this.id, key);
  }

  unsubscribe(key: ConnectionKey): void {
    this.context.subscriptions.unsubscribe(this.id, key);
  }

  finalize(): void {
    if (this.isFinalized) return;
    this.isFinalized = true;

    const subscribers = this.context.subscriptions.removeProperty(this.id);
    for (const key of subscribers) {
      this.notify(key, () =>
        this.context.connections.deliver(key, {
          type: "removed",
          entity: this.id.entity,
          property: this.id.name,
        }),
      );
    }
  }

  private broadcast(value: Encodable): void {
    for (const key of this.context.subscriptions.subscribersOf(this.id)) {
      this.notify(key, () =>
        this.context.connections.deliver(key, {
          type: "update",
          entity: this.id.entity,
          property: this.id.name,
          value,
        }),
      );
    }
  }

  /**
   * One subscriber's failed delivery must not stop the fan-out to the others.
   */
  private notify(key: ConnectionKey, send: () => void): void {
    try {
      send();
    } catch (error) {
      if (!(error instanceof SendError)) throw error;
      console.warn(`[Property] Failed to notify ${key.toString()} about ${propertyKey(this.id)}: ${error.message}`);
    }
  }

  private assertLive(): void {
    if (this.isFinalized) {
      throw new PropertyGoneError(propertyKey(this.id));
    }
  }
}
