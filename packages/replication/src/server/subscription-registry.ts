import type { ConnectionKey } from "../core/connection-key.js";
import { propertyKey, type PropertyId } from "../core/types.js";

/**
 * Two-way index of (property, connection) subscriptions.
 *
 * - property -> connections, for fan-out on every value change
 * - connection -> properties, for teardown when a session closes
 *
 * Both indices are updated together so they always agree. Removing a
 * connection only touches that connection's own entries.
 */
export class SubscriptionRegistry {
  /** property key -> (connection id -> key), in subscription order */
  private byProperty: Map<string, Map<string, ConnectionKey>> = new Map();
  /** connection id -> (property key -> property id) */
  private byConnection: Map<string, Map<string, PropertyId>> = new Map();
  private count = 0;

  /**
   * Add a subscription. Returns false if it already existed.
   */
  subscribe(property: PropertyId, key: ConnectionKey): boolean {
    const propKey = propertyKey(property);
    let subscribers = this.byProperty.get(propKey);
    if (subscribers?.has(key.id)) {
      return false;
    }
    if (!subscribers) {
      subscribers = new Map();
      this.byProperty.set(propKey, subscribers);
    }
    subscribers.set(key.id, key);

    let subscriptions = this.byConnection.get(key.id);
    if (!subscriptions) {
      subscriptions = new Map();
      this.byConnection.set(key.id, subscriptions);
    }
    subscriptions.set(propKey, property);

    this.count++;
    return true;
  }

  /**
   * Remove a subscription. Returns false if there was none.
   */
  unsubscribe(property: PropertyId, key: ConnectionKey): boolean {
    const propKey = propertyKey(property);
    const subscribers = this.byProperty.get(propKey);
    if (!subscribers?.delete(key.id)) {
      return false;
    }
    if (subscribers.size === 0) {
      this.byProperty.delete(propKey);
    }

    const subscriptions = this.byConnection.get(key.id);
    subscriptions?.delete(propKey);
    if (subscriptions?.size === 0) {
      this.byConnection.delete(key.id);
    }

    this.count--;
    return true;
  }

  isSubscribed(property: PropertyId, key: ConnectionKey): boolean {
    return this.byProperty.get(propertyKey(property))?.has(key.id) ?? false;
  }

  /**
   * Snapshot of a property's subscribers, in subscription order.
   * Safe to iterate while subscriptions change.
   */
  subscribersOf(property: PropertyId): ConnectionKey[] {
    const subscribers = this.byProperty.get(propertyKey(property));
    return subscribers ? Array.from(subscribers.values()) : [];
  }

  subscriptionsOf(key: ConnectionKey): PropertyId[] {
    const subscriptions = this.byConnection.get(key.id);
    return subscriptions ? Array.from(subscriptions.values()) : [];
  }

  /**
   * Drop every subscription to a property and return who was subscribed.
   */
  removeProperty(property: PropertyId): ConnectionKey[] {
    const propKey = propertyKey(property);
    const subscribers = this.byProperty.get(propKey);
    if (!subscribers) return [];
    this.byProperty.delete(propKey);

    for (const id of subscribers.keys()) {
      const subscriptions = this.byConnection.get(id);
      subscriptions?.delete(propKey);
      if (subscriptions?.size === 0) {
        this.byConnection.delete(id);
      }
    }

    this.count -= subscribers.size;
    return Array.from(subscribers.values());
  }

  /**
   * Drop every subscription held by a connection and return the properties it was subscribed to.
   */
  removeConnection(key: ConnectionKey): PropertyId[] {
    const subscriptions = this.byConnection.get(key.id);
    if (!subscriptions) return [];
    this.byConnection.delete(key.id);

    for (const propKey of subscriptions.keys()) {
      const subscribers = this.byProperty.get(propKey);
      subscribers?.delete(key.id);
      if (subscribers?.size === 0) {
        this.byProperty.delete(propKey);
      }
    }

    this.count -= subscriptions.size;
    return Array.from(subscriptions.values());
  }

  /** Total number of subscriptions */
  get size(): number {
    return this.count;
  }
}
