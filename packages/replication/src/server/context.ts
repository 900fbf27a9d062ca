import { ConnectionRegistry } from "./connection-registry.js";
import { SubscriptionRegistry } from "./subscription-registry.js";

/**
 * The shared registries, passed explicitly to every component that needs them.
 */
export interface ReplicationContext {
  readonly subscriptions: SubscriptionRegistry;
  readonly connections: ConnectionRegistry;
}

export function createReplicationContext(): ReplicationContext {
  const subscriptions = new SubscriptionRegistry();
  const connections = new ConnectionRegistry(subscriptions);
  return { subscriptions, connections };
}
