import type { ReplicationContext } from "../server/context.js";
import type { ValueCodec } from "./codecs.js";
import { cell, ReplicatedProperty, type Property, type PropertyBinding } from "./property.js";
import { isEntityId, type EntityId, type PropertyId } from "./types.js";

/**
 * Options for {@link Entity.defineProperty}. Provide either an initial value
 * (stored in a private cell) or a binding onto existing simulation state.
 */
export type DefinePropertyOptions<T> =
  | { codec: ValueCodec<T>; remoteWritable?: boolean; initial: T }
  | { codec: ValueCodec<T>; remoteWritable?: boolean; binding: PropertyBinding<T> };

/**
 * A simulation entity as seen by the network: an id and a set of properties.
 * Destroying the entity finalizes every property it owns.
 */
export class Entity {
  readonly id: EntityId;
  private context: ReplicationContext;
  private ownedProperties: Map<string, Property> = new Map();
  private destroyed = false;

  constructor(context: ReplicationContext, id: EntityId) {
    this.context = context;
    this.id = id;
  }

  /**
   * Create a property owned by this entity.
   */
  defineProperty<T>(name: string, options: DefinePropertyOptions<T>): ReplicatedProperty<T> {
    if (this.destroyed) {
      throw new Error(`[Entity] Cannot define "${name}" on destroyed entity ${this.id}`);
    }
    if (name.length === 0) {
      throw new Error(`[Entity] Property name must not be empty (entity ${this.id})`);
    }
    if (this.ownedProperties.has(name)) {
      throw new Error(`[Entity] Property "${name}" already defined on entity ${this.id}`);
    }

    const binding = "binding" in options ? options.binding : cell(options.initial);
    const property = new ReplicatedProperty<T>(this.context, {
      id: { entity: this.id, name },
      codec: options.codec,
      binding,
      remoteWritable: options.remoteWritable,
    });
    this.ownedProperties.set(name, property);
    return property;
  }

  property(name: string): Property | undefined {
    return this.ownedProperties.get(name);
  }

  properties(): Property[] {
    return Array.from(this.ownedProperties.values());
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    for (const property of this.ownedProperties.values()) {
      property.finalize();
    }
  }
}

/**
 * Allocates entity ids and resolves property ids coming off the wire.
 */
export class EntityDirectory {
  private context: ReplicationContext;
  private entities: Map<EntityId, Entity> = new Map();
  private nextId: EntityId = 1;

  constructor(context: ReplicationContext) {
    this.context = context;
  }

  spawn(): Entity {
    const entity = new Entity(this.context, this.nextId++);
    this.entities.set(entity.id, entity);
    return entity;
  }

  get(id: EntityId): Entity | undefined {
    return this.entities.get(id);
  }

  findProperty(id: PropertyId): Property | undefined {
    if (!isEntityId(id.entity)) return undefined;
    return this.entities.get(id.entity)?.property(id.name);
  }

  /**
   * Destroy an entity, finalizing its properties. Returns false if unknown.
   */
  despawn(id: EntityId): boolean {
    const entity = this.entities.get(id);
    if (!entity) return false;
    this.entities.delete(id);
    entity.destroy();
    return true;
  }

  getEntityCount(): number {
    return this.entities.size;
  }
}
