/**
 * Identity types shared across the replication core.
 *
 * @module core/types
 */

/** Identifier of a simulation entity, allocated by the entity directory. */
export type EntityId = number;

/**
 * Identity of one property: the owning entity plus the attribute name.
 */
export interface PropertyId {
  readonly entity: EntityId;
  readonly name: string;
}

/**
 * Stable string form of a property id, usable as a map key.
 */
export function propertyKey(id: PropertyId): string {
  return `${id.entity}.${id.name}`;
}

export function isEntityId(value: unknown): value is EntityId {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}
