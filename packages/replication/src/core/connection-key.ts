/**
 * Generational index identifying one live network connection.
 *
 * The slot is recycled once its connection is gone, but every reuse bumps the
 * generation, so a key held by a stale reference never resolves to the new
 * occupant of the slot.
 */
export class ConnectionKey {
  readonly slot: number;
  readonly generation: number;

  constructor(slot: number, generation: number) {
    if (!Number.isInteger(slot) || slot < 0) {
      throw new RangeError(`[ConnectionKey] slot must be a non-negative integer. Got: ${slot}`);
    }
    if (!Number.isInteger(generation) || generation < 0) {
      throw new RangeError(`[ConnectionKey] generation must be a non-negative integer. Got: ${generation}`);
    }
    this.slot = slot;
    this.generation = generation;
  }

  /**
   * Stable string form, usable as a map key.
   */
  get id(): string {
    return `${this.slot}v${this.generation}`;
  }

  equals(other: ConnectionKey): boolean {
    return this.slot === other.slot && this.generation === other.generation;
  }

  toString(): string {
    return `ConnectionKey(${this.id})`;
  }
}
