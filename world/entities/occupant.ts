// ============================================================================
// OCCUPANTS - Bodies standing on a tile (player, enemies, anything killable)
// The engine only knows them through these capabilities.
// ============================================================================

/** Anything that dies when the tile under it falls */
export interface Killable {
  readonly occupantId: string;
  triggerDeathByFall(): void;
}

/** Anything the player's hammer can strike */
export interface Hittable {
  canBeHit(): boolean;
  onHit(): void;
  /** True once the hit has been visibly handled */
  hitProcessed(): boolean;
}

export type Occupant = Killable & Partial<Hittable>;

export type HittableOccupant = Killable & Hittable;

export function isHittable(occupant: Occupant): occupant is HittableOccupant {
  return (
    typeof occupant.canBeHit === 'function' &&
    typeof occupant.onHit === 'function' &&
    typeof occupant.hitProcessed === 'function'
  );
}

/**
 * Occupants currently overlapping a tile's footprint.
 * Membership is driven by external overlap detection, never by tile state.
 */
export class OccupantSet {
  private readonly members = new Map<string, Occupant>();

  /** Returns false when the occupant was already present */
  add(occupant: Occupant): boolean {
    if (this.members.has(occupant.occupantId)) {
      return false;
    }
    this.members.set(occupant.occupantId, occupant);
    return true;
  }

  remove(occupant: Occupant): boolean {
    return this.members.delete(occupant.occupantId);
  }

  has(occupant: Occupant): boolean {
    return this.members.has(occupant.occupantId);
  }

  get size(): number {
    return this.members.size;
  }

  isEmpty(): boolean {
    return this.members.size === 0;
  }

  values(): Occupant[] {
    return Array.from(this.members.values());
  }

  clear(): void {
    this.members.clear();
  }
}
