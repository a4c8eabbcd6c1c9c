// ============================================================================
// AVATAR - The player or an enemy standing on the grid
// Tiles only ever see avatars through the occupant capabilities.
// ============================================================================

import type { Coordinate } from '../map/coordinate';
import type { Clock } from '../utils/clock';
import type { Hittable, Killable } from './occupant';

export type AvatarKind = 'PLAYER' | 'ENEMY';

/** How long an enemy stays flattened after a hammer blow */
export const ENEMY_STUN_MS = 1500;

export class Avatar implements Killable {
  private position: Coordinate;
  private dead = false;

  constructor(
    readonly occupantId: string,
    readonly kind: AvatarKind,
    spawn: Coordinate
  ) {
    this.position = { x: spawn.x, y: spawn.y };
  }

  get coordinate(): Coordinate {
    return this.position;
  }

  get isDead(): boolean {
    return this.dead;
  }

  moveTo(c: Coordinate): void {
    this.position = { x: c.x, y: c.y };
  }

  triggerDeathByFall(): void {
    this.dead = true;
  }
}

/**
 * Enemies get stunned by the hammer and take the blow for their tile. The
 * blow counts as processed after `hitProcessDelayMs`, well before the stun
 * wears off.
 */
export class EnemyAvatar extends Avatar implements Hittable {
  private stunnedUntil: number | undefined;
  private acknowledgeAt: number | undefined;

  constructor(
    occupantId: string,
    spawn: Coordinate,
    private readonly clock: Clock,
    private readonly hitProcessDelayMs: number,
    private readonly stunMs = ENEMY_STUN_MS
  ) {
    super(occupantId, 'ENEMY', spawn);
  }

  get isStunned(): boolean {
    return this.stunnedUntil !== undefined && this.clock.now() < this.stunnedUntil;
  }

  canBeHit(): boolean {
    return !this.isDead && !this.isStunned;
  }

  onHit(): void {
    const now = this.clock.now();
    this.stunnedUntil = now + this.stunMs;
    this.acknowledgeAt = now + this.hitProcessDelayMs;
  }

  hitProcessed(): boolean {
    return this.acknowledgeAt !== undefined && this.clock.now() >= this.acknowledgeAt;
  }
}
