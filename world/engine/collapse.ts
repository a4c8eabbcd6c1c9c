// ============================================================================
// COLLAPSE ORCHESTRATOR - Destroys tiles and brings down what they held up
// ============================================================================

import type { Coordinate } from '../map/coordinate';
import type { CollapseConfig } from '../config';
import type { EffectsSink, SoundName } from '../effects/types';
import type { Tile } from '../entities/tile';
import type { CollapseCause, GridEvent, Result } from '../actions/types';
import type { Grid } from './grid';
import { ok, err } from '../actions/types';
import { areAdjacent } from '../map/coordinate';
import { isHittable } from '../entities/occupant';
import { transitionTile } from '../entities/tile';
import { reachableAvailable } from './connectivity';
import { findLandMassSplit } from './landMass';
import { isSupported } from './support';
import { createLogger } from '../utils/logger';

const log = createLogger('Collapse');

/** Where the player-controlled avatar currently stands */
export interface AvatarLocator {
  primaryAvatarCoordinate(): Coordinate | undefined;
}

export interface CollapseDeps {
  readonly config: CollapseConfig;
  readonly effects: EffectsSink;
  readonly avatars: AvatarLocator;
}

/**
 * All tile mutation after level build goes through here.
 *
 * Invariants:
 * - All operations are synchronous and run to completion
 * - Nothing throws; contract violations come back as Result errors
 * - Only the tile named in destroy() becomes DESTROYED, everything that
 *   comes down with it becomes FALLEN
 */
export class CollapseOrchestrator {
  constructor(
    private readonly grid: Grid,
    private readonly deps: CollapseDeps
  ) {}

  isSupported(tile: Tile): boolean {
    return isSupported(this.grid, tile, this.deps.config.minSupport);
  }

  /**
   * Destroy `tile`, then either drop the smaller land mass it cut off or
   * drop whatever around it lost its support.
   */
  destroy(tile: Tile): Result<GridEvent[]> {
    const check = this.checkTarget(tile);
    if (!check.ok) {
      return check;
    }

    this.deps.effects.emit({ type: 'LOOK_AT', coordinate: tile.coordinate });

    const events: GridEvent[] = [];
    const destroyed = transitionTile(tile, 'DESTROYED');
    if (!destroyed.ok) {
      return destroyed;
    }
    if (destroyed.value) events.push(destroyed.value);

    if (!this.collapseCutLandMass(tile, events)) {
      this.collapseUnsupportedNeighbors(tile, events);
    }

    return ok(events);
  }

  /**
   * True when `from` is right next to `tile` (diagonals included) and the
   * tile is still standing. Clears any pending acknowledgment on success.
   */
  canHitTile(tile: Tile, from: Coordinate): boolean {
    const canBeHit = tile.isAvailable && areAdjacent(tile.coordinate, from);
    if (canBeHit) {
      tile.resetAcknowledgment();
    }
    return canBeHit;
  }

  /**
   * A hammer blow on `tile`. Anything hittable standing on the tile takes
   * the blow instead; otherwise the tile is destroyed.
   */
  hitTile(tile: Tile, from: Coordinate): Result<GridEvent[]> {
    const check = this.checkTarget(tile);
    if (!check.ok) {
      return check;
    }
    if (!this.canHitTile(tile, from)) {
      return err('NOT_ADJACENT', `Tile ${tile.describe()} is out of reach from (${from.x},${from.y})`);
    }

    const hittables = tile.occupants.values().filter(isHittable);
    if (hittables.length === 0) {
      return this.destroy(tile);
    }

    const occupantIds: string[] = [];
    for (const occupant of hittables) {
      if (occupant.canBeHit()) {
        occupant.onHit();
        this.deps.effects.emit({ type: 'LOOK_AT', coordinate: tile.coordinate });
        this.deps.effects.emit({ type: 'PLAY_SOUND', sound: 'SLIME_HIT' });
        occupantIds.push(occupant.occupantId);
      }
    }

    // The hitter waits on this, so it has to resolve even if nobody was hit
    tile.startAcknowledgment();

    return ok([{ type: 'TILE_HIT_ABSORBED', x: tile.coordinate.x, y: tile.coordinate.y, occupantIds }]);
  }

  private checkTarget(tile: Tile): Result<void> {
    if (!this.grid.isWired) {
      return err('GRID_NOT_WIRED', 'Tiles cannot change before neighbors are wired');
    }
    if (this.grid.tileAt(tile.coordinate) !== tile) {
      return err('TILE_NOT_FOUND', `Tile ${tile.describe()} does not belong to this grid`);
    }
    if (!tile.isAvailable) {
      return err('TILE_UNAVAILABLE', `Tile ${tile.describe()} is already ${tile.state}`);
    }
    return ok(undefined);
  }

  /** Returns true when the cut split the grid and a mass was dropped */
  private collapseCutLandMass(tile: Tile, events: GridEvent[]): boolean {
    const split = findLandMassSplit(this.grid, this.grid.map, tile);
    if (!split) {
      return false;
    }

    const doomed = this.pickRegionToDrop(split.regionA, split.regionB);
    log.debug(
      `Cut at ${tile.describe()} split ${split.regionA.length}/${split.regionB.length} tiles, dropping ${doomed.length}`
    );
    this.collapseRegion(doomed, 'LAND_MASS', events);
    return true;
  }

  private collapseUnsupportedNeighbors(tile: Tile, events: GridEvent[]): void {
    const unsupported = tile.neighbors.filter(n => n.isAvailable && !this.isSupported(n));

    for (const neighbor of unsupported) {
      // An earlier region in this loop may already have taken it down
      if (!neighbor.isAvailable) continue;

      const region = reachableAvailable(neighbor);

      if (region.length === 0) {
        this.fall(neighbor, events);
        continue;
      }

      if (!region.some(member => this.isSupported(member))) {
        log.debug(`Region of ${region.length} next to ${tile.describe()} lost all support`);
        this.collapseRegion(region, 'LOCAL', events);
      }
    }
  }

  /** Smaller mass goes; on a tie the one without the player goes */
  private pickRegionToDrop(regionA: readonly Tile[], regionB: readonly Tile[]): readonly Tile[] {
    if (regionA.length < regionB.length) return regionA;
    if (regionB.length < regionA.length) return regionB;

    const at = this.deps.avatars.primaryAvatarCoordinate();
    const avatarTile = at ? this.grid.tileAt(at) : undefined;
    if (avatarTile && regionA.includes(avatarTile)) {
      return regionB;
    }
    return regionA;
  }

  private collapseRegion(region: readonly Tile[], cause: CollapseCause, events: GridEvent[]): void {
    const sound: SoundName =
      region.length > this.deps.config.minTilesFalling ? 'CRUMBLE_BIG' : 'CRUMBLE_SMALL';
    this.deps.effects.emit({ type: 'PLAY_SOUND', sound });
    events.push({ type: 'REGION_COLLAPSED', cause, size: region.length, sound });

    for (const member of region) {
      this.fall(member, events);
    }
  }

  private fall(tile: Tile, events: GridEvent[]): void {
    const result = transitionTile(tile, 'FALLEN');
    if (!result.ok) {
      log.warn(result.error.message);
      return;
    }
    if (result.value) events.push(result.value);
  }
}
