// ============================================================================
// GRID - Coordinate -> Tile map for one level
// ============================================================================

import type { Coordinate } from '../map/coordinate';
import type { MapDef } from '../map/mapDef';
import type { TileContext } from '../entities/tile';
import type { GridEvent, Result } from '../actions/types';
import { ok, err } from '../actions/types';
import { ALL_DIRECTIONS, CARDINAL_DIRECTIONS, coordKey, offset } from '../map/coordinate';
import { isInBounds } from '../map/mapDef';
import { Tile, transitionTile, wireTile } from '../entities/tile';
import { reachableAvailable } from './connectivity';
import { randomIndex } from '../utils/random';

/**
 * Owns every tile of a level. Tiles are placed once, wired once, and never
 * removed: destruction only changes their state.
 */
export class Grid {
  private readonly tileMap = new Map<string, Tile>();
  private highlighted: Tile[] = [];
  private wired = false;

  constructor(
    readonly map: MapDef,
    private readonly context: TileContext
  ) {}

  get isWired(): boolean {
    return this.wired;
  }

  get size(): number {
    return this.tileMap.size;
  }

  /** Build-time only */
  placeTile(c: Coordinate, initialState: 'ACTIVE' | 'VOID' = 'ACTIVE'): Result<Tile> {
    if (this.wired) {
      return err('GRID_ALREADY_WIRED', 'Tiles cannot be added once neighbors are wired');
    }
    if (!Number.isInteger(c.x) || !Number.isInteger(c.y)) {
      return err('INVALID_COORDINATES', `(${c.x},${c.y}) is not an integer coordinate`);
    }
    if (!isInBounds(this.map, c)) {
      return err('OUT_OF_BOUNDS', `(${c.x},${c.y}) is outside the ${this.map.width}x${this.map.height} map`);
    }
    const key = coordKey(c);
    if (this.tileMap.has(key)) {
      return err('TILE_EXISTS', `A tile already exists at (${c.x},${c.y})`);
    }

    const tile = new Tile(c, this.context, initialState);
    this.tileMap.set(key, tile);
    return ok(tile);
  }

  tileAt(c: Coordinate): Tile | undefined {
    return this.tileMap.get(coordKey(c));
  }

  tiles(): Tile[] {
    return Array.from(this.tileMap.values());
  }

  /** Resolve each tile's cardinal neighbors. Safe to call again. */
  wireNeighbors(): void {
    for (const tile of this.tileMap.values()) {
      const neighbors: Tile[] = [];
      for (const direction of CARDINAL_DIRECTIONS) {
        const neighbor = this.tileAt(offset(tile.coordinate, direction));
        if (neighbor) {
          neighbors.push(neighbor);
        }
      }
      wireTile(tile, neighbors);
    }
    this.wired = true;
  }

  highlightedTiles(): readonly Tile[] {
    return this.highlighted;
  }

  /**
   * Drop the previous highlight ring and highlight every empty, available
   * tile among the eight cells around `center`.
   */
  highlightAround(center: Coordinate): Result<GridEvent[]> {
    if (!this.wired) {
      return err('GRID_NOT_WIRED', 'highlightAround called before wireNeighbors');
    }

    const events: GridEvent[] = [];
    const previous = this.highlighted;
    this.highlighted = [];

    for (const tile of previous) {
      if (tile.isAvailable) {
        const result = transitionTile(tile, 'ACTIVE');
        if (result.ok && result.value) events.push(result.value);
      }
    }

    for (const direction of ALL_DIRECTIONS) {
      const tile = this.tileAt(offset(center, direction));
      if (!tile || !tile.isAvailableAndEmpty) continue;

      const result = transitionTile(tile, 'HIGHLIGHTED');
      if (!result.ok) continue;
      if (result.value) events.push(result.value);
      this.highlighted.push(tile);
    }

    return ok(dropNoOpPairs(events));
  }

  /**
   * A wandering destination: somewhere on the land mass around `near` when
   * it has one, anywhere on the grid otherwise.
   */
  randomAvailableTile(near: Coordinate): Result<Tile> {
    if (!this.wired) {
      return err('GRID_NOT_WIRED', 'randomAvailableTile called before wireNeighbors');
    }
    if (!this.hasAvailableTile()) {
      return err('NO_AVAILABLE_TILE', 'Every tile on the grid has collapsed');
    }

    const origin = this.tileAt(near);
    const landMass = origin ? reachableAvailable(origin) : [];
    const pool = landMass.length > 0 ? landMass : this.tiles();

    // The pool holds at least one available tile, so this ends
    for (;;) {
      const candidate = pool[randomIndex(this.context.random, pool.length)];
      if (candidate.isAvailable) {
        return ok(candidate);
      }
    }
  }

  hasAvailableTile(): boolean {
    for (const tile of this.tileMap.values()) {
      if (tile.isAvailable) return true;
    }
    return false;
  }
}

/**
 * A tile that was highlighted, reset, then highlighted again in the same
 * call did not really change; keep the event list to actual changes.
 */
function dropNoOpPairs(events: GridEvent[]): GridEvent[] {
  const reset = new Map<string, number>();
  events.forEach((e, i) => {
    if (e.type === 'TILE_STATE_CHANGED' && e.to === 'ACTIVE') reset.set(`${e.x},${e.y}`, i);
  });

  const skip = new Set<number>();
  events.forEach((e, i) => {
    if (e.type !== 'TILE_STATE_CHANGED' || e.to !== 'HIGHLIGHTED') return;
    const resetIndex = reset.get(`${e.x},${e.y}`);
    if (resetIndex !== undefined) {
      skip.add(resetIndex);
      skip.add(i);
    }
  });

  return events.filter((_, i) => !skip.has(i));
}
