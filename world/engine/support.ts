// ============================================================================
// SUPPORT - Does a tile still hang on to the grid edge?
// ============================================================================

import type { Tile } from '../entities/tile';
import type { Coordinate } from '../map/coordinate';
import { CARDINAL_DIRECTIONS, offset } from '../map/coordinate';

export interface TileLookup {
  tileAt(c: Coordinate): Tile | undefined;
}

/**
 * Walk each cardinal ray out of `tile`. A ray that leaves the grid is load
 * bearing; a ray that runs into an unavailable tile is not. The tile stands
 * while at least `minSupport` rays are load bearing.
 */
export function isSupported(grid: TileLookup, tile: Tile, minSupport: number): boolean {
  if (!tile.isAvailable) {
    return false;
  }
  return supportingDirections(grid, tile) >= minSupport;
}

/** Number of load-bearing rays, 0 to 4 */
export function supportingDirections(grid: TileLookup, tile: Tile): number {
  let count = 0;

  for (const direction of CARDINAL_DIRECTIONS) {
    let cursor = offset(tile.coordinate, direction);
    let next = grid.tileAt(cursor);

    while (next && next.isAvailable) {
      cursor = offset(cursor, direction);
      next = grid.tileAt(cursor);
    }

    // Stopped at the edge rather than at a hole
    if (!next) {
      count++;
    }
  }

  return count;
}
