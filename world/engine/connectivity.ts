// ============================================================================
// CONNECTIVITY - Flood fills over the neighbor graph
// ============================================================================

import type { Tile } from '../entities/tile';

export type TilePredicate = (tile: Tile) => boolean;

/**
 * Depth-first fill over neighbor links, restricted to tiles matching `accept`.
 *
 * The fill starts from the seed's neighbors and the seed is not pre-marked:
 * it shows up in the result only when it matches `accept` and is reached
 * back through a matching neighbor. Tiles come out in the pre-order a
 * recursive walk would produce (neighbors in cardinal order), but the walk
 * keeps its own stack so region size never affects call depth.
 */
export function floodFill(seed: Tile, accept: TilePredicate): Tile[] {
  const found: Tile[] = [];
  const visited = new Set<Tile>();
  const stack: Array<{ tile: Tile; next: number }> = [{ tile: seed, next: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.next >= frame.tile.neighbors.length) {
      stack.pop();
      continue;
    }

    const child = frame.tile.neighbors[frame.next];
    frame.next++;

    if (!visited.has(child) && accept(child)) {
      visited.add(child);
      found.push(child);
      stack.push({ tile: child, next: 0 });
    }
  }

  return found;
}

/** The land mass around `from` */
export function reachableAvailable(from: Tile): Tile[] {
  return floodFill(from, t => t.isAvailable);
}

/** The cluster of destroyed/fallen/void tiles touching `from` */
export function reachableUnavailable(from: Tile): Tile[] {
  return floodFill(from, t => !t.isAvailable);
}

/** Same members, regardless of order */
export function sameRegion(a: readonly Tile[], b: readonly Tile[]): boolean {
  if (a.length !== b.length) return false;
  const members = new Set(b);
  return a.every(t => members.has(t));
}
