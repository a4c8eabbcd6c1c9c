// ============================================================================
// MAP DEFINITION - Bounds of a level's tile map
// ============================================================================

import type { Coordinate } from './coordinate';

export interface MapDef {
  readonly width: number;
  readonly height: number;
}

/** Create a new map definition */
export function createMapDef(width: number, height: number): MapDef {
  return {
    width: Math.max(1, Math.floor(width)),
    height: Math.max(1, Math.floor(height)),
  };
}

/** Check if coordinates are within map bounds */
export function isInBounds(map: MapDef, c: Coordinate): boolean {
  return c.x >= 0 && c.x < map.width && c.y >= 0 && c.y < map.height;
}

/** Which boundary edges a set of coordinates touches */
export interface EdgeContact {
  readonly left: boolean;
  readonly right: boolean;
  readonly top: boolean;
  readonly bottom: boolean;
}

export function edgeContact(map: MapDef, coords: Iterable<Coordinate>): EdgeContact {
  let left = false;
  let right = false;
  let top = false;
  let bottom = false;

  for (const c of coords) {
    left = left || c.x === 0;
    right = right || c.x === map.width - 1;
    top = top || c.y === map.height - 1;
    bottom = bottom || c.y === 0;
  }

  return { left, right, top, bottom };
}
