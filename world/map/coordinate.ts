// ============================================================================
// COORDINATES & DIRECTIONS
// ============================================================================

/** Integer grid position. y grows upwards: row y = 0 is the bottom edge. */
export interface Coordinate {
  readonly x: number;
  readonly y: number;
}

export type Direction = Coordinate;

export function coord(x: number, y: number): Coordinate {
  return { x, y };
}

/** Hash key used by the grid's tile map */
export function coordKey(c: Coordinate): string {
  return `${c.x},${c.y}`;
}

export function sameCoord(a: Coordinate, b: Coordinate): boolean {
  return a.x === b.x && a.y === b.y;
}

export function offset(c: Coordinate, d: Direction, scale = 1): Coordinate {
  return { x: c.x + d.x * scale, y: c.y + d.y * scale };
}

export const UP: Direction = { x: 0, y: 1 };
export const LEFT: Direction = { x: -1, y: 0 };
export const DOWN: Direction = { x: 0, y: -1 };
export const RIGHT: Direction = { x: 1, y: 0 };

/** Adjacency and support rays. Order matters for traversal order. */
export const CARDINAL_DIRECTIONS: readonly Direction[] = [UP, LEFT, DOWN, RIGHT];

export const CORNER_DIRECTIONS: readonly Direction[] = [
  { x: -1, y: 1 },
  { x: -1, y: -1 },
  { x: 1, y: -1 },
  { x: 1, y: 1 },
];

/** Cardinals first, then corners */
export const ALL_DIRECTIONS: readonly Direction[] = [...CARDINAL_DIRECTIONS, ...CORNER_DIRECTIONS];

/** True when a is one of the eight cells surrounding b */
export function areAdjacent(a: Coordinate, b: Coordinate): boolean {
  return ALL_DIRECTIONS.some(d => sameCoord(a, offset(b, d)));
}
