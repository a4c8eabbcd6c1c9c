import type { TileState } from '../entities/tile';
import type { SoundName } from '../effects/types';

// ============================================================================
// LEVEL ACTIONS - The ONLY way for callers to mutate a level
// ============================================================================

/** Destroy the tile at grid coordinates */
export interface DestroyTileAction {
  readonly type: 'DESTROY_TILE';
  readonly x: number;
  readonly y: number;
}

/** Hammer hit on a tile, swung from the hitter's coordinates */
export interface HitTileAction {
  readonly type: 'HIT_TILE';
  readonly x: number;
  readonly y: number;
  readonly fromX: number;
  readonly fromY: number;
}

/** Recompute the highlighted ring around a coordinate */
export interface HighlightAroundAction {
  readonly type: 'HIGHLIGHT_AROUND';
  readonly x: number;
  readonly y: number;
}

/** Discriminated union of all possible actions */
export type LevelAction = DestroyTileAction | HitTileAction | HighlightAroundAction;

// ============================================================================
// GRID EVENTS - Outputs returned by the engine (never mutate external systems)
// ============================================================================

/** Emitted whenever a tile changes state */
export interface TileStateChangedEvent {
  readonly type: 'TILE_STATE_CHANGED';
  readonly x: number;
  readonly y: number;
  readonly from: TileState;
  readonly to: TileState;
}

export type CollapseCause = 'LAND_MASS' | 'LOCAL';

/** Emitted once per collapsed region */
export interface RegionCollapsedEvent {
  readonly type: 'REGION_COLLAPSED';
  readonly cause: CollapseCause;
  readonly size: number;
  readonly sound: SoundName;
}

/** Emitted when occupants take a hit in place of the tile under them */
export interface TileHitAbsorbedEvent {
  readonly type: 'TILE_HIT_ABSORBED';
  readonly x: number;
  readonly y: number;
  readonly occupantIds: readonly string[];
}

/** Discriminated union of all grid events */
export type GridEvent =
  | TileStateChangedEvent
  | RegionCollapsedEvent
  | TileHitAbsorbedEvent;

// ============================================================================
// RESULT TYPE - The engine never throws, returns Result instead
// ============================================================================

export type ErrorCode =
  | 'GRID_NOT_WIRED'
  | 'GRID_ALREADY_WIRED'
  | 'TILE_EXISTS'
  | 'OUT_OF_BOUNDS'
  | 'TILE_NOT_FOUND'
  | 'TILE_UNAVAILABLE'
  | 'ILLEGAL_TRANSITION'
  | 'NO_AVAILABLE_TILE'
  | 'NOT_ADJACENT'
  | 'AVATAR_NOT_FOUND'
  | 'INVALID_COORDINATES'
  | 'INVALID_LAYOUT';

export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ResultErr {
  readonly ok: false;
  readonly error: {
    readonly code: ErrorCode;
    readonly message: string;
  };
}

export type Result<T> = ResultOk<T> | ResultErr;

/** Helper to create success result */
export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

/** Helper to create error result */
export function err(code: ErrorCode, message: string): ResultErr {
  return { ok: false, error: { code, message } };
}
