// ============================================================================
// ACTION PIPELINE - Every caller action goes through this pipeline
// ============================================================================

import type { LevelState } from '../state/levelState';
import type { Tile } from '../entities/tile';
import type { LevelAction, GridEvent, Result } from './types';
import { ok, err } from './types';

// ============================================================================
// VALIDATION
// ============================================================================

export function validateAction(state: LevelState, action: LevelAction): Result<void> {
  if (!state.grid.isWired) {
    return err('GRID_NOT_WIRED', 'The level has not finished building');
  }

  const coords = validateCoordinates(action.x, action.y);
  if (!coords.ok) {
    return coords;
  }

  switch (action.type) {
    case 'DESTROY_TILE':
      return validateTargetTile(state, action.x, action.y);
    case 'HIT_TILE': {
      const from = validateCoordinates(action.fromX, action.fromY);
      if (!from.ok) return from;
      return validateTargetTile(state, action.x, action.y);
    }
    case 'HIGHLIGHT_AROUND':
      return ok(undefined); // The center itself need not hold a tile
  }
}

function validateCoordinates(x: number, y: number): Result<void> {
  if (!Number.isInteger(x) || !Number.isInteger(y)) {
    return err('INVALID_COORDINATES', 'x and y must be integers');
  }
  return ok(undefined);
}

function validateTargetTile(state: LevelState, x: number, y: number): Result<void> {
  const tile = state.grid.tileAt({ x, y });
  if (!tile) {
    return err('TILE_NOT_FOUND', `No tile at (${x},${y})`);
  }
  if (!tile.isAvailable) {
    return err('TILE_UNAVAILABLE', `Tile at (${x},${y}) is already ${tile.state}`);
  }
  return ok(undefined);
}

// ============================================================================
// APPLICATION
// ============================================================================

export function applyAction(state: LevelState, action: LevelAction): Result<GridEvent[]> {
  switch (action.type) {
    case 'DESTROY_TILE':
      return withTile(state, action.x, action.y, tile => state.orchestrator.destroy(tile));
    case 'HIT_TILE':
      return withTile(state, action.x, action.y, tile =>
        state.orchestrator.hitTile(tile, { x: action.fromX, y: action.fromY })
      );
    case 'HIGHLIGHT_AROUND':
      return state.grid.highlightAround({ x: action.x, y: action.y });
  }
}

function withTile(
  state: LevelState,
  x: number,
  y: number,
  apply: (tile: Tile) => Result<GridEvent[]>
): Result<GridEvent[]> {
  const tile = state.grid.tileAt({ x, y });
  if (!tile) {
    return err('TILE_NOT_FOUND', `No tile at (${x},${y})`);
  }
  return apply(tile);
}

// ============================================================================
// UNIFIED PIPELINE ENTRY POINT
// ============================================================================

export function processAction(state: LevelState, action: LevelAction): Result<GridEvent[]> {
  const validationResult = validateAction(state, action);
  if (!validationResult.ok) {
    return validationResult;
  }
  return applyAction(state, action);
}
