// ============================================================================
// LEVEL STATE - Everything one loaded level owns
// ============================================================================

import type { Avatar } from '../entities/avatar';
import type { Grid } from '../engine/grid';
import type { CollapseOrchestrator } from '../engine/collapse';

export interface LevelState {
  readonly grid: Grid;
  readonly orchestrator: CollapseOrchestrator;
  /** Map of occupantId -> Avatar for O(1) lookups */
  readonly avatars: Map<string, Avatar>;
}

/** Get avatar by ID (returns undefined if not found) */
export function getAvatar(state: LevelState, occupantId: string): Avatar | undefined {
  return state.avatars.get(occupantId);
}

/** Get all avatars as array */
export function getAllAvatars(state: LevelState): Avatar[] {
  return Array.from(state.avatars.values());
}
