// ============================================================================
// WORLD MODULE - Structural integrity of a crumbling tile grid
// ============================================================================

// Core engine
export { Level, PLAYER_ID } from './engine/level';
export type { LevelSnapshot, TileSnapshot, LevelOptions } from './engine/level';
export { Grid } from './engine/grid';
export { CollapseOrchestrator } from './engine/collapse';
export type { AvatarLocator, CollapseDeps } from './engine/collapse';
export { isSupported, supportingDirections } from './engine/support';
export type { TileLookup } from './engine/support';
export { floodFill, reachableAvailable, reachableUnavailable, sameRegion } from './engine/connectivity';
export { axisProbes, chooseProbes, findLandMassSplit } from './engine/landMass';
export type { AxisProbes, ProbeChoice, LandMassSplit } from './engine/landMass';

// Entities
export { Tile, TERMINAL_STATES } from './entities/tile';
export type { TileState, TileContext } from './entities/tile';
export { OccupantSet, isHittable } from './entities/occupant';
export type { Occupant, Killable, Hittable, HittableOccupant } from './entities/occupant';
export { Avatar, EnemyAvatar, ENEMY_STUN_MS } from './entities/avatar';
export type { AvatarKind } from './entities/avatar';

// Map
export {
  coord,
  coordKey,
  sameCoord,
  offset,
  areAdjacent,
  UP,
  LEFT,
  DOWN,
  RIGHT,
  CARDINAL_DIRECTIONS,
  CORNER_DIRECTIONS,
  ALL_DIRECTIONS,
} from './map/coordinate';
export type { Coordinate, Direction } from './map/coordinate';
export { createMapDef, isInBounds, edgeContact } from './map/mapDef';
export type { MapDef, EdgeContact } from './map/mapDef';
export { parseLevelLayout } from './map/levelLayout';
export type { LevelLayout, LayoutCell, CellKind } from './map/levelLayout';

// Actions & Events
export type {
  LevelAction,
  DestroyTileAction,
  HitTileAction,
  HighlightAroundAction,
  GridEvent,
  TileStateChangedEvent,
  RegionCollapsedEvent,
  TileHitAbsorbedEvent,
  CollapseCause,
  ErrorCode,
  Result,
  ResultOk,
  ResultErr,
} from './actions/types';
export { ok, err } from './actions/types';

// Pipeline (exposed for testing/advanced use)
export { validateAction, applyAction, processAction } from './actions/pipeline';

// Effects
export { NULL_EFFECTS, RecordingEffects, TILE_BREAK_SOUNDS } from './effects/types';
export type { Effect, EffectsSink, SoundName } from './effects/types';

// Config & utilities
export { DEFAULT_COLLAPSE_CONFIG, loadCollapseConfig } from './config';
export type { CollapseConfig } from './config';
export { SeededRandom, MATH_RANDOM } from './utils/random';
export type { RandomSource } from './utils/random';
export { ManualClock, SYSTEM_CLOCK } from './utils/clock';
export type { Clock } from './utils/clock';
export { createLogger, setDebugLogging } from './utils/logger';
export type { Logger } from './utils/logger';

// State (exposed for testing/advanced use)
export type { LevelState } from './state/levelState';
export { getAvatar, getAllAvatars } from './state/levelState';
