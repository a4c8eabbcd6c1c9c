// ============================================================================
// LEVEL - The main API for interacting with one loaded level
// ============================================================================

import type { Coordinate } from '../map/coordinate';
import type { LevelLayout } from '../map/levelLayout';
import type { CollapseConfig } from '../config';
import type { EffectsSink } from '../effects/types';
import type { LevelState } from '../state/levelState';
import type { LevelAction, GridEvent, Result } from '../actions/types';
import type { Tile, TileContext, TileState } from '../entities/tile';
import type { RandomSource } from '../utils/random';
import type { Clock } from '../utils/clock';
import type { AvatarLocator } from './collapse';
import { ok, err } from '../actions/types';
import { DEFAULT_COLLAPSE_CONFIG } from '../config';
import { NULL_EFFECTS } from '../effects/types';
import { Avatar, EnemyAvatar } from '../entities/avatar';
import { createMapDef } from '../map/mapDef';
import { processAction } from '../actions/pipeline';
import { getAllAvatars, getAvatar } from '../state/levelState';
import { MATH_RANDOM } from '../utils/random';
import { SYSTEM_CLOCK } from '../utils/clock';
import { createLogger, setDebugLogging } from '../utils/logger';
import { CollapseOrchestrator } from './collapse';
import { Grid } from './grid';

const log = createLogger('Level');

// ============================================================================
// SNAPSHOT TYPE
// ============================================================================

export interface TileSnapshot {
  readonly x: number;
  readonly y: number;
  readonly state: TileState;
}

export interface LevelSnapshot {
  readonly width: number;
  readonly height: number;
  readonly tiles: readonly TileSnapshot[];
}

export interface LevelOptions {
  readonly config?: CollapseConfig;
  readonly effects?: EffectsSink;
  readonly random?: RandomSource;
  readonly clock?: Clock;
  /** Defaults to the position of the level's player avatar */
  readonly avatars?: AvatarLocator;
}

export const PLAYER_ID = 'player';

// ============================================================================
// LEVEL CLASS
// ============================================================================

/**
 * Owns the grid, its tiles and the avatars spawned on it. A reload builds a
 * new Level; nothing carries over from the old one.
 *
 * Invariants:
 * - All operations are synchronous
 * - The level never throws - errors are returned as Result
 */
export class Level {
  private constructor(private readonly state: LevelState) {}

  /** Place every cell of the layout, wire neighbors, spawn avatars */
  static build(layout: LevelLayout, options: LevelOptions = {}): Result<Level> {
    const clock = options.clock ?? SYSTEM_CLOCK;
    const context: TileContext = {
      config: options.config ?? DEFAULT_COLLAPSE_CONFIG,
      effects: options.effects ?? NULL_EFFECTS,
      random: options.random ?? MATH_RANDOM,
      clock,
    };

    setDebugLogging(context.config.debugLogging);

    const grid = new Grid(createMapDef(layout.width, layout.height), context);
    for (const cell of layout.cells) {
      const placed = grid.placeTile(cell, cell.kind === 'VOID' ? 'VOID' : 'ACTIVE');
      if (!placed.ok) {
        return placed;
      }
    }
    grid.wireNeighbors();

    const avatars = new Map<string, Avatar>();
    const avatarLocator: AvatarLocator = options.avatars ?? {
      primaryAvatarCoordinate: () => avatars.get(PLAYER_ID)?.coordinate,
    };
    const orchestrator = new CollapseOrchestrator(grid, {
      config: context.config,
      effects: context.effects,
      avatars: avatarLocator,
    });

    const level = new Level({ grid, orchestrator, avatars });

    if (layout.playerSpawn) {
      level.spawn(new Avatar(PLAYER_ID, 'PLAYER', layout.playerSpawn));
    }
    layout.enemySpawns.forEach((at, i) => {
      level.spawn(new EnemyAvatar(`enemy-${i}`, at, clock, context.config.hitProcessDelayMs));
    });

    log.debug(`Built ${layout.width}x${layout.height} level with ${avatars.size} avatars`);
    return ok(level);
  }

  get grid(): Grid {
    return this.state.grid;
  }

  get orchestrator(): CollapseOrchestrator {
    return this.state.orchestrator;
  }

  get player(): Avatar | undefined {
    return getAvatar(this.state, PLAYER_ID);
  }

  avatars(): Avatar[] {
    return getAllAvatars(this.state);
  }

  /**
   * Submit an action.
   * Actions go through the validation -> apply pipeline.
   * Returns events on success.
   */
  submitAction(action: LevelAction): Result<GridEvent[]> {
    return processAction(this.state, action);
  }

  /**
   * Move an avatar onto another tile, updating occupancy the way overlap
   * detection would. Dead avatars stay where they fell.
   */
  moveAvatar(occupantId: string, to: Coordinate): Result<void> {
    const avatar = getAvatar(this.state, occupantId);
    if (!avatar) {
      return err('AVATAR_NOT_FOUND', `Avatar ${occupantId} is not on this level`);
    }
    const target = this.state.grid.tileAt(to);
    if (!target) {
      return err('TILE_NOT_FOUND', `No tile at (${to.x},${to.y})`);
    }
    if (avatar.isDead) {
      return ok(undefined);
    }

    this.state.grid.tileAt(avatar.coordinate)?.occupants.remove(avatar);
    avatar.moveTo(to);
    if (target.isAvailable) {
      target.occupants.add(avatar);
    }
    return ok(undefined);
  }

  randomAvailableTile(near: Coordinate): Result<Tile> {
    return this.state.grid.randomAvailableTile(near);
  }

  /** True once nothing on the grid can be stood on */
  isCleared(): boolean {
    return !this.state.grid.hasAvailableTile();
  }

  snapshot(): LevelSnapshot {
    const { grid } = this.state;
    return {
      width: grid.map.width,
      height: grid.map.height,
      tiles: grid.tiles().map(t => ({ x: t.coordinate.x, y: t.coordinate.y, state: t.state })),
    };
  }

  private spawn(avatar: Avatar): void {
    this.state.avatars.set(avatar.occupantId, avatar);
    this.state.grid.tileAt(avatar.coordinate)?.occupants.add(avatar);
  }
}
