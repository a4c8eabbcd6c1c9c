import { afterEach, describe, it, expect, vi } from 'vitest';
import { PLAYER_ID } from './level';
import { EnemyAvatar } from '../entities/avatar';
import { RecordingEffects } from '../effects/types';
import { ManualClock } from '../utils/clock';
import { DEFAULT_COLLAPSE_CONFIG } from '../config';
import { setDebugLogging } from '../utils/logger';
import { buildLevel, mustTile, unwrap } from './testing';

const ARENA = [
  '.....',
  '..E..',
  '.....',
  'x...x',
  'P....',
];

describe('Level.build', () => {
  it('places every cell and spawns avatars on their tiles', () => {
    const level = buildLevel(ARENA);
    const snapshot = level.snapshot();

    expect(snapshot.width).toBe(5);
    expect(snapshot.height).toBe(5);
    expect(snapshot.tiles).toHaveLength(25);
    expect(snapshot.tiles.filter(t => t.state === 'VOID')).toEqual([
      { x: 0, y: 1, state: 'VOID' },
      { x: 4, y: 1, state: 'VOID' },
    ]);

    expect(level.player?.coordinate).toEqual({ x: 0, y: 0 });
    expect(mustTile(level.grid, 0, 0).occupants.values()).toEqual([level.player]);
    expect(mustTile(level.grid, 2, 3).occupants.values().map(o => o.occupantId)).toEqual(['enemy-0']);
    expect(level.grid.isWired).toBe(true);
  });

  describe('debug logging', () => {
    afterEach(() => {
      setDebugLogging(false);
      vi.restoreAllMocks();
    });

    it('follows the config it was built with', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

      buildLevel(['P'], { config: { ...DEFAULT_COLLAPSE_CONFIG, debugLogging: true } });
      expect(debug).toHaveBeenCalledWith('[Level] Built 1x1 level with 1 avatars');

      debug.mockClear();
      buildLevel(['P']);
      expect(debug).not.toHaveBeenCalled();
    });
  });
});

describe('Level.submitAction', () => {
  it('rejects coordinates that are not integers', () => {
    const level = buildLevel(ARENA);
    const result = level.submitAction({ type: 'DESTROY_TILE', x: 1.5, y: 0 });
    expect(result.ok ? null : result.error.code).toBe('INVALID_COORDINATES');
  });

  it('rejects cells without a tile', () => {
    const level = buildLevel(ARENA);
    const result = level.submitAction({ type: 'DESTROY_TILE', x: 9, y: 9 });
    expect(result.ok ? null : result.error.code).toBe('TILE_NOT_FOUND');
  });

  it('rejects void tiles', () => {
    const level = buildLevel(ARENA);
    const result = level.submitAction({ type: 'DESTROY_TILE', x: 0, y: 1 });
    expect(result.ok ? null : result.error.code).toBe('TILE_UNAVAILABLE');
  });

  it('highlights around the player, skipping void', () => {
    const level = buildLevel(ARENA);

    const events = unwrap(level.submitAction({ type: 'HIGHLIGHT_AROUND', x: 0, y: 0 }));

    expect(events).toEqual([
      { type: 'TILE_STATE_CHANGED', x: 1, y: 0, from: 'ACTIVE', to: 'HIGHLIGHTED' },
      { type: 'TILE_STATE_CHANGED', x: 1, y: 1, from: 'ACTIVE', to: 'HIGHLIGHTED' },
    ]);
  });

  it('lets the enemy absorb a hit on its tile', () => {
    const clock = new ManualClock();
    const level = buildLevel(ARENA, { clock });
    const enemy = level.avatars().find(a => a.occupantId === 'enemy-0');

    const events = unwrap(level.submitAction({ type: 'HIT_TILE', x: 2, y: 3, fromX: 2, fromY: 2 }));

    expect(events).toEqual([{ type: 'TILE_HIT_ABSORBED', x: 2, y: 3, occupantIds: ['enemy-0'] }]);
    expect(mustTile(level.grid, 2, 3).state).toBe('ACTIVE');

    clock.advance(DEFAULT_COLLAPSE_CONFIG.hitProcessDelayMs);
    expect(enemy instanceof EnemyAvatar && enemy.hitProcessed()).toBe(true);
  });

  it('drops the half of a cut level the player is not on', () => {
    const effects = new RecordingEffects();
    const level = buildLevel(['.....', '.....', 'P....'], { effects });

    for (const y of [0, 1, 2]) {
      unwrap(level.submitAction({ type: 'DESTROY_TILE', x: 2, y }));
    }

    const states = level.snapshot().tiles;
    expect(states.filter(t => t.x > 2).every(t => t.state === 'FALLEN')).toBe(true);
    expect(states.filter(t => t.x < 2).every(t => t.state === 'ACTIVE')).toBe(true);
    expect(level.player?.isDead).toBe(false);
    expect(effects.ofType('PLAY_SOUND').filter(e => e.sound.startsWith('CRUMBLE'))).toEqual([
      { type: 'PLAY_SOUND', sound: 'CRUMBLE_SMALL' },
    ]);
  });
});

describe('Level.moveAvatar', () => {
  it('moves occupancy from one tile to the next', () => {
    const level = buildLevel(ARENA);

    unwrap(level.moveAvatar(PLAYER_ID, { x: 1, y: 0 }));

    expect(mustTile(level.grid, 0, 0).occupants.isEmpty()).toBe(true);
    expect(mustTile(level.grid, 1, 0).occupants.values()).toEqual([level.player]);
    expect(level.player?.coordinate).toEqual({ x: 1, y: 0 });
  });

  it('does not know unknown avatars', () => {
    const level = buildLevel(ARENA);
    const result = level.moveAvatar('ghost', { x: 1, y: 0 });
    expect(result.ok ? null : result.error.code).toBe('AVATAR_NOT_FOUND');
  });
});

describe('Level.isCleared', () => {
  it('is cleared once the last tile is gone', () => {
    const level = buildLevel(['P']);
    expect(level.isCleared()).toBe(false);

    unwrap(level.submitAction({ type: 'DESTROY_TILE', x: 0, y: 0 }));

    expect(level.isCleared()).toBe(true);
    expect(level.player?.isDead).toBe(true);
    const next = level.randomAvailableTile({ x: 0, y: 0 });
    expect(next.ok ? null : next.error.code).toBe('NO_AVAILABLE_TILE');
  });
});
