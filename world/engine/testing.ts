// Shared builders for the engine's tests

import type { Result } from '../actions/types';
import type { Tile, TileContext } from '../entities/tile';
import { transitionTile } from '../entities/tile';
import type { LevelOptions } from './level';
import { DEFAULT_COLLAPSE_CONFIG } from '../config';
import { RecordingEffects } from '../effects/types';
import { parseLevelLayout } from '../map/levelLayout';
import { createMapDef } from '../map/mapDef';
import { ManualClock } from '../utils/clock';
import { SeededRandom } from '../utils/random';
import { Grid } from './grid';
import { Level } from './level';

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

export interface TestContext extends TileContext {
  readonly effects: RecordingEffects;
  readonly clock: ManualClock;
}

/** Effects and clock are always fresh recorders, so only these two can be swapped */
export function testContext(overrides: Partial<Pick<TileContext, 'config' | 'random'>> = {}): TestContext {
  return {
    config: DEFAULT_COLLAPSE_CONFIG,
    random: new SeededRandom(7),
    ...overrides,
    effects: new RecordingEffects(),
    clock: new ManualClock(1000),
  };
}

/** A fully wired width x height grid of ACTIVE tiles */
export function rectGrid(width: number, height: number, context: TileContext = testContext()): Grid {
  const grid = new Grid(createMapDef(width, height), context);
  for (let x = 0; x < width; x++) {
    for (let y = 0; y < height; y++) {
      unwrap(grid.placeTile({ x, y }));
    }
  }
  grid.wireNeighbors();
  return grid;
}

export function rectRows(width: number, height: number): string[] {
  return Array.from({ length: height }, () => '.'.repeat(width));
}

export function buildLevel(rows: readonly string[], options: LevelOptions = {}): Level {
  return unwrap(Level.build(unwrap(parseLevelLayout(rows)), options));
}

export function mustTile(grid: Grid, x: number, y: number): Tile {
  const tile = grid.tileAt({ x, y });
  if (!tile) {
    throw new Error(`No tile at (${x},${y})`);
  }
  return tile;
}

/** Knock tiles out without running the collapse rules */
export function knockOut(grid: Grid, coords: ReadonlyArray<readonly [number, number]>): void {
  for (const [x, y] of coords) {
    unwrap(transitionTile(mustTile(grid, x, y), 'DESTROYED'));
  }
}

export function coordsOf(tiles: readonly Tile[]): string[] {
  return tiles.map(t => `${t.coordinate.x},${t.coordinate.y}`).sort();
}
