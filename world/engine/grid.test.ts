import { describe, it, expect } from 'vitest';
import { Grid } from './grid';
import { createMapDef } from '../map/mapDef';
import { Avatar } from '../entities/avatar';
import { SeededRandom } from '../utils/random';
import { coordsOf, knockOut, mustTile, rectGrid, testContext, unwrap } from './testing';

describe('Grid building', () => {
  it('rejects tiles outside the map or on top of each other', () => {
    const grid = new Grid(createMapDef(2, 2), testContext());
    unwrap(grid.placeTile({ x: 0, y: 0 }));

    const twice = grid.placeTile({ x: 0, y: 0 });
    const outside = grid.placeTile({ x: 2, y: 0 });
    const fractional = grid.placeTile({ x: 0.5, y: 1 });

    expect(twice.ok ? null : twice.error.code).toBe('TILE_EXISTS');
    expect(outside.ok ? null : outside.error.code).toBe('OUT_OF_BOUNDS');
    expect(fractional.ok ? null : fractional.error.code).toBe('INVALID_COORDINATES');
  });

  it('does not take new tiles once wired', () => {
    const grid = new Grid(createMapDef(2, 1), testContext());
    unwrap(grid.placeTile({ x: 0, y: 0 }));
    grid.wireNeighbors();

    const late = grid.placeTile({ x: 1, y: 0 });
    expect(late.ok ? null : late.error.code).toBe('GRID_ALREADY_WIRED');
  });

  it('returns nothing where no tile was placed', () => {
    const grid = rectGrid(3, 3);
    expect(grid.tileAt({ x: -1, y: 0 })).toBeUndefined();
    expect(grid.tileAt({ x: 3, y: 3 })).toBeUndefined();
    expect(grid.tileAt({ x: 1, y: 2 })?.coordinate).toEqual({ x: 1, y: 2 });
  });

  it('wires cardinal neighbors in up, left, down, right order', () => {
    const grid = rectGrid(3, 3);

    expect(mustTile(grid, 1, 1).neighbors.map(n => n.coordinate)).toEqual([
      { x: 1, y: 2 },
      { x: 0, y: 1 },
      { x: 1, y: 0 },
      { x: 2, y: 1 },
    ]);
    expect(mustTile(grid, 0, 0).neighbors.map(n => n.coordinate)).toEqual([
      { x: 0, y: 1 },
      { x: 1, y: 0 },
    ]);
  });

  it('keeps neighbor links symmetric', () => {
    const grid = new Grid(createMapDef(4, 3), testContext());
    // An irregular shape with a gap
    for (const [x, y] of [[0, 0], [1, 0], [2, 0], [3, 0], [0, 1], [2, 1], [3, 1], [0, 2], [1, 2]]) {
      unwrap(grid.placeTile({ x, y }));
    }
    grid.wireNeighbors();

    for (const a of grid.tiles()) {
      for (const b of a.neighbors) {
        expect(b.neighbors).toContain(a);
      }
    }
  });

  it('rewires to the same result', () => {
    const grid = rectGrid(3, 2);
    const before = grid.tiles().map(t => coordsOf(t.neighbors));

    grid.wireNeighbors();

    expect(grid.tiles().map(t => coordsOf(t.neighbors))).toEqual(before);
  });

  it('keeps a destroyed tile in place', () => {
    const grid = rectGrid(3, 3);
    const tile = mustTile(grid, 1, 1);

    knockOut(grid, [[1, 1]]);

    expect(grid.tileAt({ x: 1, y: 1 })).toBe(tile);
    expect(tile.state).toBe('DESTROYED');
    expect(tile.isAvailable).toBe(false);
    expect(grid.size).toBe(9);
  });
});

describe('Grid.highlightAround', () => {
  it('needs a wired grid', () => {
    const grid = new Grid(createMapDef(1, 1), testContext());
    const result = grid.highlightAround({ x: 0, y: 0 });
    expect(result.ok ? null : result.error.code).toBe('GRID_NOT_WIRED');
  });

  it('highlights the eight surrounding tiles', () => {
    const grid = rectGrid(3, 3);

    const events = unwrap(grid.highlightAround({ x: 1, y: 1 }));

    expect(events).toHaveLength(8);
    expect(coordsOf([...grid.highlightedTiles()])).toEqual([
      '0,0', '0,1', '0,2', '1,0', '1,2', '2,0', '2,1', '2,2',
    ]);
    expect(mustTile(grid, 1, 1).state).toBe('ACTIVE');
    expect(mustTile(grid, 0, 2).state).toBe('HIGHLIGHTED');
  });

  it('is idempotent for the same center', () => {
    const grid = rectGrid(3, 3);
    unwrap(grid.highlightAround({ x: 1, y: 1 }));
    const first = coordsOf([...grid.highlightedTiles()]);

    const events = unwrap(grid.highlightAround({ x: 1, y: 1 }));

    expect(events).toEqual([]);
    expect(coordsOf([...grid.highlightedTiles()])).toEqual(first);
  });

  it('returns the old ring to ACTIVE when the center moves', () => {
    const grid = rectGrid(3, 3);
    unwrap(grid.highlightAround({ x: 1, y: 1 }));

    const events = unwrap(grid.highlightAround({ x: 0, y: 0 }));

    expect(coordsOf([...grid.highlightedTiles()])).toEqual(['0,1', '1,0', '1,1']);
    expect(mustTile(grid, 2, 2).state).toBe('ACTIVE');
    expect(mustTile(grid, 0, 0).state).toBe('ACTIVE');
    expect(events.filter(e => e.type === 'TILE_STATE_CHANGED' && e.to === 'ACTIVE')).toHaveLength(6);
    expect(events.filter(e => e.type === 'TILE_STATE_CHANGED' && e.to === 'HIGHLIGHTED')).toHaveLength(1);
  });

  it('skips occupied and unavailable tiles', () => {
    const grid = rectGrid(3, 3);
    mustTile(grid, 1, 2).occupants.add(new Avatar('player', 'PLAYER', { x: 1, y: 2 }));
    knockOut(grid, [[0, 0]]);

    unwrap(grid.highlightAround({ x: 1, y: 1 }));

    expect(grid.highlightedTiles()).toHaveLength(6);
    expect(mustTile(grid, 1, 2).state).toBe('ACTIVE');
    expect(mustTile(grid, 0, 0).state).toBe('DESTROYED');
  });

  it('leaves a highlighted tile destroyed after it goes down', () => {
    const grid = rectGrid(3, 3);
    unwrap(grid.highlightAround({ x: 1, y: 1 }));
    knockOut(grid, [[1, 2]]);

    unwrap(grid.highlightAround({ x: 1, y: 1 }));

    expect(mustTile(grid, 1, 2).state).toBe('DESTROYED');
    expect(grid.highlightedTiles()).toHaveLength(7);
  });
});

describe('Grid.randomAvailableTile', () => {
  it('stays on the land mass around the origin', () => {
    const grid = rectGrid(5, 1, testContext({ random: new SeededRandom(42) }));
    knockOut(grid, [[2, 0]]);

    for (let i = 0; i < 20; i++) {
      const tile = unwrap(grid.randomAvailableTile({ x: 0, y: 0 }));
      expect(['0,0', '1,0']).toContain(`${tile.coordinate.x},${tile.coordinate.y}`);
    }
  });

  it('falls back to the whole grid when the origin is cut off', () => {
    const grid = rectGrid(3, 1, testContext({ random: new SeededRandom(3) }));
    knockOut(grid, [[1, 0]]);

    for (let i = 0; i < 20; i++) {
      const tile = unwrap(grid.randomAvailableTile({ x: 0, y: 0 }));
      expect(tile.isAvailable).toBe(true);
    }
  });

  it('falls back to the whole grid when no tile is at the origin', () => {
    const grid = rectGrid(2, 2);
    knockOut(grid, [[0, 0], [1, 0], [0, 1]]);

    const tile = unwrap(grid.randomAvailableTile({ x: 9, y: 9 }));
    expect(tile.coordinate).toEqual({ x: 1, y: 1 });
  });

  it('reports a fully collapsed grid', () => {
    const grid = rectGrid(2, 1);
    knockOut(grid, [[0, 0], [1, 0]]);

    const result = grid.randomAvailableTile({ x: 0, y: 0 });
    expect(result.ok ? null : result.error.code).toBe('NO_AVAILABLE_TILE');
  });
});
