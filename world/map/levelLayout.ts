// ============================================================================
// LEVEL LAYOUT - Text description of a level's cells
//
//   .  tile            x  void (present, never walkable)
//   P  player spawn    E  enemy spawn
//
// The first row is the top edge of the map (highest y).
// ============================================================================

import type { Coordinate } from './coordinate';
import type { Result } from '../actions/types';
import { ok, err } from '../actions/types';

export type CellKind = 'TILE' | 'VOID';

export interface LayoutCell {
  readonly x: number;
  readonly y: number;
  readonly kind: CellKind;
}

export interface LevelLayout {
  readonly width: number;
  readonly height: number;
  readonly cells: readonly LayoutCell[];
  readonly playerSpawn: Coordinate | undefined;
  readonly enemySpawns: readonly Coordinate[];
}

export function parseLevelLayout(rows: readonly string[]): Result<LevelLayout> {
  const lines = rows.map(r => r.trim()).filter(r => r.length > 0);
  if (lines.length === 0) {
    return err('INVALID_LAYOUT', 'Layout has no rows');
  }

  const width = lines[0].length;
  const height = lines.length;
  const cells: LayoutCell[] = [];
  const enemySpawns: Coordinate[] = [];
  let playerSpawn: Coordinate | undefined;

  for (let row = 0; row < height; row++) {
    const line = lines[row];
    if (line.length !== width) {
      return err('INVALID_LAYOUT', `Row ${row} is ${line.length} cells wide, expected ${width}`);
    }

    const y = height - 1 - row;
    for (let x = 0; x < width; x++) {
      const symbol = line[x];
      switch (symbol) {
        case '.':
          cells.push({ x, y, kind: 'TILE' });
          break;
        case 'x':
          cells.push({ x, y, kind: 'VOID' });
          break;
        case 'P':
          if (playerSpawn) {
            return err('INVALID_LAYOUT', `Second player spawn at (${x},${y})`);
          }
          playerSpawn = { x, y };
          cells.push({ x, y, kind: 'TILE' });
          break;
        case 'E':
          enemySpawns.push({ x, y });
          cells.push({ x, y, kind: 'TILE' });
          break;
        default:
          return err('INVALID_LAYOUT', `Unknown cell '${symbol}' at (${x},${y})`);
      }
    }
  }

  return ok({ width, height, cells, playerSpawn, enemySpawns });
}
