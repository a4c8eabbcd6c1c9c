import 'dotenv/config';
import { createLogger } from './utils/logger';

const log = createLogger('Config');

export interface CollapseConfig {
  /** Cardinal rays that must reach the edge for a tile to stay up (1-4) */
  readonly minSupport: number;
  /** Regions larger than this play the big crumble */
  readonly minTilesFalling: number;
  /** Drag range applied to a dropping tile */
  readonly dropDragMin: number;
  readonly dropDragMax: number;
  /** How long after a hit/drop before the hit counts as processed */
  readonly hitProcessDelayMs: number;
  /** Emit debug log lines (CRUMBLE_DEBUG) */
  readonly debugLogging: boolean;
}

export const DEFAULT_COLLAPSE_CONFIG: CollapseConfig = Object.freeze({
  minSupport: 1,
  minTilesFalling: 6,
  dropDragMin: 0.5,
  dropDragMax: 2.5,
  hitProcessDelayMs: 250,
  debugLogging: false,
});

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  isValid: (value: number) => boolean
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || !isValid(value)) {
    log.warn(`Ignoring ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readFlag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  switch (raw.trim().toLowerCase()) {
    case '1':
    case 'true':
      return true;
    case '0':
    case 'false':
      return false;
    default:
      log.warn(`Ignoring ${name}=${raw}, using ${fallback}`);
      return fallback;
  }
}

/** Build the collapse settings from environment variables (and .env) */
export function loadCollapseConfig(env: Env = process.env): CollapseConfig {
  const d = DEFAULT_COLLAPSE_CONFIG;

  const minSupport = readNumber(
    env,
    'CRUMBLE_MIN_SUPPORT',
    d.minSupport,
    v => Number.isInteger(v) && v >= 1 && v <= 4
  );
  const minTilesFalling = readNumber(
    env,
    'CRUMBLE_MIN_TILES_FALLING',
    d.minTilesFalling,
    v => Number.isInteger(v) && v >= 0
  );
  let dropDragMin = readNumber(env, 'CRUMBLE_DROP_DRAG_MIN', d.dropDragMin, v => v >= 0);
  let dropDragMax = readNumber(env, 'CRUMBLE_DROP_DRAG_MAX', d.dropDragMax, v => v >= 0);
  const hitProcessDelayMs = readNumber(
    env,
    'CRUMBLE_HIT_PROCESS_DELAY_MS',
    d.hitProcessDelayMs,
    v => v >= 0
  );
  const debugLogging = readFlag(env, 'CRUMBLE_DEBUG', d.debugLogging);

  if (dropDragMin > dropDragMax) {
    log.warn(`Drag range ${dropDragMin}..${dropDragMax} is inverted, swapping`);
    [dropDragMin, dropDragMax] = [dropDragMax, dropDragMin];
  }

  return Object.freeze({
    minSupport,
    minTilesFalling,
    dropDragMin,
    dropDragMax,
    hitProcessDelayMs,
    debugLogging,
  });
}
