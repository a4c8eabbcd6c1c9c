import type { Coordinate } from '../map/coordinate';

// ============================================================================
// EFFECTS - Named side effects the engine asks its collaborators to perform
// ============================================================================

export type SoundName =
  | 'TILE_BREAK_ONE'
  | 'TILE_BREAK_TWO'
  | 'TILE_BREAK_THREE'
  | 'CRUMBLE_SMALL'
  | 'CRUMBLE_BIG'
  | 'SLIME_HIT';

/** Sounds a directly destroyed tile picks from */
export const TILE_BREAK_SOUNDS: readonly SoundName[] = [
  'TILE_BREAK_ONE',
  'TILE_BREAK_TWO',
  'TILE_BREAK_THREE',
];

export interface PlaySoundEffect {
  readonly type: 'PLAY_SOUND';
  readonly sound: SoundName;
}

/** Start the physical fall of a tile; the engine never waits for it */
export interface DropTileEffect {
  readonly type: 'DROP_TILE';
  readonly coordinate: Coordinate;
  readonly drag: number;
}

export interface KillOccupantEffect {
  readonly type: 'KILL_OCCUPANT';
  readonly occupantId: string;
  readonly coordinate: Coordinate;
}

/** Turn the primary avatar (and camera) towards a tile */
export interface LookAtEffect {
  readonly type: 'LOOK_AT';
  readonly coordinate: Coordinate;
}

export type Effect = PlaySoundEffect | DropTileEffect | KillOccupantEffect | LookAtEffect;

export interface EffectsSink {
  emit(effect: Effect): void;
}

/** Sink for headless runs */
export const NULL_EFFECTS: EffectsSink = {
  emit: () => {},
};

/** Sink that keeps every effect, in order */
export class RecordingEffects implements EffectsSink {
  readonly effects: Effect[] = [];

  emit(effect: Effect): void {
    this.effects.push(effect);
  }

  ofType<K extends Effect['type']>(type: K): Extract<Effect, { type: K }>[] {
    return this.effects.filter((e): e is Extract<Effect, { type: K }> => e.type === type);
  }

  clear(): void {
    this.effects.length = 0;
  }
}
