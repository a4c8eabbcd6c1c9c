// ============================================================================
// TILE - A destructible cell of the grid
// Dropping a tile kills every occupant standing on it.
// ============================================================================

import type { Coordinate } from '../map/coordinate';
import type { CollapseConfig } from '../config';
import type { EffectsSink } from '../effects/types';
import type { RandomSource } from '../utils/random';
import type { Clock } from '../utils/clock';
import type { Result, TileStateChangedEvent } from '../actions/types';
import { ok, err } from '../actions/types';
import { TILE_BREAK_SOUNDS } from '../effects/types';
import { pickRandom, randomRange } from '../utils/random';
import { OccupantSet } from './occupant';

export type TileState = 'ACTIVE' | 'HIGHLIGHTED' | 'DESTROYED' | 'FALLEN' | 'VOID';

/** States a tile never leaves */
export const TERMINAL_STATES: ReadonlySet<TileState> = new Set<TileState>([
  'DESTROYED',
  'FALLEN',
  'VOID',
]);

/** State changes the grid and the orchestrator make on a tile */
interface TileControls {
  setNeighbors(neighbors: readonly Tile[]): void;
  transitionTo(next: TileState): Result<TileStateChangedEvent | undefined>;
}

const controls = new WeakMap<Tile, TileControls>();

/** Collaborators a tile reaches for when its state changes */
export interface TileContext {
  readonly config: CollapseConfig;
  readonly effects: EffectsSink;
  readonly random: RandomSource;
  readonly clock: Clock;
}

export class Tile {
  readonly coordinate: Coordinate;
  readonly occupants = new OccupantSet();

  private currentState: TileState;
  private neighborTiles: readonly Tile[] = [];
  private rendered = true;
  private barrier = false;
  /** Deadline after which the last hit on this tile counts as processed */
  private acknowledgeAt: number | undefined;

  constructor(
    coordinate: Coordinate,
    private readonly context: TileContext,
    initialState: 'ACTIVE' | 'VOID' = 'ACTIVE'
  ) {
    this.coordinate = { x: coordinate.x, y: coordinate.y };
    this.currentState = initialState;
    this.applyPresentation();

    controls.set(this, {
      setNeighbors: neighbors => {
        this.neighborTiles = neighbors;
      },
      transitionTo: next => this.changeState(next),
    });
  }

  get state(): TileState {
    return this.currentState;
  }

  get neighbors(): readonly Tile[] {
    return this.neighborTiles;
  }

  get isAvailable(): boolean {
    return !TERMINAL_STATES.has(this.currentState);
  }

  get isAvailableAndEmpty(): boolean {
    return this.isAvailable && this.occupants.isEmpty();
  }

  /** Whether the tile model should be drawn */
  get isRendered(): boolean {
    return this.rendered;
  }

  /** Whether an impassable wall stands on the tile's footprint */
  get hasBarrier(): boolean {
    return this.barrier;
  }

  /** Start the hit acknowledgment countdown */
  startAcknowledgment(): void {
    this.acknowledgeAt = this.context.clock.now() + this.context.config.hitProcessDelayMs;
  }

  /** Forget any pending acknowledgment, a new hit is about to land */
  resetAcknowledgment(): void {
    this.acknowledgeAt = undefined;
  }

  hitProcessed(now: number = this.context.clock.now()): boolean {
    return this.acknowledgeAt !== undefined && now >= this.acknowledgeAt;
  }

  describe(): string {
    return `(${this.coordinate.x},${this.coordinate.y})`;
  }

  /**
   * Move to another state and run its entry side effects.
   * Terminal states are never left and VOID is only ever an initial state.
   * Returns undefined when the tile is already in the requested state.
   */
  private changeState(next: TileState): Result<TileStateChangedEvent | undefined> {
    const from = this.currentState;
    if (from === next) {
      return ok(undefined);
    }
    if (TERMINAL_STATES.has(from)) {
      return err('ILLEGAL_TRANSITION', `Tile ${this.describe()} is ${from} and cannot become ${next}`);
    }
    if (next === 'VOID') {
      return err('ILLEGAL_TRANSITION', `Tile ${this.describe()} can only be VOID from level build`);
    }

    this.currentState = next;
    this.applyPresentation();

    if (next === 'DESTROYED') {
      this.playBreakSound();
    }
    if (next === 'DESTROYED' || next === 'FALLEN') {
      this.drop();
    }

    return ok({ type: 'TILE_STATE_CHANGED', x: this.coordinate.x, y: this.coordinate.y, from, to: next });
  }

  private applyPresentation(): void {
    switch (this.currentState) {
      case 'ACTIVE':
      case 'HIGHLIGHTED':
      case 'FALLEN':
        this.rendered = true;
        this.barrier = false;
        break;
      case 'DESTROYED':
        // The hole left by a direct hit stays walled off
        this.rendered = true;
        this.barrier = true;
        break;
      case 'VOID':
        this.rendered = false;
        this.barrier = true;
        break;
    }
  }

  private playBreakSound(): void {
    const sound = pickRandom(this.context.random, TILE_BREAK_SOUNDS);
    if (sound) {
      this.context.effects.emit({ type: 'PLAY_SOUND', sound });
    }
  }

  private drop(): void {
    const { config, effects, random } = this.context;
    const drag = randomRange(random, config.dropDragMin, config.dropDragMax);
    effects.emit({ type: 'DROP_TILE', coordinate: this.coordinate, drag });

    for (const occupant of this.occupants.values()) {
      occupant.triggerDeathByFall();
      effects.emit({ type: 'KILL_OCCUPANT', occupantId: occupant.occupantId, coordinate: this.coordinate });
    }
    this.occupants.clear();

    this.startAcknowledgment();
  }
}

// ============================================================================
// GRID-ONLY OPERATIONS - Not re-exported from the package entry point
// ============================================================================

/** Set a tile's cardinal neighbors; used while the grid wires itself */
export function wireTile(tile: Tile, neighbors: readonly Tile[]): void {
  controls.get(tile)?.setNeighbors(neighbors);
}

/** Run a tile state change; only the grid and the collapse rules call this */
export function transitionTile(tile: Tile, next: TileState): Result<TileStateChangedEvent | undefined> {
  const control = controls.get(tile);
  if (!control) {
    return err('ILLEGAL_TRANSITION', `Tile ${tile.describe()} was not built as a grid tile`);
  }
  return control.transitionTo(next);
}
