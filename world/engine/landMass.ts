// ============================================================================
// LAND MASS CUT - Did a destroyed cluster slice the grid in two?
//
// This is a geometric heuristic, not a minimum cut: the two probe tiles are
// picked from which map edges the destroyed cluster touches. It can miss a
// split on irregular maps, and that is the expected behaviour.
// ============================================================================

import type { Tile } from '../entities/tile';
import type { Direction } from '../map/coordinate';
import type { EdgeContact, MapDef } from '../map/mapDef';
import type { TileLookup } from './support';
import { RIGHT, UP, offset } from '../map/coordinate';
import { edgeContact } from '../map/mapDef';
import { reachableAvailable, reachableUnavailable, sameRegion } from './connectivity';

/** First available tiles found one step off the cluster, per axis direction */
export interface AxisProbes {
  readonly positive: Tile | undefined;
  readonly negative: Tile | undefined;
}

export interface ProbeChoice {
  /** Probe that is always on its own side of the cut */
  readonly first: Tile | undefined;
  readonly second: Tile | undefined;
  /** Replacement for `second` when both probes land on the same mass */
  readonly wild: Tile | undefined;
}

export interface LandMassSplit {
  readonly cluster: readonly Tile[];
  readonly regionA: readonly Tile[];
  readonly regionB: readonly Tile[];
}

/**
 * Scan the cluster in order; the first member with an available tile right
 * after it along +axis gives the positive probe, likewise for -axis.
 */
export function axisProbes(grid: TileLookup, cluster: readonly Tile[], axis: Direction): AxisProbes {
  let positive: Tile | undefined;
  let negative: Tile | undefined;

  for (const member of cluster) {
    if (positive && negative) break;

    if (!positive) {
      const candidate = grid.tileAt(offset(member.coordinate, axis, 1));
      if (candidate?.isAvailable) positive = candidate;
    }
    if (!negative) {
      const candidate = grid.tileAt(offset(member.coordinate, axis, -1));
      if (candidate?.isAvailable) negative = candidate;
    }
  }

  return { positive, negative };
}

/** Pick the two probes (plus an optional fallback) from the touched edges */
export function chooseProbes(contact: EdgeContact, xAxis: AxisProbes, yAxis: AxisProbes): ProbeChoice {
  const { left, right, top, bottom } = contact;

  // Horizontal cut: probe above and below
  if (left && right) {
    return { first: yAxis.positive, second: yAxis.negative, wild: undefined };
  }

  // Vertical cut: probe right and left
  if (top && bottom) {
    return { first: xAxis.positive, second: xAxis.negative, wild: undefined };
  }

  // Corner cut: probe away from each touched edge
  if ((left || right) && (top || bottom)) {
    const horizontal = left ? xAxis.negative : xAxis.positive;
    const vertical = bottom ? yAxis.positive : yAxis.negative;
    return { first: horizontal, second: vertical, wild: undefined };
  }

  // U shape opening onto a single edge. The first probe is off the axis
  // perpendicular to that edge; the other axis can go either way.
  if (top) {
    return { first: yAxis.positive, second: xAxis.positive, wild: xAxis.negative };
  }
  if (bottom) {
    return { first: yAxis.negative, second: xAxis.positive, wild: xAxis.negative };
  }
  if (left) {
    return { first: xAxis.negative, second: yAxis.positive, wild: yAxis.negative };
  }
  if (right) {
    return { first: xAxis.positive, second: yAxis.positive, wild: yAxis.negative };
  }

  // Cluster floats inside the map without touching an edge
  return { first: undefined, second: undefined, wild: undefined };
}

/**
 * Look for two distinct, non-empty land masses on either side of the
 * unavailable cluster around `destroyed`. Returns undefined when the cut
 * does not apply.
 */
export function findLandMassSplit(
  grid: TileLookup,
  map: MapDef,
  destroyed: Tile
): LandMassSplit | undefined {
  const cluster = reachableUnavailable(destroyed);
  if (cluster.length === 0) {
    return undefined;
  }

  const contact = edgeContact(map, cluster.map(t => t.coordinate));
  const yAxis = axisProbes(grid, cluster, UP);
  const xAxis = axisProbes(grid, cluster, RIGHT);
  const { first, second, wild } = chooseProbes(contact, xAxis, yAxis);

  if (!first || !second) {
    return undefined;
  }

  const regionA = reachableAvailable(first);
  let regionB = reachableAvailable(second);
  let same = sameRegion(regionA, regionB);

  if (same && wild) {
    regionB = reachableAvailable(wild);
    same = sameRegion(regionA, regionB);
  }

  if (same || regionA.length === 0 || regionB.length === 0) {
    return undefined;
  }

  return { cluster, regionA, regionB };
}
