import type { Curve, Pos2, Value } from '../config/types';
import { HOVER_INTERACT_RADIUS_PX } from '../config/defaults';
import type { PlotTransform } from '../core/renderCoordinator/transform/createPlotTransform';

export type NearestValueMatch = Readonly<{
  curveIndex: number;
  valueIndex: number;
  value: Value;
  curve: Curve;
  /** Squared euclidean distance in screen units. */
  distanceSq: number;
}>;

/**
 * Finds the curve value whose screen position is closest to `pointer`.
 *
 * Linear scan over every value of every curve (no spatial index). Only values
 * strictly closer than `maxDistancePx` qualify; on equal distances the first
 * value scanned wins. Values with NaN coordinates never match.
 *
 * @returns The closest match, or null when nothing is within range
 */
export function findNearestValue(
  curves: ReadonlyArray<Curve>,
  transform: PlotTransform,
  pointer: Pos2,
  maxDistancePx: number = HOVER_INTERACT_RADIUS_PX
): NearestValueMatch | null {
  let best: NearestValueMatch | null = null;
  let bestDistSq = maxDistancePx * maxDistancePx;

  for (let c = 0; c < curves.length; c++) {
    const curve = curves[c];
    const values = curve.values;
    for (let i = 0; i < values.length; i++) {
      const pos = transform.toScreen(values[i]);
      const dx = pos.x - pointer.x;
      const dy = pos.y - pointer.y;
      const distSq = dx * dx + dy * dy;
      if (distSq < bestDistSq) {
        bestDistSq = distSq;
        best = { curveIndex: c, valueIndex: i, value: values[i], curve, distanceSq: distSq };
      }
    }
  }

  return best;
}
