/**
 * Value-space <-> screen-space transform.
 *
 * Built per frame from the final plot bounds and the allocated screen rectangle.
 * Each axis is an independent linear axis; the y axis runs from the rectangle's
 * bottom to its top so that larger values are drawn higher on screen.
 *
 * @module createPlotTransform
 */

import type { Bounds, Pos2, ScreenRect, Value, ValueLike } from '../../../config/types';
import { createLinearAxis } from '../../../utils/linearAxis';
import { getPointXY, isFiniteBounds } from '../utils';

export interface PlotTransform {
  /** Visible value-space rectangle. */
  readonly bounds: Bounds;
  /** Destination screen rectangle. */
  readonly rect: ScreenRect;
  toScreen(value: ValueLike): Pos2;
  fromScreen(pos: Pos2): Value;
  /** Value units covered by one screen unit, per axis. */
  valuePerPixel(): Readonly<{ x: number; y: number }>;
}

export function createPlotTransform(bounds: Bounds, rect: ScreenRect): PlotTransform {
  if (!isFiniteBounds(bounds)) {
    throw new Error(
      `PlotTransform: bounds must be finite. Received: [${bounds.xMin}, ${bounds.xMax}] x [${bounds.yMin}, ${bounds.yMax}]`
    );
  }

  const xAxis = createLinearAxis(bounds.xMin, bounds.xMax, rect.left, rect.right);
  const yAxis = createLinearAxis(bounds.yMin, bounds.yMax, rect.bottom, rect.top);

  return {
    bounds,
    rect,
    toScreen(value) {
      const { x, y } = getPointXY(value);
      return { x: xAxis.toScreen(x), y: yAxis.toScreen(y) };
    },
    fromScreen(pos) {
      return { x: xAxis.toValue(pos.x), y: yAxis.toValue(pos.y) };
    },
    valuePerPixel() {
      return { x: xAxis.unitsPerPixel(), y: yAxis.unitsPerPixel() };
    },
  };
}
