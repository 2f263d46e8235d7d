/**
 * Bounds computation utilities for the RenderCoordinator.
 *
 * These pure functions derive the value-space rectangle shown by a plot: the
 * union of curve bounds, explicitly included y-values, optional symmetric
 * bounds and a margin given in screen points.
 *
 * Non-finite input is not rejected. NaN coordinates never win a min/max
 * comparison and are ignored; infinite ones extend the bounds, which then
 * fail `isFiniteBounds` and the frame draws its background only.
 *
 * @module boundsComputation
 */

import type { Bounds, MarginConfig, ScreenRect, Size, ValueLike } from '../../../config/types';
import { getPointXY } from './dataPointUtils';

/**
 * The empty rectangle. Any union with it returns the other operand.
 */
export const createEmptyBounds = (): Bounds => ({
  xMin: Number.POSITIVE_INFINITY,
  xMax: Number.NEGATIVE_INFINITY,
  yMin: Number.POSITIVE_INFINITY,
  yMax: Number.NEGATIVE_INFINITY,
});

export const isFiniteBounds = (b: Bounds): boolean =>
  Number.isFinite(b.xMin) && Number.isFinite(b.xMax) && Number.isFinite(b.yMin) && Number.isFinite(b.yMax);

export const getBoundsSize = (b: Bounds): Size => ({ width: b.xMax - b.xMin, height: b.yMax - b.yMin });

export const getScreenRectSize = (r: ScreenRect): Size => ({ width: r.right - r.left, height: r.bottom - r.top });

export const isFiniteScreenRect = (r: ScreenRect): boolean =>
  Number.isFinite(r.left) && Number.isFinite(r.top) && Number.isFinite(r.right) && Number.isFinite(r.bottom);

/**
 * Extends bounds with value positions.
 */
export const extendBoundsWithValues = (bounds: Bounds, values: Iterable<ValueLike>): Bounds => {
  let { xMin, xMax, yMin, yMax } = bounds;

  for (const v of values) {
    const { x, y } = getPointXY(v);
    if (x < xMin) xMin = x;
    if (x > xMax) xMax = x;
    if (y < yMin) yMin = y;
    if (y > yMax) yMax = y;
  }

  return { xMin, xMax, yMin, yMax };
};

export const unionBounds = (a: Bounds, b: Bounds): Bounds => ({
  xMin: b.xMin < a.xMin ? b.xMin : a.xMin,
  xMax: b.xMax > a.xMax ? b.xMax : a.xMax,
  yMin: b.yMin < a.yMin ? b.yMin : a.yMin,
  yMax: b.yMax > a.yMax ? b.yMax : a.yMax,
});

/**
 * Extends only the y-range. The x-range is left untouched, so including a y in
 * empty bounds still yields non-finite bounds.
 */
export const includeYInBounds = (bounds: Bounds, y: number): Bounds => ({
  ...bounds,
  yMin: y < bounds.yMin ? y : bounds.yMin,
  yMax: y > bounds.yMax ? y : bounds.yMax,
});

/**
 * Forces the zero line of the selected axes to bisect the rectangle:
 * `[-m, m]` with `m = max(|min|, |max|)`.
 */
export const symmetrizeBounds = (bounds: Bounds, symmetricalX: boolean, symmetricalY: boolean): Bounds => {
  let { xMin, xMax, yMin, yMax } = bounds;

  if (symmetricalX) {
    const xAbs = Math.max(Math.abs(xMin), Math.abs(xMax));
    xMin = -xAbs;
    xMax = xAbs;
  }
  if (symmetricalY) {
    const yAbs = Math.max(Math.abs(yMin), Math.abs(yMax));
    yMin = -yAbs;
    yMax = yAbs;
  }

  return { xMin, xMax, yMin, yMax };
};

/**
 * Converts a margin in screen points to value units for a rectangle that will be
 * drawn into `screenRect`: `margin * boundsSize / screenSize`, per axis.
 */
export const computeMarginInValues = (
  bounds: Bounds,
  margin: Required<MarginConfig>,
  screenRect: ScreenRect
): Readonly<{ x: number; y: number }> => {
  const valueSize = getBoundsSize(bounds);
  const screenSize = getScreenRectSize(screenRect);
  return {
    x: (margin.x * valueSize.width) / screenSize.width,
    y: (margin.y * valueSize.height) / screenSize.height,
  };
};

export const expandBounds = (bounds: Bounds, amount: Readonly<{ x: number; y: number }>): Bounds => ({
  xMin: bounds.xMin - amount.x,
  xMax: bounds.xMax + amount.x,
  yMin: bounds.yMin - amount.y,
  yMax: bounds.yMax + amount.y,
});

export interface PlotBoundsOptions {
  readonly symmetricalXBounds: boolean;
  readonly symmetricalYBounds: boolean;
  readonly margin: Required<MarginConfig>;
}

/**
 * Final value-space rectangle for one frame: symmetric normalization, then margin
 * expansion. The result may be non-finite; callers check `isFiniteBounds`.
 *
 * @param rawBounds - Union of curve bounds and included y-values
 * @param options - Symmetry flags and margin in screen points
 * @param screenRect - Allocated screen rectangle
 */
export const computePlotBounds = (rawBounds: Bounds, options: PlotBoundsOptions, screenRect: ScreenRect): Bounds => {
  const symmetric = symmetrizeBounds(rawBounds, options.symmetricalXBounds, options.symmetricalYBounds);
  const marginInValues = computeMarginInValues(symmetric, options.margin, screenRect);
  return expandBounds(symmetric, marginInValues);
};
