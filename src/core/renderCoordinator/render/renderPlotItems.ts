/**
 * Static plot content: reference lines and curves.
 *
 * @module renderPlotItems
 */

import type { Curve, HLine } from '../../../config/types';
import { circleFilled, lineSegment, path } from '../../../renderers/shapes';
import type { Shape } from '../../../renderers/shapes';
import type { PlotTransform } from '../transform/createPlotTransform';

/**
 * A line segment across the full visible x-range at the line's y.
 */
export function renderHLine(hline: HLine, transform: PlotTransform): Shape {
  const { xMin, xMax } = transform.bounds;
  return lineSegment(transform.toScreen({ x: xMin, y: hline.y }), transform.toScreen({ x: xMax, y: hline.y }), hline.stroke);
}

/**
 * - 0 values: nothing
 * - 1 value: filled circle with radius `stroke.width / 2`
 * - otherwise: polyline through every value in order
 */
export function renderCurve(curve: Curve, transform: PlotTransform): Shape | null {
  const { values, stroke } = curve;
  if (values.length === 0) return null;
  if (values.length === 1) {
    return circleFilled(transform.toScreen(values[0]), stroke.width / 2, stroke.color);
  }
  return path(
    values.map((v) => transform.toScreen(v)),
    stroke
  );
}

/**
 * Renders hlines first, then curves, so curves are drawn on top of reference lines.
 */
export function renderPlotItems(
  curves: ReadonlyArray<Curve>,
  hlines: ReadonlyArray<HLine>,
  transform: PlotTransform
): Shape[] {
  const shapes: Shape[] = [];

  for (const hline of hlines) {
    shapes.push(renderHLine(hline, transform));
  }

  for (const curve of curves) {
    const shape = renderCurve(curve, transform);
    if (shape) shapes.push(shape);
  }

  return shapes;
}
