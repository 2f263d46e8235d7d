import type { Curve, CurveStyle, HLine, StrokeConfig, Stroke, Value, ValueLike } from '../config/types';
import { defaultCurveStroke, defaultHLineStroke } from '../config/defaults';
import { createValue, getPointXY } from '../core/renderCoordinator/utils/dataPointUtils';
import { createEmptyBounds, extendBoundsWithValues } from '../core/renderCoordinator/utils/boundsComputation';
import { resolveColor } from '../utils/colors';

const resolveStroke = (config: StrokeConfig, fallback: Stroke): Stroke => {
  const width = config.width;
  return Object.freeze({
    width: typeof width === 'number' && Number.isFinite(width) && width >= 0 ? width : fallback.width,
    color: resolveColor(config.color, fallback.color),
  });
};

/**
 * Creates a curve from values in plotting order.
 * The bounding rectangle is computed here once and never recomputed.
 *
 * @param values - `{ x, y }` objects or `[x, y]` tuples; any iterable
 * @param style - Optional name, stroke width and CSS color
 */
export function createCurve(values: Iterable<ValueLike>, style: CurveStyle = {}): Curve {
  const normalized: Value[] = [];
  for (const v of values) {
    const { x, y } = getPointXY(v);
    normalized.push(createValue(x, y));
  }

  return Object.freeze({
    values: Object.freeze(normalized),
    bounds: extendBoundsWithValues(createEmptyBounds(), normalized),
    stroke: resolveStroke(style, defaultCurveStroke),
    name: style.name ?? '',
  });
}

/**
 * Creates a curve from y-values; x is the index of each value.
 */
export function createCurveFromYs(ys: ArrayLike<number>, style: CurveStyle = {}): Curve {
  return createCurve(
    Array.from(ys, (y, i) => createValue(i, y)),
    style
  );
}

/**
 * Creates a horizontal reference line at `y`.
 */
export function createHLine(y: number, stroke: StrokeConfig = {}): HLine {
  return Object.freeze({ y, stroke: resolveStroke(stroke, defaultHLineStroke) });
}
