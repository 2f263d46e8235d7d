/**
 * One axis of the value <-> screen mapping.
 *
 * The axis is fixed at construction: a value interval `[min, max]` and the
 * screen interval `[start, end]` it is drawn across. `start` may be greater
 * than `end`; the y axis of a plot runs from the rectangle's bottom to its top.
 */
export interface LinearAxis {
  readonly min: number;
  readonly max: number;
  readonly start: number;
  readonly end: number;
  /** Screen coordinate of a value. Extrapolates outside `[min, max]`. */
  toScreen(value: number): number;
  /** Value at a screen coordinate. Extrapolates outside `[start, end]`. */
  toValue(pos: number): number;
  /** Value units covered by one screen unit (>= 0). */
  unitsPerPixel(): number;
}

const requireFinite = (label: string, v: number): void => {
  if (!Number.isFinite(v)) {
    throw new Error(`LinearAxis: ${label} must be finite. Received: ${String(v)}`);
  }
};

/**
 * Creates an axis mapping `min -> start` and `max -> end`.
 *
 * A zero-width value interval (`min === max`) puts every value at the middle of
 * the screen interval, and every screen position maps back to `min`.
 */
export function createLinearAxis(min: number, max: number, start: number, end: number): LinearAxis {
  requireFinite('min', min);
  requireFinite('max', max);
  requireFinite('start', start);
  requireFinite('end', end);

  const span = max - min;
  const screenSpan = end - start;
  const degenerate = span === 0;

  return {
    min,
    max,
    start,
    end,
    toScreen(value) {
      if (!Number.isFinite(value)) return Number.NaN;
      if (degenerate) return (start + end) / 2;
      return start + ((value - min) / span) * screenSpan;
    },
    toValue(pos) {
      if (!Number.isFinite(pos)) return Number.NaN;
      if (degenerate) return min;
      return min + ((pos - start) / screenSpan) * span;
    },
    unitsPerPixel() {
      return Math.abs(span) / Math.abs(screenSpan);
    },
  };
}
