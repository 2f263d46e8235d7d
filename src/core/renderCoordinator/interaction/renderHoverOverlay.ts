/**
 * Hover overlay: nearest-value marker, crosshair and coordinate label.
 *
 * @module renderHoverOverlay
 */

import type { Curve, Pos2, Value } from '../../../config/types';
import type { ResolvedTheme } from '../../../config/OptionResolver';
import { CROSSHAIR_WIDTH_PX, HOVER_INTERACT_RADIUS_PX, HOVER_MARKER_RADIUS_PX } from '../../../config/defaults';
import { findNearestValue } from '../../../interaction/findNearestValue';
import { computeLabelPrecision, formatHoverLabel } from '../../../components/formatHoverLabel';
import { circleFilled, lineSegment } from '../../../renderers/shapes';
import type { Shape } from '../../../renderers/shapes';
import type { PlotTransform } from '../transform/createPlotTransform';

export interface HoverOverlayOptions {
  readonly showX: boolean;
  readonly showY: boolean;
  readonly theme: ResolvedTheme;
  readonly interactRadius?: number;
}

export interface HoverReadout {
  /** Hovered curve value, or the pointer's own position in value-space. */
  readonly value: Value;
  /** Index of the hovered curve; null when no value was within range. */
  readonly curveIndex: number | null;
  readonly valueIndex: number | null;
  readonly curveName: string;
  readonly label: string;
}

export interface HoverOverlay {
  readonly shapes: ReadonlyArray<Shape>;
  readonly readout: HoverReadout;
}

/**
 * Builds the hover overlay for a pointer inside the plot.
 *
 * Returns null when neither x nor y readout is enabled.
 */
export function renderHoverOverlay(
  curves: ReadonlyArray<Curve>,
  transform: PlotTransform,
  pointer: Pos2,
  options: HoverOverlayOptions
): HoverOverlay | null {
  const { showX, showY, theme } = options;
  if (!showX && !showY) return null;

  const shapes: Shape[] = [];
  const match = findNearestValue(curves, transform, pointer, options.interactRadius ?? HOVER_INTERACT_RADIUS_PX);

  let value: Value;
  if (match) {
    value = match.value;
    shapes.push(circleFilled(transform.toScreen(value), HOVER_MARKER_RADIUS_PX, theme.highlightColor));
  } else {
    value = transform.fromScreen(pointer);
  }

  const anchor = transform.toScreen(value);
  const { rect } = transform;
  const crosshairStroke = { width: CROSSHAIR_WIDTH_PX, color: theme.crosshairColor };

  if (showX) {
    // vertical line
    shapes.push(lineSegment({ x: anchor.x, y: rect.top }, { x: anchor.x, y: rect.bottom }, crosshairStroke));
  }
  if (showY) {
    // horizontal line
    shapes.push(lineSegment({ x: rect.left, y: anchor.y }, { x: rect.right, y: anchor.y }, crosshairStroke));
  }

  const valuePerPixel = transform.valuePerPixel();
  const curveName = match?.curve.name ?? '';
  const label = formatHoverLabel(value, {
    showX,
    showY,
    xDecimals: computeLabelPrecision(valuePerPixel.x),
    yDecimals: computeLabelPrecision(valuePerPixel.y),
    curveName,
  });

  shapes.push({
    kind: 'text',
    pos: anchor,
    anchor: { horizontal: 'middle', vertical: 'bottom' },
    text: label,
    color: theme.textColor,
    fontFamily: theme.fontFamily,
    fontSize: theme.fontSize,
  });

  return {
    shapes,
    readout: {
      value,
      curveIndex: match?.curveIndex ?? null,
      valueIndex: match?.valueIndex ?? null,
      curveName,
      label,
    },
  };
}
