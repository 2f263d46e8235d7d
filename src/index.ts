/**
 * curveplot - immediate-mode 2D curve plotting core
 */

export const version = '0.1.0';

// Widget API
export type { Widget, PlotInstance } from './Plot';
export { Plot, createPlot, renderPlot, NO_POINTER } from './Plot';
export type { PlotFrameOutput } from './core/renderPlotFrame';
export { renderPlotFrame } from './core/renderPlotFrame';

// Configuration
export type {
  Bounds,
  Curve,
  CurveStyle,
  HLine,
  MarginConfig,
  PlotOptions,
  PointerState,
  Pos2,
  ScreenRect,
  Size,
  Stroke,
  StrokeConfig,
  Value,
  ValueLike,
  ValueTuple,
} from './config/types';
export type { ResolvedPlotOptions, ResolvedTheme } from './config/OptionResolver';
export { OptionResolver, resolvePlotOptions } from './config/OptionResolver';
export type { PlotBuilder } from './config/createPlotBuilder';
export { createPlotBuilder } from './config/createPlotBuilder';
export type { ThemeConfig, ThemeName } from './themes';
export { darkTheme, lightTheme, getTheme } from './themes';

// Data
export { createCurve, createCurveFromYs, createHLine } from './data/createCurve';
export { createValue } from './core/renderCoordinator/utils/dataPointUtils';

// Bounds, transform, rendering, hover
export {
  computePlotBounds,
  computeMarginInValues,
  createEmptyBounds,
  expandBounds,
  includeYInBounds,
  isFiniteBounds,
  symmetrizeBounds,
  unionBounds,
} from './core/renderCoordinator/utils/boundsComputation';
export { computePlotSize, allocateRect } from './core/renderCoordinator/utils/layoutUtils';
export type { PlotTransform } from './core/renderCoordinator/transform/createPlotTransform';
export { createPlotTransform } from './core/renderCoordinator/transform/createPlotTransform';
export { renderPlotItems } from './core/renderCoordinator/render/renderPlotItems';
export type { HoverOverlay, HoverReadout } from './core/renderCoordinator/interaction/renderHoverOverlay';
export { renderHoverOverlay } from './core/renderCoordinator/interaction/renderHoverOverlay';
export type { NearestValueMatch } from './interaction/findNearestValue';
export { findNearestValue } from './interaction/findNearestValue';
export { computeLabelPrecision, formatHoverLabel } from './components/formatHoverLabel';

// Primitives and painting
export type { PaintCommand, Shape, TextAnchor } from './renderers/shapes';
export type { SvgPaintOptions } from './renderers/paintToSvg';
export { paintToSvg } from './renderers/paintToSvg';
export type { Rgba01 } from './utils/colors';
export { parseCssColorToRgba01 } from './utils/colors';
