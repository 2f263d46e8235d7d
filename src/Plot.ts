import { resolvePlotOptions } from './config/OptionResolver';
import type { ResolvedPlotOptions } from './config/OptionResolver';
import type { PlotOptions, PointerState, ScreenRect, Size } from './config/types';
import { renderPlotFrame } from './core/renderPlotFrame';
import type { PlotFrameOutput } from './core/renderPlotFrame';
import { allocateRect, computePlotSize, getScreenRectSize } from './core/renderCoordinator/utils';

/**
 * What a host needs from anything it lays out and paints.
 */
export interface Widget<TOutput> {
  /** Size the widget wants, given the space the host can offer. */
  desiredSize(available: Size): Size;
  /** Computes the primitives for an allocated rectangle and this frame's hover state. */
  ui(rect: ScreenRect, pointer: PointerState): TOutput;
}

export interface PlotInstance extends Widget<PlotFrameOutput> {
  readonly options: ResolvedPlotOptions;
}

export const NO_POINTER: PointerState = { hovered: false, pos: null };

/**
 * Creates a plot widget. Options are validated once here; every `ui` call
 * recomputes bounds, transform and primitives from them.
 */
export function createPlot(options: PlotOptions): PlotInstance {
  const resolved = resolvePlotOptions(options);

  return {
    options: resolved,
    desiredSize(available) {
      return computePlotSize(resolved, available);
    },
    ui(rect, pointer) {
      return renderPlotFrame(resolved, rect, pointer);
    },
  };
}

/**
 * Lays out and renders a plot in one call: the plot takes its desired size at
 * the top-left of `available`.
 */
export function renderPlot(options: PlotOptions, available: ScreenRect, pointer: PointerState = NO_POINTER): PlotFrameOutput {
  const plot = createPlot(options);
  const rect = allocateRect(available, plot.desiredSize(getScreenRectSize(available)));
  return plot.ui(rect, pointer);
}

export const Plot = {
  create: createPlot,
  render: renderPlot,
};
