import type { ResolvedPlotOptions } from '../config/OptionResolver';
import type { Bounds, PointerState, ScreenRect } from '../config/types';
import { BACKGROUND_CORNER_RADIUS_PX, FRAME_WIDTH_PX } from '../config/defaults';
import { clipTo } from '../renderers/shapes';
import type { PaintCommand, RectShape } from '../renderers/shapes';
import { computePlotBounds, isFiniteBounds, isFiniteScreenRect } from './renderCoordinator/utils';
import { createPlotTransform } from './renderCoordinator/transform/createPlotTransform';
import { renderPlotItems } from './renderCoordinator/render/renderPlotItems';
import { renderHoverOverlay } from './renderCoordinator/interaction/renderHoverOverlay';
import type { HoverReadout } from './renderCoordinator/interaction/renderHoverOverlay';

export interface PlotFrameOutput {
  /** Screen rectangle the plot was drawn into. */
  readonly rect: ScreenRect;
  /** Visible value-space bounds, or null when they were not finite and only the background was drawn. */
  readonly bounds: Bounds | null;
  /** Paint commands in drawing order. */
  readonly commands: ReadonlyArray<PaintCommand>;
  readonly hovered: boolean;
  /** Hover readout when the plot was hovered and a readout was enabled. */
  readonly hover: HoverReadout | null;
}

const renderBackground = (rect: ScreenRect, options: ResolvedPlotOptions): RectShape => ({
  kind: 'rect',
  rect,
  cornerRadius: BACKGROUND_CORNER_RADIUS_PX,
  fill: options.theme.backgroundColor,
  stroke: { width: FRAME_WIDTH_PX, color: options.theme.frameColor },
});

/**
 * Runs the whole per-frame pipeline: bounds -> transform -> static shapes -> hover overlay.
 * Nothing is cached between calls.
 *
 * Plot content is clipped to `rect`; the background is painted with the host's clip.
 */
export function renderPlotFrame(options: ResolvedPlotOptions, rect: ScreenRect, pointer: PointerState): PlotFrameOutput {
  const commands: PaintCommand[] = [{ clipRect: null, shape: renderBackground(rect, options) }];
  const hovered = pointer.hovered;

  // An unbounded rect (host layout with infinite space) has no usable transform.
  const bounds = isFiniteScreenRect(rect) ? computePlotBounds(options.rawBounds, options, rect) : null;
  if (bounds === null || !isFiniteBounds(bounds)) {
    return { rect, bounds: null, commands, hovered, hover: null };
  }

  const transform = createPlotTransform(bounds, rect);
  commands.push(...clipTo(rect, renderPlotItems(options.curves, options.hlines, transform)));

  let hover: HoverReadout | null = null;
  if (hovered && pointer.pos) {
    const overlay = renderHoverOverlay(options.curves, transform, pointer.pos, options);
    if (overlay) {
      commands.push(...clipTo(rect, overlay.shapes));
      hover = overlay.readout;
    }
  }

  return { rect, bounds, commands, hovered, hover };
}
