/**
 * Plot sizing and allocation utilities.
 *
 * @module layoutUtils
 */

import type { ScreenRect, Size } from '../../../config/types';

export interface PlotSizeOptions {
  readonly width?: number;
  readonly height?: number;
  readonly aspectRatio?: number;
}

/**
 * Resolves the plot's desired size.
 *
 * - Explicit width/height always win.
 * - A missing width is derived from height * aspectRatio when both are known.
 * - A missing height is derived from width / aspectRatio.
 * - Anything still unknown falls back to the size offered by the host.
 *
 * @param options - Sanitized width/height/aspectRatio
 * @param available - Space offered by the host layout
 */
export function computePlotSize(options: PlotSizeOptions, available: Size): Size {
  const { height, aspectRatio } = options;

  const width =
    options.width ??
    (height !== undefined && aspectRatio !== undefined ? height * aspectRatio : available.width);

  return {
    width,
    height: height ?? (aspectRatio !== undefined ? width / aspectRatio : available.height),
  };
}

/**
 * Places `size` at the top-left corner of the available rectangle.
 */
export function allocateRect(available: ScreenRect, size: Size): ScreenRect {
  return {
    left: available.left,
    top: available.top,
    right: available.left + size.width,
    bottom: available.top + size.height,
  };
}
