import type { Value } from '../config/types';
import { MAX_LABEL_DECIMALS } from '../config/defaults';

const EM_DASH = '\u2014';

/**
 * Decimal places worth showing for an axis with the given value density:
 * `ceil(-log10(valuePerPixel))`, clamped to [0, 6].
 *
 * Zoomed in (few value units per pixel) gives more decimals, zoomed out fewer.
 * A zero density gives the maximum; NaN gives 0.
 */
export function computeLabelPrecision(valuePerPixel: number, cap: number = MAX_LABEL_DECIMALS): number {
  const raw = Math.ceil(-Math.log10(valuePerPixel));
  if (Number.isNaN(raw)) return 0;
  return Math.min(cap, Math.max(0, raw));
}

export function formatAxisValue(value: number, decimals: number): string {
  if (!Number.isFinite(value)) return EM_DASH;
  return value.toFixed(decimals);
}

export interface HoverLabelOptions {
  readonly showX: boolean;
  readonly showY: boolean;
  readonly xDecimals: number;
  readonly yDecimals: number;
  /** Curve name shown on its own line above the coordinates; omitted when empty. */
  readonly curveName?: string;
}

/**
 * Hover readout text, e.g. `"circle\nx = 0.50\ny = -0.25"`.
 * Returns an empty string when neither axis is shown.
 */
export function formatHoverLabel(value: Value, options: HoverLabelOptions): string {
  if (!options.showX && !options.showY) return '';

  const lines: string[] = [];
  if (options.curveName) lines.push(options.curveName);
  if (options.showX) lines.push(`x = ${formatAxisValue(value.x, options.xDecimals)}`);
  if (options.showY) lines.push(`y = ${formatAxisValue(value.y, options.yDecimals)}`);
  return lines.join('\n');
}
