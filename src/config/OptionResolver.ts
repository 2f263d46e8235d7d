import type { Bounds, Curve, HLine, MarginConfig, PlotOptions } from './types';
import { defaultOptions } from './defaults';
import { getTheme, isThemeName } from '../themes';
import type { ThemeConfig } from '../themes/types';
import { parseCssColorToRgba01 } from '../utils/colors';
import type { Rgba01 } from '../utils/colors';
import { createEmptyBounds, includeYInBounds, unionBounds } from '../core/renderCoordinator/utils/boundsComputation';

export type ResolvedMarginConfig = Readonly<Required<MarginConfig>>;

export interface ResolvedTheme {
  readonly backgroundColor: Rgba01;
  readonly frameColor: Rgba01;
  readonly crosshairColor: Rgba01;
  readonly highlightColor: Rgba01;
  readonly textColor: Rgba01;
  readonly fontFamily: string;
  readonly fontSize: number;
}

export interface ResolvedPlotOptions {
  readonly curves: ReadonlyArray<Curve>;
  readonly hlines: ReadonlyArray<HLine>;
  /** Union of curve bounds, extended by every hline y and `includeY` value. */
  readonly rawBounds: Bounds;
  readonly symmetricalXBounds: boolean;
  readonly symmetricalYBounds: boolean;
  readonly margin: ResolvedMarginConfig;
  readonly width?: number;
  readonly height?: number;
  readonly aspectRatio?: number;
  readonly showX: boolean;
  readonly showY: boolean;
  readonly theme: ResolvedTheme;
}

let warnedOverconstrainedSize = false;

const positiveOrUndefined = (v: unknown): number | undefined =>
  typeof v === 'number' && Number.isFinite(v) && v > 0 ? v : undefined;

const nonNegativeOr = (v: unknown, fallback: number): number =>
  typeof v === 'number' && Number.isFinite(v) && v >= 0 ? v : fallback;

const booleanOr = (v: unknown, fallback: boolean): boolean => (typeof v === 'boolean' ? v : fallback);

const mergeTheme = (themeInput: PlotOptions['theme']): ThemeConfig => {
  if (themeInput === undefined) return getTheme(defaultOptions.theme);
  if (typeof themeInput === 'string') {
    const name = themeInput.trim().toLowerCase();
    return isThemeName(name) ? getTheme(name) : getTheme(defaultOptions.theme);
  }

  const base = getTheme(defaultOptions.theme);
  const takeString = (key: 'backgroundColor' | 'frameColor' | 'crosshairColor' | 'highlightColor' | 'textColor' | 'fontFamily'): string => {
    const v = themeInput[key];
    if (typeof v !== 'string') return base[key];
    const trimmed = v.trim();
    return trimmed.length > 0 ? trimmed : base[key];
  };

  return {
    backgroundColor: takeString('backgroundColor'),
    frameColor: takeString('frameColor'),
    crosshairColor: takeString('crosshairColor'),
    highlightColor: takeString('highlightColor'),
    textColor: takeString('textColor'),
    fontFamily: takeString('fontFamily'),
    fontSize: positiveOrUndefined(themeInput.fontSize) ?? base.fontSize,
  };
};

/**
 * Parses theme colors. A color that fails to parse falls back to the dark theme's.
 */
export const resolveTheme = (themeInput: PlotOptions['theme']): ResolvedTheme => {
  const theme = mergeTheme(themeInput);
  const base = getTheme(defaultOptions.theme);
  const color = (key: 'backgroundColor' | 'frameColor' | 'crosshairColor' | 'highlightColor' | 'textColor'): Rgba01 =>
    parseCssColorToRgba01(theme[key]) ?? parseCssColorToRgba01(base[key]) ?? [0, 0, 0, 1];

  return {
    backgroundColor: color('backgroundColor'),
    frameColor: color('frameColor'),
    crosshairColor: color('crosshairColor'),
    highlightColor: color('highlightColor'),
    textColor: color('textColor'),
    fontFamily: theme.fontFamily,
    fontSize: theme.fontSize,
  };
};

/**
 * Accumulated value-space bounds before symmetry and margin are applied.
 */
export const computeRawBounds = (
  curves: ReadonlyArray<Curve>,
  hlines: ReadonlyArray<HLine>,
  includeY: ReadonlyArray<number>
): Bounds => {
  let bounds = createEmptyBounds();
  for (const curve of curves) bounds = unionBounds(bounds, curve.bounds);
  for (const hline of hlines) bounds = includeYInBounds(bounds, hline.y);
  for (const y of includeY) bounds = includeYInBounds(bounds, y);
  return bounds;
};

/**
 * Validates and normalizes plot options once, before any frame is rendered.
 * Invalid sizes are dropped; the host's available size is used instead.
 */
export function resolvePlotOptions(userOptions: PlotOptions = {}): ResolvedPlotOptions {
  const curves = Array.from(userOptions.curves ?? []);
  const hlines = Array.from(userOptions.hlines ?? []);
  const includeY = userOptions.includeY ?? [];

  const width = positiveOrUndefined(userOptions.width);
  const height = positiveOrUndefined(userOptions.height);
  const aspectRatio = positiveOrUndefined(userOptions.aspectRatio);

  if (width !== undefined && height !== undefined && aspectRatio !== undefined && !warnedOverconstrainedSize) {
    warnedOverconstrainedSize = true;
    console.warn(
      `Plot: width, height and aspectRatio are all set; aspectRatio (${aspectRatio}) is ignored in favor of ${width}x${height}.`
    );
  }

  const margin: ResolvedMarginConfig = {
    x: nonNegativeOr(userOptions.margin?.x, defaultOptions.margin.x),
    y: nonNegativeOr(userOptions.margin?.y, defaultOptions.margin.y),
  };

  return {
    curves,
    hlines,
    rawBounds: computeRawBounds(curves, hlines, includeY),
    symmetricalXBounds: booleanOr(userOptions.symmetricalXBounds, defaultOptions.symmetricalXBounds),
    symmetricalYBounds: booleanOr(userOptions.symmetricalYBounds, defaultOptions.symmetricalYBounds),
    margin,
    ...(width !== undefined ? { width } : null),
    ...(height !== undefined ? { height } : null),
    ...(aspectRatio !== undefined ? { aspectRatio } : null),
    showX: booleanOr(userOptions.showX, defaultOptions.showX),
    showY: booleanOr(userOptions.showY, defaultOptions.showY),
    theme: resolveTheme(userOptions.theme),
  };
}

export const OptionResolver = { resolve: resolvePlotOptions } as const;
