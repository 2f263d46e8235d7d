/**
 * Plot configuration types.
 */

import type { ThemeConfig } from '../themes/types';
import type { Rgba01 } from '../utils/colors';

/**
 * A single point in the plot's value-space (data domain).
 */
export type Value = Readonly<{ x: number; y: number }>;

export type ValueTuple = readonly [x: number, y: number];

/**
 * Anything accepted where a value is expected: `{ x, y }` or `[x, y]`.
 */
export type ValueLike = Value | ValueTuple;

/**
 * Axis-aligned value-space rectangle.
 * The empty rectangle is `{ xMin: +Inf, xMax: -Inf, yMin: +Inf, yMax: -Inf }`.
 */
export type Bounds = Readonly<{ xMin: number; xMax: number; yMin: number; yMax: number }>;

/** Screen-space point (y grows downwards). */
export type Pos2 = Readonly<{ x: number; y: number }>;

/** Screen-space rectangle (y grows downwards, so `top <= bottom`). */
export type ScreenRect = Readonly<{ left: number; top: number; right: number; bottom: number }>;

export type Size = Readonly<{ width: number; height: number }>;

/** Resolved stroke used by primitives. */
export type Stroke = Readonly<{ width: number; color: Rgba01 }>;

export interface StrokeConfig {
  /** Stroke width in screen points. */
  readonly width?: number;
  /** CSS color string (`#rgb`, `#rrggbb`, `rgb()`, `rgba()`, ...). */
  readonly color?: string;
}

export interface CurveStyle extends StrokeConfig {
  readonly name?: string;
}

/**
 * An ordered run of values drawn with a single stroke.
 * `bounds` is computed once when the curve is created.
 */
export interface Curve {
  readonly values: ReadonlyArray<Value>;
  readonly bounds: Bounds;
  readonly stroke: Stroke;
  readonly name: string;
}

/**
 * A horizontal reference line spanning the full visible x-range.
 */
export interface HLine {
  readonly y: number;
  readonly stroke: Stroke;
}

/**
 * Padding around the data, in screen points.
 */
export interface MarginConfig {
  readonly x?: number;
  readonly y?: number;
}

export interface PlotOptions {
  readonly curves?: ReadonlyArray<Curve>;
  readonly hlines?: ReadonlyArray<HLine>;
  /** Extra y-values the bounds must cover. There is no x counterpart. */
  readonly includeY?: ReadonlyArray<number>;
  /** Keep x = 0 in the middle of the plot. */
  readonly symmetricalXBounds?: boolean;
  /** Keep y = 0 in the middle of the plot. */
  readonly symmetricalYBounds?: boolean;
  readonly margin?: MarginConfig;
  readonly width?: number;
  readonly height?: number;
  /** width / height. Only used to derive a missing width or height. */
  readonly aspectRatio?: number;
  /** Show the x-value when hovering (default: true). */
  readonly showX?: boolean;
  /** Show the y-value when hovering (default: true). */
  readonly showY?: boolean;
  readonly theme?: 'dark' | 'light' | Partial<ThemeConfig>;
}

/**
 * Hover input supplied by the host for one frame.
 */
export interface PointerState {
  readonly hovered: boolean;
  /** Pointer position in screen-space, or null when the host has none. */
  readonly pos: Pos2 | null;
}
