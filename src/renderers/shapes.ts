/**
 * Drawable primitives emitted by the plot.
 *
 * All coordinates are screen-space. A host paints the primitives in order,
 * clipping each to its command's `clipRect` when one is given.
 */

import type { Pos2, ScreenRect, Stroke } from '../config/types';
import type { Rgba01 } from '../utils/colors';

export type TextAnchor = Readonly<{
  horizontal: 'start' | 'middle' | 'end';
  vertical: 'top' | 'middle' | 'bottom';
}>;

export type LineSegmentShape = Readonly<{
  kind: 'lineSegment';
  points: readonly [Pos2, Pos2];
  stroke: Stroke;
}>;

/** Open polyline through `points` in order. */
export type PathShape = Readonly<{
  kind: 'path';
  points: ReadonlyArray<Pos2>;
  stroke: Stroke;
}>;

export type CircleShape = Readonly<{
  kind: 'circle';
  center: Pos2;
  radius: number;
  fill: Rgba01;
}>;

export type RectShape = Readonly<{
  kind: 'rect';
  rect: ScreenRect;
  cornerRadius: number;
  fill: Rgba01;
  stroke: Stroke;
}>;

/** Text may contain `\n`; the anchor applies to the whole block. */
export type TextShape = Readonly<{
  kind: 'text';
  pos: Pos2;
  anchor: TextAnchor;
  text: string;
  color: Rgba01;
  fontFamily: string;
  fontSize: number;
}>;

export type Shape = LineSegmentShape | PathShape | CircleShape | RectShape | TextShape;

export type PaintCommand = Readonly<{
  /** Sub-region the shape is clipped to; null paints with the host's own clip. */
  clipRect: ScreenRect | null;
  shape: Shape;
}>;

export const lineSegment = (a: Pos2, b: Pos2, stroke: Stroke): LineSegmentShape => ({
  kind: 'lineSegment',
  points: [a, b],
  stroke,
});

export const path = (points: ReadonlyArray<Pos2>, stroke: Stroke): PathShape => ({ kind: 'path', points, stroke });

export const circleFilled = (center: Pos2, radius: number, fill: Rgba01): CircleShape => ({
  kind: 'circle',
  center,
  radius,
  fill,
});

export const clipTo = (clipRect: ScreenRect | null, shapes: ReadonlyArray<Shape>): PaintCommand[] =>
  shapes.map((shape) => ({ clipRect, shape }));
