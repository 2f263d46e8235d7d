import type { MarginConfig, Stroke } from './types';
import { grayRgba01 } from '../utils/colors';

export const defaultMargin = {
  x: 4,
  y: 4,
} as const satisfies Required<MarginConfig>;

export const defaultCurveStroke = {
  width: 1.5,
  color: grayRgba01(120),
} as const satisfies Stroke;

export const defaultHLineStroke = {
  width: 1,
  color: grayRgba01(120),
} as const satisfies Stroke;

/** Screen-space radius within which a hovered curve point is picked. */
export const HOVER_INTERACT_RADIUS_PX = 16;

/** Radius of the marker drawn on the hovered curve point. */
export const HOVER_MARKER_RADIUS_PX = 3;

export const CROSSHAIR_WIDTH_PX = 1;

/** Upper bound for hover label decimals. */
export const MAX_LABEL_DECIMALS = 6;

export const BACKGROUND_CORNER_RADIUS_PX = 2;

export const FRAME_WIDTH_PX = 1;

export const defaultOptions = {
  symmetricalXBounds: false,
  symmetricalYBounds: false,
  margin: defaultMargin,
  showX: true,
  showY: true,
  theme: 'dark',
} as const;
