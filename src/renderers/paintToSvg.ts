/**
 * Reference painter: serializes paint commands to a standalone SVG document.
 *
 * The plot core never paints by itself; this is the minimal host surface used by
 * the demo and by anyone who wants a static image of a frame.
 */

import type { ScreenRect, Size, Stroke } from '../config/types';
import { assertUnreachable } from '../core/renderCoordinator/utils/dataPointUtils';
import { rgba01ToCss } from '../utils/colors';
import type { PaintCommand, Shape, TextAnchor } from './shapes';

export interface SvgPaintOptions {
  /** Document size; defaults to the union of all command rectangles' right/bottom edges. */
  readonly size?: Size;
  /** Line height as a multiple of the font size. */
  readonly lineHeight?: number;
}

const DEFAULT_LINE_HEIGHT = 1.2;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const fmt = (v: number): string => {
  const rounded = Math.round(v * 100) / 100;
  return String(Object.is(rounded, -0) ? 0 : rounded);
};

const isFinitePos = (p: { readonly x: number; readonly y: number }): boolean => Number.isFinite(p.x) && Number.isFinite(p.y);

const strokeAttrs = (stroke: Stroke): string =>
  `stroke="${rgba01ToCss(stroke.color)}" stroke-width="${fmt(stroke.width)}"`;

const rectKey = (r: ScreenRect): string => `${r.left},${r.top},${r.right},${r.bottom}`;

const TEXT_ANCHOR: Record<TextAnchor['horizontal'], string> = { start: 'start', middle: 'middle', end: 'end' };

function textBaselineOffset(anchor: TextAnchor, lineCount: number, fontSize: number, lineHeight: number): number {
  const blockHeight = (lineCount - 1) * fontSize * lineHeight;
  switch (anchor.vertical) {
    case 'top':
      return fontSize;
    case 'middle':
      return fontSize / 2 - blockHeight / 2;
    case 'bottom':
      return -blockHeight;
    default:
      return assertUnreachable(anchor.vertical);
  }
}

function shapeToSvg(shape: Shape, lineHeight: number): string | null {
  switch (shape.kind) {
    case 'lineSegment': {
      const [a, b] = shape.points;
      if (!isFinitePos(a) || !isFinitePos(b)) return null;
      return `<line x1="${fmt(a.x)}" y1="${fmt(a.y)}" x2="${fmt(b.x)}" y2="${fmt(b.y)}" ${strokeAttrs(shape.stroke)} />`;
    }
    case 'path': {
      const points = shape.points.filter(isFinitePos);
      if (points.length < 2) return null;
      const d = points.map((p, i) => `${i === 0 ? 'M' : 'L'}${fmt(p.x)} ${fmt(p.y)}`).join(' ');
      return `<path d="${d}" fill="none" stroke-linejoin="round" ${strokeAttrs(shape.stroke)} />`;
    }
    case 'circle': {
      if (!isFinitePos(shape.center)) return null;
      return `<circle cx="${fmt(shape.center.x)}" cy="${fmt(shape.center.y)}" r="${fmt(shape.radius)}" fill="${rgba01ToCss(shape.fill)}" />`;
    }
    case 'rect': {
      const { left, top, right, bottom } = shape.rect;
      return `<rect x="${fmt(left)}" y="${fmt(top)}" width="${fmt(right - left)}" height="${fmt(bottom - top)}" rx="${fmt(shape.cornerRadius)}" fill="${rgba01ToCss(shape.fill)}" ${strokeAttrs(shape.stroke)} />`;
    }
    case 'text': {
      if (!isFinitePos(shape.pos)) return null;
      const lines = shape.text.split('\n');
      const firstBaseline = shape.pos.y + textBaselineOffset(shape.anchor, lines.length, shape.fontSize, lineHeight);
      const spans = lines
        .map(
          (line, i) =>
            `<tspan x="${fmt(shape.pos.x)}" y="${fmt(firstBaseline + i * shape.fontSize * lineHeight)}">${escapeXml(line)}</tspan>`
        )
        .join('');
      return `<text text-anchor="${TEXT_ANCHOR[shape.anchor.horizontal]}" font-family="${escapeXml(shape.fontFamily)}" font-size="${fmt(shape.fontSize)}" fill="${rgba01ToCss(shape.color)}">${spans}</text>`;
    }
    default:
      return assertUnreachable(shape);
  }
}

const commandExtent = (commands: ReadonlyArray<PaintCommand>): Size => {
  let width = 0;
  let height = 0;
  for (const { clipRect, shape } of commands) {
    const r = shape.kind === 'rect' ? shape.rect : clipRect;
    if (!r) continue;
    width = Math.max(width, r.right);
    height = Math.max(height, r.bottom);
  }
  return { width, height };
};

/**
 * Paints commands in order. Each distinct clip rectangle becomes one `<clipPath>`.
 */
export function paintToSvg(commands: ReadonlyArray<PaintCommand>, options: SvgPaintOptions = {}): string {
  const size = options.size ?? commandExtent(commands);
  const lineHeight = options.lineHeight ?? DEFAULT_LINE_HEIGHT;

  const clipIds = new Map<string, string>();
  const defs: string[] = [];
  const body: string[] = [];

  for (const { clipRect, shape } of commands) {
    const element = shapeToSvg(shape, lineHeight);
    if (element === null) continue;

    if (!clipRect) {
      body.push(element);
      continue;
    }

    const key = rectKey(clipRect);
    let id = clipIds.get(key);
    if (id === undefined) {
      id = `clip${clipIds.size}`;
      clipIds.set(key, id);
      const { left, top, right, bottom } = clipRect;
      defs.push(
        `<clipPath id="${id}"><rect x="${fmt(left)}" y="${fmt(top)}" width="${fmt(right - left)}" height="${fmt(bottom - top)}" /></clipPath>`
      );
    }
    body.push(`<g clip-path="url(#${id})">${element}</g>`);
  }

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${fmt(size.width)}" height="${fmt(size.height)}" viewBox="0 0 ${fmt(size.width)} ${fmt(size.height)}">`,
    defs.length > 0 ? `<defs>${defs.join('')}</defs>` : '',
    ...body,
    '</svg>',
  ]
    .filter((line) => line.length > 0)
    .join('\n');
}
