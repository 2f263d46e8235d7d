import { describe, it, expect } from 'vitest';
import { paintToSvg } from '../paintToSvg';
import { circleFilled, lineSegment, path } from '../shapes';
import type { PaintCommand } from '../shapes';
import type { ScreenRect } from '../../config/types';

const plotRect: ScreenRect = { left: 0, top: 0, right: 100, bottom: 50 };
const white = [1, 1, 1, 1] as const;
const red = [1, 0, 0, 1] as const;

describe('paintToSvg', () => {
  it('sizes the document from the background and clips plot content', () => {
    const commands: PaintCommand[] = [
      {
        clipRect: null,
        shape: { kind: 'rect', rect: plotRect, cornerRadius: 2, fill: [0, 0, 0, 1], stroke: { width: 1, color: white } },
      },
      { clipRect: plotRect, shape: lineSegment({ x: 0, y: 25.126 }, { x: 100, y: 25 }, { width: 1.5, color: red }) },
      { clipRect: plotRect, shape: circleFilled({ x: 10, y: 10 }, 3, [0, 1, 0, 0.5]) },
    ];

    expect(paintToSvg(commands).split('\n')).toEqual([
      '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="50" viewBox="0 0 100 50">',
      '<defs><clipPath id="clip0"><rect x="0" y="0" width="100" height="50" /></clipPath></defs>',
      '<rect x="0" y="0" width="100" height="50" rx="2" fill="rgba(0,0,0,1)" stroke="rgba(255,255,255,1)" stroke-width="1" />',
      '<g clip-path="url(#clip0)"><line x1="0" y1="25.13" x2="100" y2="25" stroke="rgba(255,0,0,1)" stroke-width="1.5" /></g>',
      '<g clip-path="url(#clip0)"><circle cx="10" cy="10" r="3" fill="rgba(0,255,0,0.5)" /></g>',
      '</svg>',
    ]);
  });

  it('gives each distinct clip rectangle its own clip path', () => {
    const other: ScreenRect = { left: 0, top: 50, right: 100, bottom: 100 };
    const svg = paintToSvg([
      { clipRect: plotRect, shape: circleFilled({ x: 1, y: 1 }, 1, white) },
      { clipRect: other, shape: circleFilled({ x: 2, y: 2 }, 1, white) },
      { clipRect: plotRect, shape: circleFilled({ x: 3, y: 3 }, 1, white) },
    ]);
    const lines = svg.split('\n');
    expect(lines[0]).toBe('<svg xmlns="http://www.w3.org/2000/svg" width="100" height="100" viewBox="0 0 100 100">');
    expect(lines[1]).toBe(
      '<defs><clipPath id="clip0"><rect x="0" y="0" width="100" height="50" /></clipPath>' +
        '<clipPath id="clip1"><rect x="0" y="50" width="100" height="50" /></clipPath></defs>'
    );
    expect(lines.slice(2, 5).map((l) => l.slice(0, 27))).toEqual([
      '<g clip-path="url(#clip0)">',
      '<g clip-path="url(#clip1)">',
      '<g clip-path="url(#clip0)">',
    ]);
  });

  it('writes polylines and drops non-finite points', () => {
    const svg = paintToSvg(
      [
        {
          clipRect: null,
          shape: path(
            [
              { x: 0, y: 0 },
              { x: Number.NaN, y: 1 },
              { x: 10.004, y: -0.001 },
            ],
            { width: 2, color: red }
          ),
        },
      ],
      { size: { width: 20, height: 20 } }
    );
    expect(svg.split('\n')[1]).toBe(
      '<path d="M0 0 L10 0" fill="none" stroke-linejoin="round" stroke="rgba(255,0,0,1)" stroke-width="2" />'
    );
  });

  it('skips shapes with nothing finite to draw', () => {
    const svg = paintToSvg(
      [
        { clipRect: null, shape: path([{ x: 1, y: 1 }], { width: 1, color: red }) },
        { clipRect: null, shape: circleFilled({ x: Number.NaN, y: 0 }, 1, red) },
        { clipRect: null, shape: lineSegment({ x: 0, y: 0 }, { x: Number.POSITIVE_INFINITY, y: 0 }, { width: 1, color: red }) },
      ],
      { size: { width: 10, height: 10 } }
    );
    expect(svg).toBe('<svg xmlns="http://www.w3.org/2000/svg" width="10" height="10" viewBox="0 0 10 10">\n</svg>');
  });

  it('stacks multi-line text above a bottom anchor and escapes it', () => {
    const svg = paintToSvg(
      [
        {
          clipRect: null,
          shape: {
            kind: 'text',
            pos: { x: 50, y: 40 },
            anchor: { horizontal: 'middle', vertical: 'bottom' },
            text: 'a<b\nx = 1',
            color: white,
            fontFamily: '"Mono"',
            fontSize: 10,
          },
        },
      ],
      { size: { width: 100, height: 50 } }
    );
    expect(svg.split('\n')[1]).toBe(
      '<text text-anchor="middle" font-family="&quot;Mono&quot;" font-size="10" fill="rgba(255,255,255,1)">' +
        '<tspan x="50" y="28">a&lt;b</tspan><tspan x="50" y="40">x = 1</tspan></text>'
    );
  });

  it('places a top-anchored line one font size below the anchor', () => {
    const svg = paintToSvg(
      [
        {
          clipRect: null,
          shape: {
            kind: 'text',
            pos: { x: 5, y: 5 },
            anchor: { horizontal: 'start', vertical: 'top' },
            text: 'y = 2',
            color: white,
            fontFamily: 'serif',
            fontSize: 12,
          },
        },
      ],
      { size: { width: 100, height: 50 } }
    );
    expect(svg).toContain('<text text-anchor="start" font-family="serif" font-size="12" fill="rgba(255,255,255,1)"><tspan x="5" y="17">y = 2</tspan></text>');
  });
});
