import { describe, it, expect } from 'vitest';
import { renderCurve, renderHLine, renderPlotItems } from '../renderPlotItems';
import { createPlotTransform } from '../../transform/createPlotTransform';
import { createCurve, createHLine } from '../../../../data/createCurve';

// value (x, y) -> screen (10x, 100 - 10y)
const transform = createPlotTransform(
  { xMin: 0, xMax: 10, yMin: 0, yMax: 10 },
  { left: 0, top: 0, right: 100, bottom: 100 }
);

describe('renderHLine', () => {
  it('spans the visible x-range at the line height', () => {
    const hline = createHLine(5, { width: 2, color: '#ff0000' });
    expect(renderHLine(hline, transform)).toEqual({
      kind: 'lineSegment',
      points: [
        { x: 0, y: 50 },
        { x: 100, y: 50 },
      ],
      stroke: { width: 2, color: [1, 0, 0, 1] },
    });
  });
});

describe('renderCurve', () => {
  it('draws a single value as a filled circle of half the stroke width', () => {
    const curve = createCurve([[5, 5]], { width: 4, color: '#00ff00' });
    expect(renderCurve(curve, transform)).toEqual({
      kind: 'circle',
      center: { x: 50, y: 50 },
      radius: 2,
      fill: [0, 1, 0, 1],
    });
  });

  it('draws several values as a polyline in order', () => {
    const curve = createCurve([
      [0, 0],
      [5, 10],
      [10, 5],
    ]);
    const shape = renderCurve(curve, transform);
    expect(shape?.kind).toBe('path');
    if (shape?.kind === 'path') {
      expect(shape.points).toEqual([
        { x: 0, y: 100 },
        { x: 50, y: 0 },
        { x: 100, y: 50 },
      ]);
      expect(shape.stroke).toBe(curve.stroke);
    }
  });

  it('draws nothing for an empty curve', () => {
    expect(renderCurve(createCurve([]), transform)).toBeNull();
  });
});

describe('renderPlotItems', () => {
  it('emits hlines before curves and skips empty curves', () => {
    const shapes = renderPlotItems(
      [createCurve([[1, 1], [2, 2]]), createCurve([]), createCurve([[3, 3]])],
      [createHLine(2), createHLine(8)],
      transform
    );
    expect(shapes.map((s) => s.kind)).toEqual(['lineSegment', 'lineSegment', 'path', 'circle']);
  });

  it('returns nothing for no items', () => {
    expect(renderPlotItems([], [], transform)).toEqual([]);
  });
});
