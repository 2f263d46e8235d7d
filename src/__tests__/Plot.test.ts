import { describe, it, expect } from 'vitest';
import { NO_POINTER, Plot, createPlot, renderPlot } from '../Plot';
import { createCurve } from '../data/createCurve';

const curve = createCurve([
  [0, 0],
  [1, 1],
]);

describe('createPlot', () => {
  it('resolves options once', () => {
    const plot = createPlot({ curves: [curve], margin: { x: 0, y: 0 } });
    expect(plot.options.margin).toEqual({ x: 0, y: 0 });
    expect(plot.options.rawBounds).toEqual({ xMin: 0, xMax: 1, yMin: 0, yMax: 1 });
  });

  it('derives the desired size from the available space', () => {
    expect(createPlot({}).desiredSize({ width: 400, height: 300 })).toEqual({ width: 400, height: 300 });
    expect(createPlot({ aspectRatio: 2 }).desiredSize({ width: 400, height: 300 })).toEqual({ width: 400, height: 200 });
    expect(createPlot({ height: 100, aspectRatio: 2 }).desiredSize({ width: 400, height: 300 })).toEqual({
      width: 200,
      height: 100,
    });
  });

  it('renders into the rectangle it is given', () => {
    const rect = { left: 10, top: 10, right: 138, bottom: 138 };
    const frame = createPlot({ curves: [curve] }).ui(rect, NO_POINTER);
    expect(frame.rect).toBe(rect);
    expect(frame.hovered).toBe(false);
    expect(frame.commands.map((c) => c.shape.kind)).toEqual(['rect', 'path']);
  });
});

describe('renderPlot', () => {
  it('places the plot at the top-left of the available rectangle', () => {
    const frame = renderPlot({ curves: [curve], width: 200, aspectRatio: 2 }, { left: 10, top: 20, right: 510, bottom: 420 });
    expect(frame.rect).toEqual({ left: 10, top: 20, right: 210, bottom: 120 });
    expect(frame.hover).toBeNull();
  });

  it('is exposed on the Plot namespace', () => {
    expect(Plot.create).toBe(createPlot);
    expect(Plot.render).toBe(renderPlot);
  });
});
