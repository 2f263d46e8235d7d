import { describe, it, expect } from 'vitest';
import { createCurve, createCurveFromYs, createHLine } from '../createCurve';

const defaultGray = [120 / 255, 120 / 255, 120 / 255, 1];

describe('createCurve', () => {
  it('normalizes tuples and objects and computes bounds once', () => {
    const curve = createCurve([[1, 2], { x: -3, y: 4 }, [0, -1]]);
    expect(curve.values).toEqual([
      { x: 1, y: 2 },
      { x: -3, y: 4 },
      { x: 0, y: -1 },
    ]);
    expect(curve.bounds).toEqual({ xMin: -3, xMax: 1, yMin: -1, yMax: 4 });
  });

  it('is immutable', () => {
    const curve = createCurve([[0, 0]]);
    expect(Object.isFrozen(curve)).toBe(true);
    expect(Object.isFrozen(curve.values)).toBe(true);
    expect(Object.isFrozen(curve.values[0])).toBe(true);
    expect(Object.isFrozen(curve.stroke)).toBe(true);
  });

  it('accepts any iterable', () => {
    function* values() {
      yield [0, 0] as const;
      yield [2, 1] as const;
    }
    expect(createCurve(values()).bounds).toEqual({ xMin: 0, xMax: 2, yMin: 0, yMax: 1 });
  });

  it('uses the default stroke and an empty name', () => {
    const curve = createCurve([]);
    expect(curve.stroke).toEqual({ width: 1.5, color: defaultGray });
    expect(curve.name).toBe('');
  });

  it('has empty bounds without values', () => {
    expect(createCurve([]).bounds).toEqual({
      xMin: Number.POSITIVE_INFINITY,
      xMax: Number.NEGATIVE_INFINITY,
      yMin: Number.POSITIVE_INFINITY,
      yMax: Number.NEGATIVE_INFINITY,
    });
  });

  it('applies a style', () => {
    const curve = createCurve([[0, 0]], { name: 'sine', width: 3, color: 'rgb(0, 255, 0)' });
    expect(curve.name).toBe('sine');
    expect(curve.stroke).toEqual({ width: 3, color: [0, 1, 0, 1] });
  });

  it('falls back for an invalid width or color', () => {
    expect(createCurve([], { width: -1, color: 'nope' }).stroke).toEqual({ width: 1.5, color: defaultGray });
    expect(createCurve([], { width: Number.NaN }).stroke.width).toBe(1.5);
    expect(createCurve([], { width: 0 }).stroke.width).toBe(0);
  });
});

describe('createCurveFromYs', () => {
  it('uses the index as x', () => {
    const curve = createCurveFromYs([3, 1, 2], { name: 'ys' });
    expect(curve.values).toEqual([
      { x: 0, y: 3 },
      { x: 1, y: 1 },
      { x: 2, y: 2 },
    ]);
    expect(curve.bounds).toEqual({ xMin: 0, xMax: 2, yMin: 1, yMax: 3 });
    expect(curve.name).toBe('ys');
  });

  it('accepts typed arrays', () => {
    expect(createCurveFromYs(new Float64Array([0.5, -0.5])).values).toEqual([
      { x: 0, y: 0.5 },
      { x: 1, y: -0.5 },
    ]);
  });
});

describe('createHLine', () => {
  it('defaults to a 1pt gray stroke', () => {
    expect(createHLine(2)).toEqual({ y: 2, stroke: { width: 1, color: defaultGray } });
  });

  it('applies a stroke', () => {
    expect(createHLine(0, { width: 2, color: '#fff' })).toEqual({ y: 0, stroke: { width: 2, color: [1, 1, 1, 1] } });
  });
});
