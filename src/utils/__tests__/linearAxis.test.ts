import { describe, it, expect } from 'vitest';
import { createLinearAxis } from '../linearAxis';

describe('createLinearAxis', () => {
  it('maps the value interval onto the screen interval', () => {
    const axis = createLinearAxis(0, 10, 0, 200);
    expect(axis.toScreen(0)).toBe(0);
    expect(axis.toScreen(5)).toBe(100);
    expect(axis.toScreen(10)).toBe(200);
    expect(axis.toScreen(15)).toBe(300);
    expect(axis.toValue(50)).toBe(2.5);
  });

  it('runs backwards when start is greater than end', () => {
    const axis = createLinearAxis(0, 4, 100, 0);
    expect(axis.toScreen(0)).toBe(100);
    expect(axis.toScreen(4)).toBe(0);
    expect(axis.toValue(25)).toBe(3);
  });

  it('keeps its interval endpoints', () => {
    expect(createLinearAxis(-1, 1, 200, 0)).toMatchObject({ min: -1, max: 1, start: 200, end: 0 });
  });

  it('puts a zero-width interval in the middle of the screen', () => {
    const axis = createLinearAxis(2, 2, 0, 100);
    expect(axis.toScreen(2)).toBe(50);
    expect(axis.toScreen(7)).toBe(50);
    expect(axis.toValue(13)).toBe(2);
    expect(axis.unitsPerPixel()).toBe(0);
  });

  it('returns NaN for non-finite input', () => {
    const axis = createLinearAxis(0, 1, 0, 1);
    expect(axis.toScreen(Number.NaN)).toBeNaN();
    expect(axis.toValue(Number.POSITIVE_INFINITY)).toBeNaN();
  });

  it('reports value units per screen unit', () => {
    expect(createLinearAxis(-1, 1, 200, 0).unitsPerPixel()).toBe(0.01);
  });

  it('rejects non-finite intervals', () => {
    expect(() => createLinearAxis(0, Number.NaN, 0, 1)).toThrow('LinearAxis: max must be finite. Received: NaN');
    expect(() => createLinearAxis(0, 1, 0, Number.POSITIVE_INFINITY)).toThrow(
      'LinearAxis: end must be finite. Received: Infinity'
    );
  });
});
