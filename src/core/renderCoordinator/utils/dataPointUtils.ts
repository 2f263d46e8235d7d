/**
 * Value type guards and accessors.
 *
 * Curves accept values either as `{ x, y }` objects or `[x, y]` tuples; these
 * helpers normalize both forms.
 *
 * @module dataPointUtils
 */

import type { Value, ValueLike, ValueTuple } from '../../../config/types';

/**
 * Exhaustiveness guard for switches over a union: reaching it means a variant was added
 * without a matching case.
 */
export const assertUnreachable = (value: never): never => {
  throw new Error(`Plot: unhandled variant: ${String(value)}`);
};

/**
 * Type guard: checks if a value is in tuple form `[x, y]`.
 */
export const isTupleValue = (p: ValueLike): p is ValueTuple => Array.isArray(p);

/**
 * Extracts x,y coordinates from either tuple or object value format.
 */
export const getPointXY = (p: ValueLike): Value => {
  if (isTupleValue(p)) return { x: p[0], y: p[1] };
  return { x: p.x, y: p.y };
};

/**
 * Creates a frozen value-space point.
 */
export const createValue = (x: number, y: number): Value => Object.freeze({ x, y });
