/**
 * Break-Even Solver
 *
 * Vehicle B (the electric/hybrid alternative) has paid back once its
 * cumulative cost is no greater than vehicle A's, i.e. difference >= 0 with
 * difference = costA - costB. Both modes share the same scan for the first
 * such year; INTERPOLATED additionally refines it between the bracketing
 * years.
 */

import { PaybackError } from './errors';
import { BreakEvenMode, BreakEvenResult, CostProjection } from './types';

/**
 * Index of the first record where B has caught up with A, or null.
 */
export function findFirstPaybackIndex(projection: CostProjection): number | null {
  const index = projection.findIndex(r => r.difference >= 0);
  return index >= 0 ? index : null;
}

/**
 * Linear interpolation of the difference series between y1 and y2.
 *
 * @throws PaybackError (DegenerateInterpolation) on a flat segment
 */
export function interpolateCrossing(y1: number, diff1: number, y2: number, diff2: number): number {
  const slope = (diff2 - diff1) / (y2 - y1);
  if (slope === 0 || !Number.isFinite(slope)) {
    const message = `Cannot interpolate crossing between years ${y1} and ${y2}: slope is ${slope}`;
    console.error(`[BreakEven] ${message}`);
    throw new PaybackError('DegenerateInterpolation', message);
  }
  return y2 - diff2 / slope;
}

export function findBreakEven(projection: CostProjection, mode: BreakEvenMode = 'INTEGER'): BreakEvenResult {
  const index = findFirstPaybackIndex(projection);
  if (index === null) {
    return { status: 'NOT_REACHED', mode };
  }

  // Nothing precedes year 0, so there is no segment to interpolate on
  if (index === 0) {
    return { status: 'AT_PURCHASE', mode, year: 0 };
  }

  const after = projection[index];
  const before = projection[index - 1];
  const bracket = { from: before.year, to: after.year };

  if (mode === 'INTEGER') {
    return { status: 'REACHED', mode, year: after.year, bracket };
  }

  const year = interpolateCrossing(before.year, before.difference, after.year, after.difference);
  return { status: 'REACHED', mode, year, bracket };
}
