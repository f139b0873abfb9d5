/**
 * Presentation helpers
 *
 * The only place model output gets rounded. Rows and series are plain
 * objects so any table or chart component can consume them.
 */

import { formatYears, roundTo } from '../utils/formatNumber';
import { BreakEvenResult, CostProjection } from './types';

export interface ProjectionTableRow {
  year: number;
  costA: number;
  costB: number;
  difference: number;
}

export interface ChartPoint {
  year: number;
  [seriesName: string]: number;
}

export function toTableRows(projection: CostProjection): ProjectionTableRow[] {
  return projection.map(r => ({
    year: r.year,
    costA: roundTo(r.costA),
    costB: roundTo(r.costB),
    difference: roundTo(r.difference),
  }));
}

/**
 * One point per year keyed by vehicle name. Identical names would collide,
 * so B gets a suffix in that case.
 */
export function toChartSeries(
  projection: CostProjection,
  nameA: string,
  nameB: string
): { points: ChartPoint[]; keyA: string; keyB: string } {
  const keyA = nameA;
  const keyB = nameB === nameA ? `${nameB} (B)` : nameB;
  const points = projection.map(r => ({
    year: r.year,
    [keyA]: roundTo(r.costA),
    [keyB]: roundTo(r.costB),
  }));
  return { points, keyA, keyB };
}

export function describeBreakEven(result: BreakEvenResult, alternativeName: string): string {
  switch (result.status) {
    case 'NOT_REACHED':
      return `${alternativeName} does not reach the break-even point within the selected horizon.`;
    case 'AT_PURCHASE':
      return `${alternativeName} is already the cheaper option at purchase (year 0).`;
    case 'REACHED':
      if (result.mode === 'INTERPOLATED') {
        return (
          `${alternativeName} reaches the break-even point after ${formatYears(result.year)} ` +
          `(between years ${result.bracket.from} and ${result.bracket.to}).`
        );
      }
      return `${alternativeName} reaches the break-even point in year ${result.year}.`;
  }
}
