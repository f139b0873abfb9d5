/**
 * Cost Accumulator
 *
 * Cumulative ownership cost of two vehicles, year 0 through the horizon.
 * Year 0 is the purchase; every later year adds one annual cost. Values are
 * kept at full precision (rounding belongs to presentation.ts).
 */

import { PaybackError, requireNonNegative } from './errors';
import { CostProjection, ProjectionRecord } from './types';

export interface AccumulationInputs {
  purchasePriceA: number;
  purchasePriceB: number;
  annualCostA: number;
  annualCostB: number;
  horizonYears: number;
}

export function projectCumulativeCosts(inputs: AccumulationInputs): CostProjection {
  const { horizonYears } = inputs;
  if (!Number.isInteger(horizonYears) || horizonYears < 1) {
    throw new PaybackError('InvalidInput', `horizon must be an integer >= 1 (got ${horizonYears})`);
  }
  const annualA = requireNonNegative(inputs.annualCostA, 'annual cost A');
  const annualB = requireNonNegative(inputs.annualCostB, 'annual cost B');

  let cumulativeA = requireNonNegative(inputs.purchasePriceA, 'purchase price A');
  let cumulativeB = requireNonNegative(inputs.purchasePriceB, 'purchase price B');

  const records: ProjectionRecord[] = [];
  for (let year = 0; year <= horizonYears; year++) {
    if (year > 0) {
      cumulativeA += annualA;
      cumulativeB += annualB;
    }
    records.push(
      Object.freeze({
        year,
        costA: cumulativeA,
        costB: cumulativeB,
        difference: cumulativeA - cumulativeB,
      })
    );
  }

  return Object.freeze(records);
}
