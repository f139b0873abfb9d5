/**
 * Payback Simulation
 *
 * Request interface for the model: validates everything up front, then runs
 * rate conversion -> accumulation -> break-even. Pure; no state between
 * calls.
 */

import { findBreakEven } from './break_even';
import { projectCumulativeCosts } from './cost_accumulator';
import { PaybackError, requireNonNegative, requirePositive } from './errors';
import { validateMarketRates } from './market_rates';
import { annualCostFor } from './rate_converter';
import {
  BreakEvenResult,
  CostProjection,
  MarketRates,
  SimulationRequest,
  SimulationResult,
  VehicleProfile,
} from './types';

/** Purchase-price multiplier for vehicle B when the incentive is applied (18% off) */
export const INCENTIVE_FACTOR = 0.82;

function validateVehicle(vehicle: VehicleProfile, label: string): void {
  requireNonNegative(vehicle.purchasePriceUsd, `${label} (${vehicle.name}) purchase price`);
  requirePositive(vehicle.consumptionRate, `${label} (${vehicle.name}) consumption rate`);
}

export function validateRequest(request: SimulationRequest, rates: MarketRates): void {
  validateVehicle(request.vehicleA, 'vehicle A');
  validateVehicle(request.vehicleB, 'vehicle B');
  requirePositive(request.annualDistanceKm, 'annual distance');
  if (!Number.isInteger(request.horizonYears) || request.horizonYears < 1) {
    throw new PaybackError('InvalidInput', `horizon must be an integer >= 1 (got ${request.horizonYears})`);
  }
  validateMarketRates(rates);
}

interface PreparedRun {
  projection: CostProjection;
  purchasePriceA: number;
  purchasePriceB: number;
  annualCostA: number;
  annualCostB: number;
}

function prepare(request: SimulationRequest, rates: MarketRates): PreparedRun {
  validateRequest(request, rates);

  const { vehicleA, vehicleB, annualDistanceKm, horizonYears } = request;
  const purchasePriceA = vehicleA.purchasePriceUsd;
  const purchasePriceB = request.incentiveApplied
    ? vehicleB.purchasePriceUsd * INCENTIVE_FACTOR
    : vehicleB.purchasePriceUsd;

  // Distance is constant across years, so one annual figure per vehicle
  const annualCostA = annualCostFor(vehicleA, annualDistanceKm, rates);
  const annualCostB = annualCostFor(vehicleB, annualDistanceKm, rates);

  const projection = projectCumulativeCosts({
    purchasePriceA,
    purchasePriceB,
    annualCostA,
    annualCostB,
    horizonYears,
  });

  return { projection, purchasePriceA, purchasePriceB, annualCostA, annualCostB };
}

/**
 * Run one payback simulation.
 *
 * @throws PaybackError (InvalidInput) before any projection is built
 * @throws PaybackError (DegenerateInterpolation) from the interpolated solver
 */
export function simulate(request: SimulationRequest, rates: MarketRates): SimulationResult {
  const run = prepare(request, rates);
  return { ...run, breakEven: findBreakEven(run.projection, request.mode ?? 'INTEGER') };
}

/**
 * Same projection, solved in both modes (for side-by-side display).
 */
export function simulateBothModes(
  request: SimulationRequest,
  rates: MarketRates
): { projection: CostProjection; integer: BreakEvenResult; interpolated: BreakEvenResult } {
  const { projection } = prepare(request, rates);
  return {
    projection,
    integer: findBreakEven(projection, 'INTEGER'),
    interpolated: findBreakEven(projection, 'INTERPOLATED'),
  };
}
