/**
 * Payback Model Types
 *
 * All money values are USD (reference currency) unless the field name says
 * otherwise. Local-currency prices live only in MarketRates.
 */

export type VehicleClass = 'COMBUSTION' | 'ELECTRIC';

export interface VehicleProfile {
  name: string;
  make: string;
  model: string;
  vehicleClass: VehicleClass;
  purchasePriceUsd: number;
  /** km per litre for COMBUSTION, kWh per km for ELECTRIC */
  consumptionRate: number;
}

export interface MarketRates {
  exchangeRate: number; // local currency per USD
  fuelPrice: number; // local currency per gallon
  electricityPrice: number; // local currency per kWh
  litersPerGallon: number;
}

export type BreakEvenMode = 'INTEGER' | 'INTERPOLATED';

export interface SimulationParameters {
  annualDistanceKm: number;
  horizonYears: number;
  incentiveApplied?: boolean;
  mode?: BreakEvenMode;
}

export interface SimulationRequest extends SimulationParameters {
  vehicleA: VehicleProfile;
  vehicleB: VehicleProfile;
}

export interface ProjectionRecord {
  year: number;
  costA: number;
  costB: number;
  difference: number; // costA - costB
}

export type CostProjection = ReadonlyArray<Readonly<ProjectionRecord>>;

export interface YearBracket {
  from: number;
  to: number;
}

export type BreakEvenResult =
  | { status: 'NOT_REACHED'; mode: BreakEvenMode }
  | { status: 'AT_PURCHASE'; mode: BreakEvenMode; year: 0 }
  | { status: 'REACHED'; mode: BreakEvenMode; year: number; bracket: YearBracket };

export interface SimulationResult {
  projection: CostProjection;
  breakEven: BreakEvenResult;
  purchasePriceA: number;
  purchasePriceB: number;
  annualCostA: number;
  annualCostB: number;
}

export interface VehicleCatalog {
  combustion: VehicleProfile[];
  electric: VehicleProfile[];
}

/** One row of the `vehicles` sheet, before validation */
export interface VehicleRow {
  [column: string]: unknown;
  make?: unknown;
  model?: unknown;
  type?: unknown;
  priceUsd?: unknown;
  kmPerLiter?: unknown;
  kwhPerKm?: unknown;
}

/** One row of the `configuration` sheet */
export interface ConfigurationRow {
  [column: string]: unknown;
  parameter?: unknown;
  value?: unknown;
}
