import { PaybackError, PaybackErrorKind } from '../errors';
import { MarketRates, VehicleProfile } from '../types';

/**
 * Run fn and return the kind of the PaybackError it throws
 */
export function thrownKind(fn: () => unknown): PaybackErrorKind | 'no error' {
  try {
    fn();
  } catch (e) {
    if (e instanceof PaybackError) return e.kind;
    throw e;
  }
  return 'no error';
}

/**
 * Round-number rates: 1 local unit = 1 USD, 1 litre per "gallon", so
 * combustion cost = km / kmPerLiter * fuelPrice and
 * electric cost = km * kWhPerKm * electricityPrice.
 */
export const UNIT_RATES: MarketRates = {
  exchangeRate: 1,
  fuelPrice: 1,
  electricityPrice: 0.25,
  litersPerGallon: 1,
};

export function combustionVehicle(overrides: Partial<VehicleProfile> = {}): VehicleProfile {
  return {
    name: 'Test Sedan',
    make: 'Test',
    model: 'Sedan',
    vehicleClass: 'COMBUSTION',
    purchasePriceUsd: 20000,
    consumptionRate: 5, // km/l -> 10,000 km costs 2,000
    ...overrides,
  };
}

export function electricVehicle(overrides: Partial<VehicleProfile> = {}): VehicleProfile {
  return {
    name: 'Test Volt',
    make: 'Test',
    model: 'Volt',
    vehicleClass: 'ELECTRIC',
    purchasePriceUsd: 30000,
    consumptionRate: 0.2, // kWh/km -> 10,000 km costs 500
    ...overrides,
  };
}
