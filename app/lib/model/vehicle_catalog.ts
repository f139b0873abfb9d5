/**
 * Vehicle Catalog
 *
 * Turns raw `vehicles` sheet rows into validated VehicleProfiles and splits
 * them into the two candidate lists the simulator picks from.
 */

import { PaybackError, requireNonNegative, requirePositive } from './errors';
import { VehicleCatalog, VehicleClass, VehicleProfile, VehicleRow } from './types';

const TYPE_LABELS = new Map<string, VehicleClass>([
  ['combustion', 'COMBUSTION'],
  ['electric', 'ELECTRIC'],
]);

function requireText(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new PaybackError('InvalidInput', `${field} must be a non-empty string`);
  }
  return value.trim();
}

function parseVehicleClass(value: unknown, label: string): VehicleClass {
  const key = typeof value === 'string' ? value.trim().toLowerCase() : '';
  const vehicleClass = TYPE_LABELS.get(key);
  if (!vehicleClass) {
    throw new PaybackError('InvalidInput', `${label}: unknown vehicle type ${JSON.stringify(value)}`);
  }
  return vehicleClass;
}

export function vehicleFromRow(row: VehicleRow): VehicleProfile {
  const make = requireText(row.make, 'make');
  const model = requireText(row.model, 'model');
  const name = `${make} ${model}`;
  const vehicleClass = parseVehicleClass(row.type, name);
  const purchasePriceUsd = requireNonNegative(row.priceUsd, `${name}: price (USD)`);
  const consumptionRate =
    vehicleClass === 'COMBUSTION'
      ? requirePositive(row.kmPerLiter, `${name}: consumption (km/l)`)
      : requirePositive(row.kwhPerKm, `${name}: consumption (kWh/km)`);

  return { name, make, model, vehicleClass, purchasePriceUsd, consumptionRate };
}

/**
 * @throws PaybackError (EmptyCandidateSet) if either class has no vehicle
 */
export function buildCatalog(vehicles: VehicleProfile[]): VehicleCatalog {
  const combustion = vehicles.filter(v => v.vehicleClass === 'COMBUSTION');
  const electric = vehicles.filter(v => v.vehicleClass === 'ELECTRIC');

  if (combustion.length === 0 || electric.length === 0) {
    throw new PaybackError(
      'EmptyCandidateSet',
      'The vehicle database must contain at least one combustion and one electric vehicle'
    );
  }
  return { combustion, electric };
}

export function findVehicle(candidates: VehicleProfile[], name: string): VehicleProfile {
  const match = candidates.find(v => v.name === name);
  if (!match) {
    throw new PaybackError('InvalidInput', `Unknown vehicle: ${name}`);
  }
  return match;
}
