/**
 * Rate Converter
 *
 * Annual recurring (energy) cost per vehicle class, in USD. Local-currency
 * prices are divided by the exchange rate; purchase prices are never touched
 * here.
 */

import { requireNonNegative, requirePositive } from './errors';
import { MarketRates, VehicleProfile } from './types';

/**
 * Combustion: litres burned times price per litre.
 *
 * @param distanceKm km driven per year
 * @param kmPerLiter fuel economy
 * @param fuelPricePerGallon local currency per gallon
 */
export function annualCostCombustion(
  distanceKm: number,
  kmPerLiter: number,
  fuelPricePerGallon: number,
  litersPerGallon: number,
  exchangeRate: number
): number {
  requireNonNegative(distanceKm, 'distance');
  requirePositive(kmPerLiter, 'consumption rate (km/l)');

  const litersConsumed = distanceKm / kmPerLiter;
  const pricePerLiter = fuelPricePerGallon / litersPerGallon;
  return (litersConsumed * pricePerLiter) / exchangeRate;
}

/**
 * Electric: kWh drawn times price per kWh.
 */
export function annualCostElectric(
  distanceKm: number,
  kwhPerKm: number,
  electricityPricePerKwh: number,
  exchangeRate: number
): number {
  requireNonNegative(distanceKm, 'distance');
  requirePositive(kwhPerKm, 'consumption rate (kWh/km)');

  return (distanceKm * kwhPerKm * electricityPricePerKwh) / exchangeRate;
}

export function annualCostFor(vehicle: VehicleProfile, distanceKm: number, rates: MarketRates): number {
  switch (vehicle.vehicleClass) {
    case 'COMBUSTION':
      return annualCostCombustion(
        distanceKm,
        vehicle.consumptionRate,
        rates.fuelPrice,
        rates.litersPerGallon,
        rates.exchangeRate
      );
    case 'ELECTRIC':
      return annualCostElectric(distanceKm, vehicle.consumptionRate, rates.electricityPrice, rates.exchangeRate);
  }
}
