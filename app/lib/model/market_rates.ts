/**
 * Market Rates
 *
 * Resolves the `configuration` sheet (parameter -> value) into MarketRates.
 * A key that is absent falls back to its default; a key that is present must
 * hold a positive number.
 */

import { PaybackError, requirePositive } from './errors';
import { MarketRates } from './types';

export const LITERS_PER_GALLON = 3.78541;

export const CONFIG_KEYS = {
  exchangeRate: 'Exchange rate (PEN per USD)',
  fuelPrice: 'Gasoline price (PEN/gal)',
  electricityPrice: 'Electricity price (PEN/kWh)',
} as const;

export const DEFAULT_MARKET_RATES: Readonly<MarketRates> = Object.freeze({
  exchangeRate: 3.75,
  fuelPrice: 15.99,
  electricityPrice: 0.5634,
  litersPerGallon: LITERS_PER_GALLON,
});

function readRate(config: Readonly<Record<string, unknown>>, key: string, fallback: number): number {
  const raw = config[key];
  if (raw === undefined || raw === null) {
    return fallback;
  }
  // Spreadsheet exports often carry numbers as text
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value !== 'number') {
    throw new PaybackError('InvalidInput', `${key} must be numeric (got ${JSON.stringify(raw)})`);
  }
  return requirePositive(value, key);
}

export function resolveMarketRates(config: Readonly<Record<string, unknown>> = {}): MarketRates {
  return {
    exchangeRate: readRate(config, CONFIG_KEYS.exchangeRate, DEFAULT_MARKET_RATES.exchangeRate),
    fuelPrice: readRate(config, CONFIG_KEYS.fuelPrice, DEFAULT_MARKET_RATES.fuelPrice),
    electricityPrice: readRate(config, CONFIG_KEYS.electricityPrice, DEFAULT_MARKET_RATES.electricityPrice),
    litersPerGallon: LITERS_PER_GALLON,
  };
}

export function validateMarketRates(rates: MarketRates): MarketRates {
  requirePositive(rates.exchangeRate, 'exchange rate');
  requirePositive(rates.fuelPrice, 'fuel price');
  requirePositive(rates.electricityPrice, 'electricity price');
  requirePositive(rates.litersPerGallon, 'litres per gallon');
  return rates;
}
