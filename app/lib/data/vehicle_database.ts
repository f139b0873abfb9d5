/**
 * Vehicle Database Loader
 *
 * Reads the JSON workbook exported from the vehicle spreadsheet. It has two
 * sheets: `vehicles` (one row per model) and `configuration` (parameter/value
 * pairs resolved into MarketRates).
 */

import * as fs from 'fs';
import * as path from 'path';
import { PaybackError } from '../model/errors';
import { resolveMarketRates } from '../model/market_rates';
import { ConfigurationRow, MarketRates, VehicleCatalog, VehicleRow } from '../model/types';
import { buildCatalog, vehicleFromRow } from '../model/vehicle_catalog';

export const DEFAULT_DATABASE_FILE = path.join(process.cwd(), 'data', 'vehicle_database.json');

export interface VehicleDatabase {
  catalog: VehicleCatalog;
  rates: MarketRates;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSheet(workbook: Record<string, unknown>, sheet: string): Record<string, unknown>[] {
  const rows = workbook[sheet];
  if (!Array.isArray(rows)) {
    throw new PaybackError('InvalidInput', `Sheet "${sheet}" is missing or is not a list of rows`);
  }
  return rows.map((row: unknown, i) => {
    if (!isRecord(row)) {
      throw new PaybackError('InvalidInput', `Sheet "${sheet}", row ${i + 1} is not an object`);
    }
    return row;
  });
}

/**
 * parameter -> value map; later rows override earlier ones
 */
export function configurationToMap(rows: ConfigurationRow[]): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  for (const row of rows) {
    if (typeof row.parameter === 'string' && row.parameter.trim() !== '') {
      config[row.parameter.trim()] = row.value;
    }
  }
  return config;
}

export function parseVehicleDatabase(workbook: unknown): VehicleDatabase {
  if (!isRecord(workbook)) {
    throw new PaybackError('InvalidInput', 'Vehicle database must be a JSON object');
  }
  const vehicleRows: VehicleRow[] = readSheet(workbook, 'vehicles');
  const configRows: ConfigurationRow[] = readSheet(workbook, 'configuration');

  const catalog = buildCatalog(vehicleRows.map(vehicleFromRow));
  const rates = resolveMarketRates(configurationToMap(configRows));
  return { catalog, rates };
}

/**
 * @throws PaybackError (DataFileNotFound) if the file does not exist
 * @throws PaybackError (InvalidInput | EmptyCandidateSet) on bad content
 */
export function loadVehicleDatabase(filePath: string = DEFAULT_DATABASE_FILE): VehicleDatabase {
  if (!fs.existsSync(filePath)) {
    throw new PaybackError(
      'DataFileNotFound',
      `Data file not found: ${filePath}. Make sure the repository is complete or place the workbook at that path.`
    );
  }

  let workbook: unknown;
  try {
    workbook = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    console.error(`[VehicleDatabase] Failed to parse ${filePath}:`, e);
    throw new PaybackError(
      'InvalidInput',
      `Could not parse ${filePath}: ${e instanceof Error ? e.message : String(e)}`
    );
  }

  return parseVehicleDatabase(workbook);
}
