import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { configurationToMap, loadVehicleDatabase, parseVehicleDatabase } from '../vehicle_database';
import { PaybackError } from '../../model/errors';

function kindOf(fn: () => unknown): string {
  try {
    fn();
  } catch (e) {
    if (e instanceof PaybackError) return e.kind;
    throw e;
  }
  return 'no error';
}

const BUNDLED_DATABASE = path.join(__dirname, '..', '..', '..', '..', 'data', 'vehicle_database.json');

describe('Vehicle Database', () => {
  describe('loadVehicleDatabase', () => {
    it('loads the bundled workbook', () => {
      const { catalog, rates } = loadVehicleDatabase(BUNDLED_DATABASE);
      expect(catalog.combustion.map(v => v.name)).toEqual(['Toyota Corolla', 'Hyundai Accent', 'Kia Sportage']);
      expect(catalog.electric.map(v => v.name)).toEqual(['Nissan Leaf', 'BYD Dolphin', 'Hyundai Kona Electric']);
      expect(catalog.electric[0].consumptionRate).toBe(0.17);
      expect(rates).toEqual({ exchangeRate: 3.75, fuelPrice: 15.99, electricityPrice: 0.5634, litersPerGallon: 3.78541 });
    });

    it('reports a missing file as DataFileNotFound', () => {
      expect(kindOf(() => loadVehicleDatabase(path.join(os.tmpdir(), 'no-such-dir', 'vehicles.json')))).toBe(
        'DataFileNotFound'
      );
    });

    it('reports unparseable JSON as InvalidInput', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'payback-'));
      const file = path.join(dir, 'broken.json');
      fs.writeFileSync(file, '{ "vehicles": [');
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      try {
        expect(kindOf(() => loadVehicleDatabase(file))).toBe('InvalidInput');
      } finally {
        errorSpy.mockRestore();
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe('parseVehicleDatabase', () => {
    const vehicles = [
      { make: 'Kia', model: 'Rio', type: 'Combustion', priceUsd: 16000, kmPerLiter: 17 },
      { make: 'BYD', model: 'Seagull', type: 'Electric', priceUsd: 21000, kwhPerKm: 0.12 },
    ];

    it('applies configuration overrides on top of the defaults', () => {
      const { rates } = parseVehicleDatabase({
        vehicles,
        configuration: [{ parameter: 'Exchange rate (PEN per USD)', value: 3.9 }],
      });
      expect(rates.exchangeRate).toBe(3.9);
      expect(rates.fuelPrice).toBe(15.99);
      expect(rates.electricityPrice).toBe(0.5634);
    });

    it('rejects a workbook without both sheets', () => {
      expect(kindOf(() => parseVehicleDatabase({ vehicles }))).toBe('InvalidInput');
      expect(kindOf(() => parseVehicleDatabase({ vehicles: 'x', configuration: [] }))).toBe('InvalidInput');
      expect(kindOf(() => parseVehicleDatabase([]))).toBe('InvalidInput');
    });

    it('rejects rows that are not objects', () => {
      expect(kindOf(() => parseVehicleDatabase({ vehicles: [42], configuration: [] }))).toBe('InvalidInput');
    });

    it('fails with EmptyCandidateSet when one class is missing', () => {
      expect(kindOf(() => parseVehicleDatabase({ vehicles: [vehicles[0]], configuration: [] }))).toBe(
        'EmptyCandidateSet'
      );
    });
  });

  describe('configurationToMap', () => {
    it('trims parameter names, skips blank ones and lets later rows win', () => {
      expect(
        configurationToMap([
          { parameter: ' Gasoline price (PEN/gal) ', value: 15 },
          { parameter: '', value: 1 },
          { value: 2 },
          { parameter: 'Gasoline price (PEN/gal)', value: 16.5 },
        ])
      ).toEqual({ 'Gasoline price (PEN/gal)': 16.5 });
    });
  });
});
