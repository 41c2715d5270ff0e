import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { exportFileName, exportRecords, toExportRow } from '../src/pipeline/export';
import { joined } from './helpers';

describe('exportFileName', () => {
  it('names the file after the filters', () => {
    expect(exportFileName({ city: 'Ålesund', year: 2023 })).toBe('building_energy_ålesund_2023.csv');
    expect(exportFileName({ city: 'Mo i Rana' })).toBe('building_energy_mo-i-rana_all.csv');
    expect(exportFileName({})).toBe('building_energy_all_all.csv');
  });
});

describe('toExportRow', () => {
  it('writes absent values as empty cells', () => {
    const row = toExportRow(joined({ buildingId: 'B1', year: 2023, consumption: 0, hasMetadata: false }));

    expect(row).toMatchObject({
      building_id: 'B1',
      building_name: '',
      month: 'yearly',
      lat: '',
      consumption_kwh: '0',
      kwh_per_m2: '',
      degree_days: '',
      has_metadata: false
    });
  });
});

describe('exportRecords', () => {
  it('writes a delimited file with a header row', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'energy-export-'));
    const filePath = path.join(dir, 'nested', 'out.csv');
    try {
      await exportRecords([joined({ buildingId: 'B1', year: 2023, month: 2, consumption: 300 })], filePath);

      const [header, line] = fs.readFileSync(filePath, 'utf8').trim().split('\n');
      expect(header.split(';').slice(0, 5)).toEqual(['building_id', 'building_name', 'city', 'year', 'month']);
      expect(line.split(';').slice(0, 5)).toEqual(['B1', '', '', '2023', '2']);
      expect(line.split(';')[12]).toBe('300');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
