import * as fs from 'fs';
import * as path from 'path';
import * as csvWriter from 'csv-writer';
import type { DatasetQuery, JoinedRecord } from '../core/types';

export interface ExportRow {
  building_id: string;
  building_name: string;
  city: string;
  year: number;
  month: string;
  lat: string;
  lon: string;
  floor_area: string;
  student_units: string;
  mean_temperature: string;
  degree_days: string;
  temperature_samples: number;
  consumption_kwh: string;
  kwh_per_m2: string;
  kwh_per_unit: string;
  yearly_kwh: string;
  yearly_source: string;
  yoy_delta_kwh: string;
  has_metadata: boolean;
}

const HEADER: Array<{ id: keyof ExportRow; title: string }> = [
  { id: 'building_id', title: 'building_id' },
  { id: 'building_name', title: 'building_name' },
  { id: 'city', title: 'city' },
  { id: 'year', title: 'year' },
  { id: 'month', title: 'month' },
  { id: 'lat', title: 'lat' },
  { id: 'lon', title: 'lon' },
  { id: 'floor_area', title: 'floor_area' },
  { id: 'student_units', title: 'student_units' },
  { id: 'mean_temperature', title: 'mean_temperature' },
  { id: 'degree_days', title: 'degree_days' },
  { id: 'temperature_samples', title: 'temperature_samples' },
  { id: 'consumption_kwh', title: 'consumption_kwh' },
  { id: 'kwh_per_m2', title: 'kwh_per_m2' },
  { id: 'kwh_per_unit', title: 'kwh_per_unit' },
  { id: 'yearly_kwh', title: 'yearly_kwh' },
  { id: 'yearly_source', title: 'yearly_source' },
  { id: 'yoy_delta_kwh', title: 'yoy_delta_kwh' },
  { id: 'has_metadata', title: 'has_metadata' }
];

// absent values are written as empty cells, never as 0
const cell = (value: number | string | null | undefined): string =>
  value === null || value === undefined ? '' : String(value);

export function toExportRow(record: JoinedRecord): ExportRow {
  const metrics = record.metrics;
  return {
    building_id: record.buildingId,
    building_name: cell(record.buildingName),
    city: cell(record.city),
    year: record.year,
    month: record.month === null ? 'yearly' : String(record.month),
    lat: cell(record.coordinates?.lat),
    lon: cell(record.coordinates?.lon),
    floor_area: cell(record.floorArea),
    student_units: cell(record.studentUnits),
    mean_temperature: cell(record.meanTemperature),
    degree_days: cell(record.meanDegreeDays),
    temperature_samples: record.temperatureSamples,
    consumption_kwh: cell(record.consumption),
    kwh_per_m2: cell(metrics?.consumptionPerArea),
    kwh_per_unit: cell(metrics?.consumptionPerUnit),
    yearly_kwh: cell(metrics?.yearlyConsumption),
    yearly_source: cell(metrics?.yearlySource),
    yoy_delta_kwh: cell(metrics?.yearOverYearDelta),
    has_metadata: record.hasMetadata
  };
}

export function exportFileName(query: DatasetQuery): string {
  const city = (query.city ?? 'all').toLowerCase().replace(/[^\p{L}\p{N}]+/gu, '-');
  return `building_energy_${city}_${query.year ?? 'all'}.csv`;
}

export async function exportRecords(records: readonly JoinedRecord[], filePath: string, delimiter = ';'): Promise<void> {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const writer = csvWriter.createObjectCsvWriter({
    path: filePath,
    header: HEADER,
    fieldDelimiter: delimiter
  });
  await writer.writeRecords(records.map(toExportRow));
}
