import type { BuildingRecord, ConsumptionRecord, JoinedRecord, TemperatureSample } from '../src/core/types';

export function building(id: string, overrides: Partial<BuildingRecord> = {}): BuildingRecord {
  return {
    id,
    name: id,
    city: null,
    coordinates: null,
    floorArea: null,
    studentUnits: null,
    yearBuilt: null,
    ...overrides
  };
}

export function consumption(
  buildingId: string,
  year: number,
  month: number | null,
  value: number | null,
  city: string | null = null
): ConsumptionRecord {
  return { buildingId, city, year, month, value };
}

export function temperature(
  buildingId: string,
  year: number,
  month: number | null,
  value: number | null,
  city: string | null = null,
  degreeDays: number | null = null
): TemperatureSample {
  return { buildingId, city, year, month, value, degreeDays };
}

export function joined(overrides: Partial<JoinedRecord> & Pick<JoinedRecord, 'buildingId' | 'year'>): JoinedRecord {
  return {
    buildingName: null,
    city: null,
    citySource: null,
    coordinates: null,
    floorArea: null,
    studentUnits: null,
    month: null,
    meanTemperature: null,
    meanDegreeDays: null,
    temperatureSamples: 0,
    consumption: null,
    hasMetadata: true,
    metrics: null,
    ...overrides
  };
}
