import type {
  BuildingRecord,
  ConsumptionRecord,
  Diagnostic,
  JoinedRecord,
  TemperatureSample
} from './types';

export interface JoinResult {
  records: JoinedRecord[];
  diagnostics: Diagnostic[];
}

interface PeriodBucket {
  buildingId: string;
  year: number;
  month: number | null;
  temperatures: number[];
  degreeDays: number[];
  samples: number;
  consumption: number | null;
  hasConsumption: boolean;
}

function periodKey(buildingId: string, year: number, month: number | null): string {
  return JSON.stringify([buildingId, year, month]);
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

// months ascending, the yearly bucket after them
function comparePeriods(a: PeriodBucket, b: PeriodBucket): number {
  if (a.buildingId !== b.buildingId) return a.buildingId < b.buildingId ? -1 : 1;
  if (a.year !== b.year) return a.year - b.year;
  return (a.month ?? 13) - (b.month ?? 13);
}

export function join(
  buildings: readonly BuildingRecord[],
  temperatures: readonly TemperatureSample[],
  consumptions: readonly ConsumptionRecord[]
): JoinedRecord[] {
  return joinSources(buildings, temperatures, consumptions).records;
}

/**
 * Emits one record per (building, year, month-or-yearly) seen in the readings.
 * Buildings that only exist in the metadata produce nothing here.
 */
export function joinSources(
  buildings: readonly BuildingRecord[],
  temperatures: readonly TemperatureSample[],
  consumptions: readonly ConsumptionRecord[]
): JoinResult {
  const diagnostics: Diagnostic[] = [];

  const lookup = new Map<string, BuildingRecord>();
  for (const building of buildings) {
    if (!lookup.has(building.id)) lookup.set(building.id, building);
  }

  const buckets = new Map<string, PeriodBucket>();
  const readingCities = new Map<string, string>();
  const bucketFor = (buildingId: string, year: number, month: number | null): PeriodBucket => {
    const key = periodKey(buildingId, year, month);
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = { buildingId, year, month, temperatures: [], degreeDays: [], samples: 0, consumption: null, hasConsumption: false };
      buckets.set(key, bucket);
    }
    return bucket;
  };

  for (const record of consumptions) {
    const bucket = bucketFor(record.buildingId, record.year, record.month);
    if (bucket.hasConsumption) {
      diagnostics.push({
        code: 'duplicate-period',
        source: 'join',
        row: null,
        field: null,
        buildingId: record.buildingId,
        message: `Second consumption value for ${record.year}/${record.month ?? 'yearly'} ignored`
      });
    } else {
      bucket.consumption = record.value;
      bucket.hasConsumption = true;
    }
    if (record.city !== null && !readingCities.has(record.buildingId)) {
      readingCities.set(record.buildingId, record.city);
    }
  }

  // consumption cities take precedence so the result does not depend on input order
  for (const sample of temperatures) {
    const bucket = bucketFor(sample.buildingId, sample.year, sample.month);
    bucket.samples++;
    if (sample.value !== null && !Number.isNaN(sample.value)) {
      bucket.temperatures.push(sample.value);
    }
    if (sample.degreeDays !== null && !Number.isNaN(sample.degreeDays)) {
      bucket.degreeDays.push(sample.degreeDays);
    }
    if (sample.city !== null && !readingCities.has(sample.buildingId)) {
      readingCities.set(sample.buildingId, sample.city);
    }
  }

  const flagged = new Set<string>();
  const records = [...buckets.values()].sort(comparePeriods).map((bucket): JoinedRecord => {
    const building = lookup.get(bucket.buildingId);
    const inferredCity = readingCities.get(bucket.buildingId) ?? null;
    const city = building?.city ?? inferredCity;

    if (!building && !flagged.has(bucket.buildingId)) {
      flagged.add(bucket.buildingId);
      diagnostics.push({
        code: 'unjoinable-record',
        source: 'join',
        row: null,
        field: null,
        buildingId: bucket.buildingId,
        message: city === null
          ? 'No building metadata and no city; excluded from map and city views'
          : `No building metadata; city ${city} inferred from readings`
      });
    }

    return {
      buildingId: bucket.buildingId,
      buildingName: building?.name ?? null,
      city,
      citySource: building?.city ? 'metadata' : inferredCity !== null ? 'readings' : null,
      coordinates: building?.coordinates ?? null,
      floorArea: building?.floorArea ?? null,
      studentUnits: building?.studentUnits ?? null,
      year: bucket.year,
      month: bucket.month,
      meanTemperature: mean(bucket.temperatures),
      meanDegreeDays: mean(bucket.degreeDays),
      temperatureSamples: bucket.samples,
      consumption: bucket.consumption,
      hasMetadata: building !== undefined,
      metrics: null
    };
  });

  return { records, diagnostics };
}
