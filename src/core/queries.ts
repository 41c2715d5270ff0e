import { normalizeCity } from './loaders';
import { ratio } from './aggregator';
import type { SeverityClassifier } from './severity';
import type {
  BuildingRecord,
  BuildingYearSummary,
  DatasetQuery,
  JoinedRecord,
  MapMarker,
  SeverityMetric
} from './types';

interface Keyed {
  buildingId: string;
  city: string | null;
  year: number;
}

export interface MonthlyTotal {
  year: number;
  month: number;
  total: number;
  buildings: number;
}

export interface BuildingTotal {
  buildingId: string;
  city: string | null;
  total: number;
}

export interface TemperatureConsumptionPoint {
  city: string;
  year: number;
  month: number;
  meanTemperature: number;
  meanDegreeDays: number | null;
  consumption: number;
}

export interface Kpis {
  buildingCount: number;
  totalConsumption: number;
  consumptionPerArea: number | null;
  consumptionPerUnit: number | null;
}

export interface MarkerOptions {
  metric: SeverityMetric;
  year?: number | null;
  city?: string | null;
  buildingId?: string | null;
}

/** Records without a city never match a city filter. */
export function filterRecords<T extends Keyed>(items: readonly T[], query: DatasetQuery = {}): T[] {
  const city = normalizeCity(query.city ?? null);
  return items.filter(item =>
    (city === null || item.city === city) &&
    (query.year == null || item.year === query.year) &&
    (query.buildingId == null || item.buildingId === query.buildingId)
  );
}

export function availableCities(records: readonly { city: string | null }[]): string[] {
  const cities = new Set<string>();
  for (const record of records) {
    if (record.city !== null) cities.add(record.city);
  }
  return [...cities].sort();
}

export function availableYears(records: readonly { year: number }[]): number[] {
  return [...new Set(records.map(record => record.year))].sort((a, b) => a - b);
}

function totalsByBuilding(summaries: readonly BuildingYearSummary[]): BuildingTotal[] {
  const totals = new Map<string, BuildingTotal>();
  for (const summary of summaries) {
    if (summary.totalConsumption === null) continue;
    const entry = totals.get(summary.buildingId);
    if (entry) entry.total += summary.totalConsumption;
    else totals.set(summary.buildingId, { buildingId: summary.buildingId, city: summary.city, total: summary.totalConsumption });
  }
  return [...totals.values()];
}

/**
 * With a year, each building is rated on that year's total; without one, on the
 * sum of all its yearly totals.
 */
export function mapMarkers(
  buildings: readonly BuildingRecord[],
  summaries: readonly BuildingYearSummary[],
  classifier: SeverityClassifier,
  options: MarkerOptions
): MapMarker[] {
  const scoped = options.year == null ? summaries : summaries.filter(summary => summary.year === options.year);
  const totals = new Map(totalsByBuilding(scoped).map(entry => [entry.buildingId, entry.total]));
  const city = normalizeCity(options.city ?? null);

  const markers: MapMarker[] = [];
  for (const building of buildings) {
    if (building.coordinates === null) continue;
    if (city !== null && building.city !== city) continue;
    if (options.buildingId != null && building.id !== options.buildingId) continue;

    const denominator = options.metric === 'per-area' ? building.floorArea : building.studentUnits;
    const metric = ratio(totals.get(building.id) ?? null, denominator);
    markers.push({
      building,
      coordinates: building.coordinates,
      metric,
      tier: classifier.classify(metric)
    });
  }
  return markers;
}

export function monthlyConsumptionSeries(records: readonly JoinedRecord[]): MonthlyTotal[] {
  const series = new Map<string, MonthlyTotal>();
  for (const record of records) {
    if (record.month === null || record.consumption === null) continue;
    const key = `${record.year}-${record.month}`;
    const entry = series.get(key);
    if (entry) {
      entry.total += record.consumption;
      entry.buildings++;
    } else {
      series.set(key, { year: record.year, month: record.month, total: record.consumption, buildings: 1 });
    }
  }
  return [...series.values()].sort((a, b) => a.year - b.year || a.month - b.month);
}

export function topConsumers(summaries: readonly BuildingYearSummary[], limit = 10): BuildingTotal[] {
  return totalsByBuilding(summaries)
    .sort((a, b) => b.total - a.total)
    .slice(0, limit);
}

/** Top and bottom quarter by total; the bottom ignores buildings with nothing consumed. */
export function compareExtremes(summaries: readonly BuildingYearSummary[]): { high: BuildingTotal[]; low: BuildingTotal[] } {
  const totals = totalsByBuilding(summaries);
  if (totals.length === 0) return { high: [], low: [] };

  const high = [...totals]
    .sort((a, b) => b.total - a.total)
    .slice(0, Math.max(1, Math.floor(totals.length / 4)));
  const consuming = totals.filter(entry => entry.total > 0).sort((a, b) => a.total - b.total);
  const low = consuming.slice(0, Math.max(1, Math.floor(consuming.length / 4)));
  return { high, low };
}

const average = (values: readonly number[]) => values.reduce((sum, value) => sum + value, 0) / values.length;

export function temperatureConsumptionPairs(records: readonly JoinedRecord[]): TemperatureConsumptionPoint[] {
  const groups = new Map<string, {
    city: string;
    year: number;
    month: number;
    temperatures: number[];
    degreeDays: number[];
    consumption: number | null;
  }>();
  for (const record of records) {
    if (record.city === null || record.month === null) continue;
    const key = JSON.stringify([record.city, record.year, record.month]);
    let group = groups.get(key);
    if (!group) {
      group = { city: record.city, year: record.year, month: record.month, temperatures: [], degreeDays: [], consumption: null };
      groups.set(key, group);
    }
    if (record.meanTemperature !== null) group.temperatures.push(record.meanTemperature);
    if (record.meanDegreeDays !== null) group.degreeDays.push(record.meanDegreeDays);
    if (record.consumption !== null) group.consumption = (group.consumption ?? 0) + record.consumption;
  }

  const points: TemperatureConsumptionPoint[] = [];
  for (const group of groups.values()) {
    if (group.temperatures.length === 0 || group.consumption === null) continue;
    points.push({
      city: group.city,
      year: group.year,
      month: group.month,
      meanTemperature: average(group.temperatures),
      meanDegreeDays: group.degreeDays.length > 0 ? average(group.degreeDays) : null,
      consumption: group.consumption
    });
  }
  return points.sort((a, b) =>
    (a.city < b.city ? -1 : a.city > b.city ? 1 : 0) || a.year - b.year || a.month - b.month
  );
}

export function computeKpis(summaries: readonly BuildingYearSummary[], buildings: readonly BuildingRecord[]): Kpis {
  const lookup = new Map(buildings.map(building => [building.id, building]));
  const totals = totalsByBuilding(summaries);
  let totalConsumption = 0;
  let areaConsumption = 0;
  let area = 0;
  let unitConsumption = 0;
  let units = 0;

  for (const entry of totals) {
    totalConsumption += entry.total;
    const building = lookup.get(entry.buildingId);
    if (building?.floorArea) {
      areaConsumption += entry.total;
      area += building.floorArea;
    }
    if (building?.studentUnits) {
      unitConsumption += entry.total;
      units += building.studentUnits;
    }
  }

  return {
    buildingCount: new Set(summaries.map(summary => summary.buildingId)).size,
    totalConsumption,
    consumptionPerArea: ratio(areaConsumption, area),
    consumptionPerUnit: ratio(unitConsumption, units)
  };
}
