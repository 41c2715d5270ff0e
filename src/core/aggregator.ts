import type { BuildingYearSummary, Diagnostic, JoinedRecord } from './types';

export interface EnrichResult {
  records: JoinedRecord[];
  diagnostics: Diagnostic[];
}

interface YearTotal {
  value: number;
  source: 'monthly' | 'yearly';
}

function yearKey(buildingId: string, year: number): string {
  return JSON.stringify([buildingId, year]);
}

export function ratio(numerator: number | null, denominator: number | null): number | null {
  if (numerator === null || denominator === null || !(denominator > 0)) return null;
  return numerator / denominator;
}

/**
 * A yearly figure is taken as-is and never added to the monthly figures of the
 * same year. Without one, the non-missing monthly values are summed.
 */
export function yearlyTotals(records: readonly JoinedRecord[]): Map<string, YearTotal> {
  const yearly = new Map<string, number>();
  const monthly = new Map<string, number>();

  for (const record of records) {
    if (record.consumption === null) continue;
    const key = yearKey(record.buildingId, record.year);
    if (record.month === null) {
      if (!yearly.has(key)) yearly.set(key, record.consumption);
    } else {
      monthly.set(key, (monthly.get(key) ?? 0) + record.consumption);
    }
  }

  const totals = new Map<string, YearTotal>();
  for (const [key, value] of monthly) totals.set(key, { value, source: 'monthly' });
  for (const [key, value] of yearly) totals.set(key, { value, source: 'yearly' });
  return totals;
}

export function enrich(records: readonly JoinedRecord[]): JoinedRecord[] {
  return enrichWithDiagnostics(records).records;
}

export function enrichWithDiagnostics(records: readonly JoinedRecord[]): EnrichResult {
  const totals = yearlyTotals(records);
  const diagnostics: Diagnostic[] = [];
  const flagged = new Set<string>();

  const enriched = records.map((record): JoinedRecord => {
    const total = totals.get(yearKey(record.buildingId, record.year));
    const previous = totals.get(yearKey(record.buildingId, record.year - 1));
    const perArea = ratio(record.consumption, record.floorArea);

    if (record.consumption !== null && perArea === null && !flagged.has(record.buildingId)) {
      flagged.add(record.buildingId);
      diagnostics.push({
        code: 'division-undefined',
        source: 'metrics',
        row: null,
        field: 'floorArea',
        buildingId: record.buildingId,
        message: 'No positive floor area; consumption per area left empty'
      });
    }

    return {
      ...record,
      metrics: {
        consumptionPerArea: perArea,
        consumptionPerUnit: ratio(record.consumption, record.studentUnits),
        yearlyConsumption: total?.value ?? null,
        yearlySource: total?.source ?? null,
        yearOverYearDelta: total && previous ? total.value - previous.value : null
      }
    };
  });

  return { records: enriched, diagnostics };
}

export function summarize(records: readonly JoinedRecord[]): BuildingYearSummary[] {
  const totals = yearlyTotals(records);
  const groups = new Map<string, JoinedRecord[]>();
  for (const record of records) {
    const key = yearKey(record.buildingId, record.year);
    const group = groups.get(key);
    if (group) group.push(record);
    else groups.set(key, [record]);
  }

  const summaries: BuildingYearSummary[] = [];
  for (const [key, group] of groups) {
    const first = group[0];
    const total = totals.get(key);
    const previous = totals.get(yearKey(first.buildingId, first.year - 1));
    const temperatures = group
      .map(record => record.meanTemperature)
      .filter((value): value is number => value !== null);
    const totalValue = total?.value ?? null;

    summaries.push({
      buildingId: first.buildingId,
      city: first.city,
      year: first.year,
      totalConsumption: totalValue,
      source: total?.source ?? null,
      monthsCovered: group.filter(record => record.month !== null && record.consumption !== null).length,
      consumptionPerArea: ratio(totalValue, first.floorArea),
      consumptionPerUnit: ratio(totalValue, first.studentUnits),
      yearOverYearDelta: total && previous ? total.value - previous.value : null,
      meanTemperature: temperatures.length > 0
        ? temperatures.reduce((sum, value) => sum + value, 0) / temperatures.length
        : null
    });
  }
  return summaries;
}
