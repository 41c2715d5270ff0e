import { normalize } from './normalizer';
import type {
  BuildingRecord,
  ConsumptionRecord,
  Coordinates,
  Diagnostic,
  DiagnosticCode,
  FieldKind,
  LoadResult,
  PeriodDate,
  RawRecord,
  SourceName,
  TemperatureSample
} from './types';

export interface FieldSpec<K extends FieldKind = FieldKind> {
  kind: K;
  aliases: readonly string[];
  required?: boolean;
}

export type FieldSpecs = Record<string, FieldSpec>;

type FieldValue<K extends FieldKind> = K extends 'date'
  ? PeriodDate
  : K extends 'text'
    ? string
    : number;

export type ParsedRow<F extends FieldSpecs> = {
  [P in keyof F]: F[P] extends { required: true }
    ? FieldValue<F[P]['kind']>
    : FieldValue<F[P]['kind']> | null;
};

export interface RowContext {
  index: number;
  /** Fields whose column exists in this row, whatever its value. */
  present: ReadonlySet<string>;
  /** Fields whose value was there but failed normalization. */
  malformed: ReadonlySet<string>;
  report(code: DiagnosticCode, field: string | null, message: string): void;
}

export interface SourceSchema<F extends FieldSpecs, T> {
  source: SourceName;
  fields: F;
  idField: keyof F & string;
  /** Returning no records rejects the row. */
  build(row: ParsedRow<F>, context: RowContext): T[];
  /** Records sharing a key after the first are dropped. */
  uniqueKey?: (record: T) => string;
}

export interface LoaderOptions {
  cityAliases?: Readonly<Record<string, string>>;
}

/**
 * Header names are matched case-insensitively; runs of underscores and spaces
 * count as one underscore, so "Apr__KwH" and "apr kwh" both read as "apr_kwh".
 */
export function columnKey(header: string): string {
  return header
    .replace(/^\ufeff/, '')
    .trim()
    .toLowerCase()
    .replace(/[\s_]+/g, '_');
}

export function normalizeCity(
  city: string | null,
  aliases: Readonly<Record<string, string>> = {}
): string | null {
  if (city === null) return null;
  const upper = city.trim().toUpperCase();
  if (upper.length === 0) return null;
  return aliases[upper] ?? upper;
}

export class SourceLoader<F extends FieldSpecs, T> {
  constructor(private readonly schema: SourceSchema<F, T>) {}

  public get source(): SourceName {
    return this.schema.source;
  }

  public load(rows: readonly RawRecord[]): LoadResult<T> {
    const records: T[] = [];
    const diagnostics: Diagnostic[] = [];
    const seen = new Set<string>();
    let rejected = 0;

    rows.forEach((raw, index) => {
      const rowDiagnostics: Diagnostic[] = [];
      const { values, present, malformed, absentRequired } = this.parseRow(raw, index, rowDiagnostics);
      const idValue = values[this.schema.idField];
      const buildingId = typeof idValue === 'string' ? idValue : null;

      const report = (code: DiagnosticCode, field: string | null, message: string) => {
        rowDiagnostics.push({ code, source: this.schema.source, row: index, field, buildingId, message });
      };
      for (const diagnostic of rowDiagnostics) diagnostic.buildingId = buildingId;

      if (absentRequired.length > 0) {
        report('missing-required-field', absentRequired.join(','), `Missing required field(s): ${absentRequired.join(', ')}`);
        diagnostics.push(...rowDiagnostics);
        rejected++;
        return;
      }

      // values holds exactly one normalized entry per schema field
      const row = values as ParsedRow<F>;
      const built = this.schema.build(row, { index, present, malformed, report });
      if (built.length === 0) {
        diagnostics.push(...rowDiagnostics);
        rejected++;
        return;
      }

      if (this.schema.uniqueKey) {
        const key = this.schema.uniqueKey(built[0]);
        if (seen.has(key)) {
          report('duplicate-identifier', this.schema.idField, `Duplicate identifier "${key}", keeping the first occurrence`);
          diagnostics.push(...rowDiagnostics);
          rejected++;
          return;
        }
        seen.add(key);
      }

      diagnostics.push(...rowDiagnostics);
      records.push(...built);
    });

    return { records, rejected, diagnostics };
  }

  private parseRow(raw: RawRecord, index: number, diagnostics: Diagnostic[]) {
    const columns = new Map<string, string | null | undefined>();
    for (const [header, value] of Object.entries(raw)) {
      const key = columnKey(header);
      if (!columns.has(key)) columns.set(key, value);
    }

    const values: Record<string, unknown> = {};
    const present = new Set<string>();
    const malformed = new Set<string>();
    const absentRequired: string[] = [];

    for (const [name, spec] of Object.entries(this.schema.fields)) {
      const alias = spec.aliases.find(candidate => columns.has(candidate));
      values[name] = null;
      if (alias === undefined) {
        if (spec.required) absentRequired.push(name);
        continue;
      }

      present.add(name);
      const rawValue = columns.get(alias);
      const result = normalize(rawValue, spec.kind);
      if (!result.missing) {
        values[name] = result.value;
        continue;
      }

      if (result.reason !== 'empty') {
        malformed.add(name);
        diagnostics.push({
          code: 'malformed-field',
          source: this.schema.source,
          row: index,
          field: name,
          buildingId: null,
          message: `${alias}: ${result.reason} (${JSON.stringify(rawValue)})`
        });
      }
      if (spec.required) absentRequired.push(name);
    }

    return { values, present, malformed, absentRequired };
  }
}

function positiveOrNull(value: number | null, field: string, context: RowContext): number | null {
  if (value === null || value > 0) return value;
  context.report('malformed-field', field, `${field}: out-of-range (${value}), must be positive`);
  return null;
}

function nonNegativeOrNull(value: number | null, field: string, context: RowContext): number | null {
  if (value === null || value >= 0) return value;
  context.report('malformed-field', field, `${field}: out-of-range (${value}), must not be negative`);
  return null;
}

function withinOrNull(value: number | null, limit: number, field: string, context: RowContext): number | null {
  if (value === null || Math.abs(value) <= limit) return value;
  context.report('malformed-field', field, `${field}: out-of-range (${value})`);
  return null;
}

const ID_ALIASES = ['project_name', 'building_id', 'id'] as const;

const BUILDING_FIELDS = {
  id: { kind: 'text', aliases: ID_ALIASES, required: true },
  name: { kind: 'text', aliases: ['name', 'building_name', 'display_name'] },
  city: { kind: 'text', aliases: ['city'] },
  lat: { kind: 'number', aliases: ['lat', 'latitude'] },
  lon: { kind: 'number', aliases: ['lon', 'lng', 'longitude'] },
  floorArea: { kind: 'number', aliases: ['total_bra', 'floor_area', 'bra', 'area'] },
  studentUnits: { kind: 'number', aliases: ['total_he', 'student_units', 'units'] },
  yearBuilt: { kind: 'integer', aliases: ['year_built'] }
} as const satisfies FieldSpecs;

export function createBuildingLoader(options: LoaderOptions = {}) {
  return new SourceLoader<typeof BUILDING_FIELDS, BuildingRecord>({
    source: 'buildings',
    fields: BUILDING_FIELDS,
    idField: 'id',
    uniqueKey: building => building.id,
    build(row, context) {
      const lat = withinOrNull(row.lat, 90, 'lat', context);
      const lon = withinOrNull(row.lon, 180, 'lon', context);
      let coordinates: Coordinates | null = null;
      if (lat !== null && lon !== null) {
        coordinates = { lat, lon };
      } else if (lat !== null || lon !== null) {
        context.report('partial-coordinates', lat === null ? 'lat' : 'lon', 'Only one coordinate present, dropping both');
      }

      return [{
        id: row.id,
        name: row.name ?? row.id,
        city: normalizeCity(row.city, options.cityAliases),
        coordinates,
        floorArea: positiveOrNull(row.floorArea, 'floorArea', context),
        studentUnits: positiveOrNull(row.studentUnits, 'studentUnits', context),
        yearBuilt: row.yearBuilt
      }];
    }
  });
}

const TEMPERATURE_FIELDS = {
  buildingId: { kind: 'text', aliases: ID_ALIASES, required: true },
  city: { kind: 'text', aliases: ['city'] },
  timestamp: { kind: 'date', aliases: ['timestamp', 'time', 'date', 'period', 'month_year'], required: true },
  value: { kind: 'number', aliases: ['temperature', 'temp', 'value'] },
  degreeDays: { kind: 'number', aliases: ['monthly_hdd', 'hdd_17', 'hdd'] }
} as const satisfies FieldSpecs;

export function createTemperatureLoader(options: LoaderOptions = {}) {
  return new SourceLoader<typeof TEMPERATURE_FIELDS, TemperatureSample>({
    source: 'temperatures',
    fields: TEMPERATURE_FIELDS,
    idField: 'buildingId',
    build(row, context) {
      return [{
        buildingId: row.buildingId,
        city: normalizeCity(row.city, options.cityAliases),
        year: row.timestamp.year,
        month: row.timestamp.month,
        value: row.value,
        degreeDays: nonNegativeOrNull(row.degreeDays, 'degreeDays', context)
      }];
    }
  });
}

function monthColumn(...names: string[]): FieldSpec<'number'> {
  return { kind: 'number', aliases: names.map(name => `${name}_kwh`) };
}

const MONTH_KEYS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'] as const;

const ELECTRICITY_FIELDS = {
  buildingId: { kind: 'text', aliases: ID_ALIASES, required: true },
  city: { kind: 'text', aliases: ['city'] },
  year: { kind: 'integer', aliases: ['year'], required: true },
  month: { kind: 'integer', aliases: ['month'] },
  consumption: { kind: 'number', aliases: ['consumption', 'consumption_kwh', 'kwh', 'value'] },
  total: { kind: 'number', aliases: ['year_total_kwh', 'total_kwh', 'yearly_kwh'] },
  jan: monthColumn('jan', 'january', 'januar'),
  feb: monthColumn('feb', 'february', 'februar'),
  mar: monthColumn('mar', 'march', 'mars'),
  apr: monthColumn('apr', 'april'),
  may: monthColumn('may', 'mai'),
  jun: monthColumn('jun', 'june', 'juni'),
  jul: monthColumn('jul', 'july', 'juli'),
  aug: monthColumn('aug', 'august'),
  sep: monthColumn('sep', 'september'),
  oct: monthColumn('oct', 'october', 'okt', 'oktober'),
  nov: monthColumn('nov', 'november'),
  dec: monthColumn('dec', 'december', 'des', 'desember')
} as const satisfies FieldSpecs;

/**
 * Accepts long rows (one month or year per row, with a `consumption` column) and
 * wide rows (one `<Month>_KwH` column per month plus `Year_total_KwH`). A wide
 * row expands into one record per month column and one yearly record.
 */
export function createElectricityLoader(options: LoaderOptions = {}) {
  return new SourceLoader<typeof ELECTRICITY_FIELDS, ConsumptionRecord>({
    source: 'electricity',
    fields: ELECTRICITY_FIELDS,
    idField: 'buildingId',
    build(row, context) {
      const base = {
        buildingId: row.buildingId,
        city: normalizeCity(row.city, options.cityAliases),
        year: row.year
      };

      if (context.present.has('consumption')) {
        if (context.malformed.has('month')) return [];
        if (row.month !== null && (row.month < 1 || row.month > 12)) {
          context.report('malformed-field', 'month', `month: out-of-range (${row.month})`);
          return [];
        }
        return [{ ...base, month: row.month, value: nonNegativeOrNull(row.consumption, 'consumption', context) }];
      }

      const records: ConsumptionRecord[] = [];
      MONTH_KEYS.forEach((key, index) => {
        if (!context.present.has(key)) return;
        records.push({ ...base, month: index + 1, value: nonNegativeOrNull(row[key], key, context) });
      });
      if (context.present.has('total')) {
        records.push({ ...base, month: null, value: nonNegativeOrNull(row.total, 'total', context) });
      }
      if (records.length === 0) {
        context.report('missing-required-field', 'consumption', 'No consumption column in row');
      }
      return records;
    }
  });
}
