export type RawRecord = Record<string, string | null | undefined>;

export type FieldKind = 'number' | 'integer' | 'date' | 'text';

export type MissingReason = 'empty' | 'invalid-format' | 'out-of-range';

export type Normalized<T> =
  | { missing: false; value: T }
  | { missing: true; reason: MissingReason };

export interface PeriodDate {
  year: number;
  month: number | null;
  day: number | null;
}

export interface Coordinates {
  lat: number;
  lon: number;
}

export type SourceName = 'buildings' | 'temperatures' | 'electricity';

export type DiagnosticCode =
  | 'malformed-field'
  | 'missing-required-field'
  | 'duplicate-identifier'
  | 'partial-coordinates'
  | 'duplicate-period'
  | 'unjoinable-record'
  | 'division-undefined';

export interface Diagnostic {
  code: DiagnosticCode;
  source: SourceName | 'join' | 'metrics';
  row: number | null;
  field: string | null;
  buildingId: string | null;
  message: string;
}

export interface LoadResult<T> {
  records: T[];
  rejected: number;
  diagnostics: Diagnostic[];
}

export interface BuildingRecord {
  id: string;
  name: string;
  city: string | null;
  coordinates: Coordinates | null;
  floorArea: number | null;
  studentUnits: number | null;
  yearBuilt: number | null;
}

export interface TemperatureSample {
  buildingId: string;
  city: string | null;
  year: number;
  month: number | null;
  value: number | null;
  /** Heating degree days for the period, as reported next to the temperature. */
  degreeDays: number | null;
}

export interface ConsumptionRecord {
  buildingId: string;
  city: string | null;
  year: number;
  month: number | null;
  value: number | null;
}

export type CitySource = 'metadata' | 'readings';

export interface DerivedMetrics {
  consumptionPerArea: number | null;
  consumptionPerUnit: number | null;
  yearlyConsumption: number | null;
  yearlySource: 'monthly' | 'yearly' | null;
  yearOverYearDelta: number | null;
}

export interface JoinedRecord {
  buildingId: string;
  buildingName: string | null;
  city: string | null;
  citySource: CitySource | null;
  coordinates: Coordinates | null;
  floorArea: number | null;
  studentUnits: number | null;
  year: number;
  month: number | null;
  meanTemperature: number | null;
  meanDegreeDays: number | null;
  temperatureSamples: number;
  consumption: number | null;
  hasMetadata: boolean;
  metrics: DerivedMetrics | null;
}

export interface BuildingYearSummary {
  buildingId: string;
  city: string | null;
  year: number;
  totalConsumption: number | null;
  source: 'monthly' | 'yearly' | null;
  monthsCovered: number;
  consumptionPerArea: number | null;
  consumptionPerUnit: number | null;
  yearOverYearDelta: number | null;
  meanTemperature: number | null;
}

export const SEVERITY_TIERS = ['low', 'medium', 'high', 'critical'] as const;

export type SeverityTier = (typeof SEVERITY_TIERS)[number];

export type SeverityMetric = 'per-area' | 'per-unit';

export interface MapMarker {
  building: BuildingRecord;
  coordinates: Coordinates;
  metric: number | null;
  tier: SeverityTier | null;
}

export interface DatasetQuery {
  city?: string | null;
  year?: number | null;
  buildingId?: string | null;
}
