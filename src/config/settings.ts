import * as dotenv from 'dotenv';
import { ConfigurationError } from '../core/errors';
import { DEFAULT_BOUNDARIES } from '../core/severity';
import type { SeverityMetric, SourceName } from '../core/types';

dotenv.config();

export interface PipelineSettings {
  dataDir: string;
  files: Record<SourceName, string>;
  delimiter: string;
  logDir: string | null;
  logLevel: string;
  exportDir: string;
  readConcurrency: number;
  severityMetric: SeverityMetric;
  boundaries: Record<SeverityMetric, number[]>;
  cityAliases: Record<string, string>;
}

type Env = Record<string, string | undefined>;

function positiveInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function boundaryList(name: string, value: string | undefined, fallback: readonly number[]): number[] {
  if (value === undefined || value.trim() === '') return [...fallback];
  return value.split(',').map(part => {
    const parsed = Number(part.trim());
    if (part.trim() === '' || !Number.isFinite(parsed)) {
      throw new ConfigurationError(`${name} must be a comma-separated list of numbers, got "${value}"`);
    }
    return parsed;
  });
}

function severityMetric(value: string | undefined): SeverityMetric {
  if (value === undefined || value === '' || value === 'per-area') return 'per-area';
  if (value === 'per-unit') return 'per-unit';
  throw new ConfigurationError(`SEVERITY_METRIC must be "per-area" or "per-unit", got "${value}"`);
}

/** Parses "JAKOBSLI=TRONDHEIM,FOO=BAR" into upper-cased pairs. */
export function parseCityAliases(value: string | undefined): Record<string, string> {
  const aliases: Record<string, string> = {};
  if (value === undefined) return aliases;
  for (const pair of value.split(',')) {
    if (pair.trim() === '') continue;
    const [from, to] = pair.split('=').map(part => part.trim().toUpperCase());
    if (!from || !to) {
      throw new ConfigurationError(`CITY_ALIASES entry "${pair}" must look like FROM=TO`);
    }
    aliases[from] = to;
  }
  return aliases;
}

export function loadSettings(env: Env = process.env): PipelineSettings {
  return {
    dataDir: env.DATA_DIR || 'data',
    files: {
      buildings: env.BUILDINGS_FILE || 'buildings.csv',
      temperatures: env.TEMPERATURE_FILE || 'temperatures.csv',
      electricity: env.ELECTRICITY_FILE || 'electricity.csv'
    },
    delimiter: env.CSV_DELIMITER || ';',
    // an empty LOG_DIR turns file logging off
    logDir: env.LOG_DIR === undefined ? 'pipeline_logs' : env.LOG_DIR || null,
    logLevel: env.LOG_LEVEL || 'info',
    exportDir: env.EXPORT_DIR || 'exports',
    readConcurrency: positiveInteger('READ_CONCURRENCY', env.READ_CONCURRENCY, 2),
    severityMetric: severityMetric(env.SEVERITY_METRIC),
    boundaries: {
      'per-area': boundaryList('SEVERITY_PER_AREA_BOUNDARIES', env.SEVERITY_PER_AREA_BOUNDARIES, DEFAULT_BOUNDARIES['per-area']),
      'per-unit': boundaryList('SEVERITY_PER_UNIT_BOUNDARIES', env.SEVERITY_PER_UNIT_BOUNDARIES, DEFAULT_BOUNDARIES['per-unit'])
    },
    cityAliases: parseCityAliases(env.CITY_ALIASES)
  };
}
