import * as fs from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import PQueue from 'p-queue';
import type { PipelineSettings } from '../config/settings';
import { enrichWithDiagnostics, summarize } from '../core/aggregator';
import { SourceReadError } from '../core/errors';
import { joinSources } from '../core/join';
import { createBuildingLoader, createElectricityLoader, createTemperatureLoader } from '../core/loaders';
import type { PipelineLogger, RunSummary } from '../core/logger';
import { availableCities, availableYears, computeKpis, filterRecords, mapMarkers } from '../core/queries';
import type { Kpis } from '../core/queries';
import { SeverityClassifier } from '../core/severity';
import type {
  BuildingRecord,
  BuildingYearSummary,
  DatasetQuery,
  Diagnostic,
  JoinedRecord,
  LoadResult,
  MapMarker,
  RawRecord,
  SeverityMetric,
  SourceName
} from '../core/types';
import { DatasetCache, fingerprintSources } from './cache';

export type SourceReader = (filePath: string) => Promise<string>;

export interface LoadStats {
  rows: number;
  accepted: number;
  rejected: number;
}

export interface PipelineDataset {
  buildings: BuildingRecord[];
  records: JoinedRecord[];
  summaries: BuildingYearSummary[];
  diagnostics: Diagnostic[];
  loads: Record<SourceName, LoadStats>;
}

export interface PipelineQuery extends DatasetQuery {
  metric?: SeverityMetric;
}

export interface PipelineResult {
  fingerprint: string;
  cacheHit: boolean;
  dataset: PipelineDataset;
  records: JoinedRecord[];
  summaries: BuildingYearSummary[];
  metric: SeverityMetric;
  markers: MapMarker[];
  kpis: Kpis;
  cities: string[];
  years: number[];
  run: RunSummary;
}

const SOURCES: readonly SourceName[] = ['buildings', 'temperatures', 'electricity'];

const readFromDisk: SourceReader = filePath => fs.promises.readFile(filePath, 'utf8');

export class EnergyPipeline {
  private readonly readQueue: PQueue;
  private readonly classifiers: Record<SeverityMetric, SeverityClassifier>;

  constructor(
    private readonly settings: PipelineSettings,
    private readonly logger: PipelineLogger,
    private readonly cache: DatasetCache<PipelineDataset> = new DatasetCache(),
    private readonly readSource: SourceReader = readFromDisk
  ) {
    this.readQueue = new PQueue({ concurrency: settings.readConcurrency });
    // bad boundaries fail here rather than on the first query
    this.classifiers = {
      'per-area': SeverityClassifier.forMetric('per-area', settings.boundaries),
      'per-unit': SeverityClassifier.forMetric('per-unit', settings.boundaries)
    };
  }

  public classifier(metric: SeverityMetric): SeverityClassifier {
    return this.classifiers[metric];
  }

  public async execute(query: PipelineQuery = {}): Promise<PipelineResult> {
    this.logger.beginRun();
    try {
      this.logger.logPhaseStart('extract');
      const contents = await this.extract();
      this.logger.logPhaseEnd('extract', SOURCES.length);

      const fingerprint = fingerprintSources(contents);
      const cached = this.cache.get(fingerprint);
      this.logger.logCache(fingerprint, cached !== undefined);

      const dataset = cached ?? this.transform(contents);
      if (!cached) this.cache.set(fingerprint, dataset);

      this.logger.logPhaseStart('query');
      const result = this.query(dataset, query);
      this.logger.logPhaseEnd('query', result.records.length);

      const run = this.logger.finalize(dataset.records.length, dataset.diagnostics, cached !== undefined);
      return { ...result, fingerprint, cacheHit: cached !== undefined, dataset, run };
    } catch (error) {
      this.logger.logError(error, { query });
      throw error;
    }
  }

  /** Reads all three sources; nothing downstream starts until every read is done. */
  private async extract(): Promise<Record<SourceName, string>> {
    const texts = await Promise.all(
      SOURCES.map(source => this.readQueue.add(() => this.readOne(source)))
    );
    return { buildings: texts[0], temperatures: texts[1], electricity: texts[2] };
  }

  private async readOne(source: SourceName): Promise<string> {
    const filePath = path.join(this.settings.dataDir, this.settings.files[source]);
    try {
      return await this.readSource(filePath);
    } catch (error) {
      throw new SourceReadError(source, `cannot read ${filePath}`, { cause: error });
    }
  }

  public parse(source: SourceName, text: string): RawRecord[] {
    const result = Papa.parse<RawRecord>(text, {
      header: true,
      delimiter: this.settings.delimiter,
      skipEmptyLines: 'greedy',
      transformHeader: header => header.trim()
    });

    const fields = result.meta.fields ?? [];
    if (text.trim().length > 0 && fields.length < 2) {
      throw new SourceReadError(source, `expected a "${this.settings.delimiter}"-delimited header row`);
    }
    if (result.errors.length > 0) {
      this.logger.logWarning(`Parse problems in ${source}`, {
        source,
        count: result.errors.length,
        first: result.errors[0].message,
        row: result.errors[0].row
      });
    }
    return result.data;
  }

  private transform(contents: Record<SourceName, string>): PipelineDataset {
    this.logger.logPhaseStart('transform');
    const options = { cityAliases: this.settings.cityAliases };

    const buildingRows = this.parse('buildings', contents.buildings);
    const temperatureRows = this.parse('temperatures', contents.temperatures);
    const electricityRows = this.parse('electricity', contents.electricity);

    const buildings = createBuildingLoader(options).load(buildingRows);
    const temperatures = createTemperatureLoader(options).load(temperatureRows);
    const electricity = createElectricityLoader(options).load(electricityRows);

    const loads = {
      buildings: this.stats('buildings', buildingRows.length, buildings),
      temperatures: this.stats('temperatures', temperatureRows.length, temperatures),
      electricity: this.stats('electricity', electricityRows.length, electricity)
    };

    const joined = joinSources(buildings.records, temperatures.records, electricity.records);
    const enriched = enrichWithDiagnostics(joined.records);
    const summaries = summarize(enriched.records);

    const diagnostics = [
      ...buildings.diagnostics,
      ...temperatures.diagnostics,
      ...electricity.diagnostics,
      ...joined.diagnostics,
      ...enriched.diagnostics
    ];
    this.logger.logDiagnostics(diagnostics);
    this.logger.logPhaseEnd('transform', enriched.records.length);

    return { buildings: buildings.records, records: enriched.records, summaries, diagnostics, loads };
  }

  private stats<T>(source: SourceName, rows: number, result: LoadResult<T>): LoadStats {
    const accepted = rows - result.rejected;
    this.logger.logLoad(source, accepted, result.rejected);
    return { rows, accepted, rejected: result.rejected };
  }

  private query(dataset: PipelineDataset, query: PipelineQuery) {
    const metric = query.metric ?? this.settings.severityMetric;
    const summaries = filterRecords(dataset.summaries, query);
    return {
      records: filterRecords(dataset.records, query),
      summaries,
      metric,
      markers: mapMarkers(dataset.buildings, dataset.summaries, this.classifiers[metric], {
        metric,
        year: query.year,
        city: query.city,
        buildingId: query.buildingId
      }),
      kpis: computeKpis(summaries, dataset.buildings),
      cities: availableCities(dataset.records),
      years: availableYears(dataset.records)
    };
  }
}
