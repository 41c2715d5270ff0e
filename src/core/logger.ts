import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import type { Diagnostic, DiagnosticCode, SourceName } from './types';

export interface PipelineLoggerOptions {
  level?: string;
  /** Directory for the JSON log and run summary; null logs to the console only. */
  logDir?: string | null;
  silent?: boolean;
}

export interface PhaseTiming {
  phase: string;
  durationMs: number;
  records?: number;
  timestamp: Date;
}

export interface RunSummary {
  runName: string;
  startTime: Date;
  endTime: Date;
  totalDurationMs: number;
  totalRecords: number;
  diagnosticCount: number;
  diagnosticsByCode: Partial<Record<DiagnosticCode, number>>;
  cacheHit: boolean;
  memoryStartMb: number;
  memoryPeakMb: number;
  cpuUserMs: number;
  cpuSystemMs: number;
  timings: PhaseTiming[];
}

const heapMb = () => process.memoryUsage().heapUsed / 1024 / 1024;

export function countByCode(diagnostics: readonly Diagnostic[]): Partial<Record<DiagnosticCode, number>> {
  const counts: Partial<Record<DiagnosticCode, number>> = {};
  for (const diagnostic of diagnostics) {
    counts[diagnostic.code] = (counts[diagnostic.code] ?? 0) + 1;
  }
  return counts;
}

export class PipelineLogger {
  private logger: winston.Logger;
  private summaryFile: string | null = null;
  private startTime: number;
  private startDate: Date;
  private memoryStart: number;
  private cpuBaseline: NodeJS.CpuUsage;
  private peakMemory: number;
  private phaseStarts = new Map<string, number>();
  private timings: PhaseTiming[] = [];

  constructor(private readonly runName: string, options: PipelineLoggerOptions = {}) {
    const consoleTransport = new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    });

    let logFile: string | null = null;
    if (options.logDir) {
      if (!fs.existsSync(options.logDir)) {
        fs.mkdirSync(options.logDir, { recursive: true });
      }
      const timestamp = new Date().toISOString().replace(/:/g, '-');
      logFile = path.join(options.logDir, `${runName}_${timestamp}.log`);
      this.summaryFile = path.join(options.logDir, `summary_${runName}_${timestamp}.json`);
    }

    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      transports: logFile
        ? [consoleTransport, new winston.transports.File({ filename: logFile })]
        : [consoleTransport]
    });

    this.startTime = Date.now();
    this.startDate = new Date();
    this.memoryStart = heapMb();
    this.peakMemory = this.memoryStart;
    this.cpuBaseline = process.cpuUsage();
  }

  /** Resets timings so one logger can follow several runs of a long-lived pipeline. */
  public beginRun(): void {
    this.startTime = Date.now();
    this.startDate = new Date();
    this.memoryStart = heapMb();
    this.peakMemory = this.memoryStart;
    this.cpuBaseline = process.cpuUsage();
    this.phaseStarts.clear();
    this.timings = [];
  }

  private sampleMemory(): number {
    const current = heapMb();
    if (current > this.peakMemory) this.peakMemory = current;
    return current;
  }

  public logPhaseStart(phase: string): void {
    this.phaseStarts.set(phase, Date.now());
    this.logger.info(`Phase started: ${phase}`, {
      phase,
      elapsed_ms: Date.now() - this.startTime,
      memory_mb: this.sampleMemory()
    });
  }

  public logPhaseEnd(phase: string, recordCount?: number): void {
    const duration = Date.now() - (this.phaseStarts.get(phase) ?? this.startTime);
    this.logger.info(`Phase completed: ${phase}`, {
      phase,
      duration_ms: duration,
      records: recordCount,
      memory_mb: this.sampleMemory()
    });

    this.timings.push({ phase, durationMs: duration, records: recordCount, timestamp: new Date() });
  }

  public logLoad(source: SourceName, accepted: number, rejected: number): void {
    const level = rejected > 0 ? 'warn' : 'info';
    this.logger.log(level, `Loaded ${source}`, { source, accepted, rejected });
  }

  public logCache(fingerprint: string, hit: boolean): void {
    this.logger.info(hit ? 'Dataset cache hit' : 'Dataset cache miss', { fingerprint: fingerprint.slice(0, 12) });
  }

  public logDiagnostics(diagnostics: readonly Diagnostic[]): void {
    if (diagnostics.length === 0) return;
    this.logger.warn('Data diagnostics', { total: diagnostics.length, by_code: countByCode(diagnostics) });
    for (const diagnostic of diagnostics) {
      this.logger.debug(diagnostic.message, {
        code: diagnostic.code,
        source: diagnostic.source,
        row: diagnostic.row,
        field: diagnostic.field,
        building_id: diagnostic.buildingId
      });
    }
  }

  public logWarning(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(message, context);
  }

  public logError(error: unknown, context?: Record<string, unknown>): void {
    this.logger.error('Error occurred', {
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      context,
      elapsed_ms: Date.now() - this.startTime
    });
  }

  public finalize(totalRecords: number, diagnostics: readonly Diagnostic[], cacheHit: boolean): RunSummary {
    const totalDuration = Date.now() - this.startTime;
    const cpuUsage = process.cpuUsage(this.cpuBaseline);
    this.sampleMemory();

    const summary: RunSummary = {
      runName: this.runName,
      startTime: this.startDate,
      endTime: new Date(),
      totalDurationMs: totalDuration,
      totalRecords,
      diagnosticCount: diagnostics.length,
      diagnosticsByCode: countByCode(diagnostics),
      cacheHit,
      memoryStartMb: this.memoryStart,
      memoryPeakMb: this.peakMemory,
      cpuUserMs: cpuUsage.user / 1000,
      cpuSystemMs: cpuUsage.system / 1000,
      timings: [...this.timings]
    };

    if (this.summaryFile) {
      fs.writeFileSync(this.summaryFile, JSON.stringify(summary, null, 2));
    }

    this.logger.info('Pipeline run completed', {
      total_duration_seconds: (totalDuration / 1000).toFixed(2),
      total_records: totalRecords,
      diagnostics: diagnostics.length,
      cache_hit: cacheHit,
      memory_peak_mb: this.peakMemory.toFixed(2)
    });

    return summary;
  }
}
