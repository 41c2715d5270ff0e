import type { PipelineQuery } from './pipeline/pipeline';
import type { SeverityMetric } from './core/types';

export function parseArgs(args: readonly string[]): { query: PipelineQuery; exportCsv: boolean } {
  const value = (name: string) => args.find(arg => arg.startsWith(`--${name}=`))?.slice(name.length + 3);

  const yearArg = value('year');
  let year: number | null = null;
  if (yearArg && yearArg !== 'all') {
    if (!/^\d{4}$/.test(yearArg)) {
      throw new Error(`--year must be a year or "all", got "${yearArg}"`);
    }
    year = Number(yearArg);
  }

  const cityArg = value('city');
  const metricArg = value('metric');
  let metric: SeverityMetric | undefined;
  if (metricArg === 'per-area' || metricArg === 'per-unit') metric = metricArg;
  else if (metricArg !== undefined) throw new Error(`--metric must be "per-area" or "per-unit", got "${metricArg}"`);

  return {
    query: {
      city: cityArg && cityArg !== 'all' ? cityArg : null,
      year,
      buildingId: value('building') ?? null,
      metric
    },
    exportCsv: args.includes('--export')
  };
}
