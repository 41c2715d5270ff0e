import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { loadSettings } from '../src/config/settings';
import { SourceReadError } from '../src/core/errors';
import { PipelineLogger } from '../src/core/logger';
import { DatasetCache } from '../src/pipeline/cache';
import { EnergyPipeline } from '../src/pipeline/pipeline';
import type { PipelineDataset, SourceReader } from '../src/pipeline/pipeline';

const FILES: Record<string, string> = {
  'buildings.csv': [
    'project_name;City;lat;lon;Total_BRA;total_HE',
    'B1;Trondheim;63,41;10,43;100;10',
    'B1;Trondheim;63,41;10,43;100;10',
    'B2;Gjøvik;60,78;10,68;50;'
  ].join('\n'),
  'temperatures.csv': [
    'project_name;City;Time;Temperature;Monthly_HDD',
    'B1;Trondheim;jan.23;-4,0;620',
    'B1;Trondheim;jan.23;-2,0;640'
  ].join('\n'),
  'electricity.csv': [
    'project_name;City;Year;Jan_KwH;Feb_KwH;Year_total_KwH',
    'B1;Trondheim;2023;500;300;',
    'B2;Gjøvik;2023;N/A;;3000'
  ].join('\n')
};

function memoryReader(files: Record<string, string>): SourceReader {
  return async filePath => {
    const content = files[path.basename(filePath)];
    if (content === undefined) throw new Error(`ENOENT: ${filePath}`);
    return content;
  };
}

function createPipeline(
  files: Record<string, string> = FILES,
  cache = new DatasetCache<PipelineDataset>(),
  env: Record<string, string> = {}
) {
  const settings = loadSettings({ DATA_DIR: 'fixtures', LOG_DIR: '', ...env });
  const logger = new PipelineLogger('test', { logDir: settings.logDir, silent: true });
  return new EnergyPipeline(settings, logger, cache, memoryReader(files));
}

describe('EnergyPipeline', () => {
  it('loads, joins and rates the three sources', async () => {
    const result = await createPipeline().execute();

    expect(result.cacheHit).toBe(false);
    expect(result.records).toHaveLength(6);
    expect(result.dataset.diagnostics.map(d => d.code)).toEqual(['duplicate-identifier']);
    expect(result.dataset.loads.buildings).toEqual({ rows: 3, accepted: 2, rejected: 1 });
    expect(result.markers.map(m => [m.building.id, m.metric, m.tier])).toEqual([
      ['B1', 8, 'low'],
      ['B2', 60, 'high']
    ]);
    expect(result.kpis.totalConsumption).toBe(3800);
    expect(result.kpis.buildingCount).toBe(2);
    expect(result.cities).toEqual(['GJØVIK', 'TRONDHEIM']);
    expect(result.run.diagnosticCount).toBe(1);
  });

  it('averages temperature samples of the same month', async () => {
    const result = await createPipeline().execute({ buildingId: 'B1' });
    const january = result.records.find(record => record.month === 1);

    expect(january?.meanTemperature).toBe(-3);
    expect(january?.meanDegreeDays).toBe(630);
    expect(january?.temperatureSamples).toBe(2);
    expect(january?.consumption).toBe(500);
  });

  it('limits records and markers to the selected building', async () => {
    const result = await createPipeline().execute({ buildingId: 'B1' });

    expect([...new Set(result.records.map(record => record.buildingId))]).toEqual(['B1']);
    expect(result.markers.map(marker => marker.building.id)).toEqual(['B1']);
    expect(result.kpis.buildingCount).toBe(1);
  });

  it('rates markers with the requested metric', async () => {
    const pipeline = createPipeline();
    const result = await pipeline.execute({ metric: 'per-unit' });

    expect(result.metric).toBe('per-unit');
    expect(result.markers.map(m => [m.building.id, m.metric, m.tier])).toEqual([
      ['B1', 80, 'low'],
      ['B2', null, null]
    ]);
    expect(pipeline.classifier('per-unit').legend()[3]).toEqual({ tier: 'critical', min: 6000, max: null });
  });

  it('applies configured severity boundaries', async () => {
    const pipeline = createPipeline(FILES, new DatasetCache<PipelineDataset>(), { SEVERITY_PER_AREA_BOUNDARIES: '5,10,20' });
    const result = await pipeline.execute();

    expect(result.markers.map(m => m.tier)).toEqual(['medium', 'critical']);
    expect(pipeline.classifier('per-area').legend()[0]).toEqual({ tier: 'low', min: null, max: 5 });
  });

  it('reuses the dataset while the inputs are unchanged', async () => {
    const cache = new DatasetCache<PipelineDataset>();
    const pipeline = createPipeline(FILES, cache);

    const first = await pipeline.execute();
    const second = await pipeline.execute({ city: 'Trondheim' });

    expect(second.cacheHit).toBe(true);
    expect(second.fingerprint).toBe(first.fingerprint);
    expect(second.dataset).toBe(first.dataset);
    expect(second.records).toHaveLength(3);
    expect(cache.size).toBe(1);
  });

  it('fails the run when a source cannot be read', async () => {
    const { 'electricity.csv': _omitted, ...files } = FILES;
    const run = createPipeline(files).execute();

    await expect(run).rejects.toBeInstanceOf(SourceReadError);
    await expect(run).rejects.toThrow('electricity: cannot read fixtures/electricity.csv');
  });

  it('rejects a file read with the wrong delimiter', async () => {
    const files = { ...FILES, 'buildings.csv': 'project_name,City\nB1,Trondheim' };
    await expect(createPipeline(files).execute()).rejects.toThrow(
      'buildings: expected a ";"-delimited header row'
    );
  });
});
