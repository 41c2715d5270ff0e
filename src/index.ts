import * as path from 'path';
import { loadSettings } from './config/settings';
import { PipelineLogger } from './core/logger';
import { EnergyPipeline } from './pipeline/pipeline';
import type { PipelineResult } from './pipeline/pipeline';
import { parseArgs } from './args';
import { exportFileName, exportRecords } from './pipeline/export';
import { compareExtremes, monthlyConsumptionSeries, temperatureConsumptionPairs, topConsumers } from './core/queries';
import { compareTiers } from './core/severity';
import type { TierRange } from './core/severity';

const fixed = (value: number | null, digits = 1) => (value === null ? 'N/A' : value.toFixed(digits));

function printReport(result: PipelineResult, legend: TierRange[]) {
  console.log('\n===========================================');
  console.log('Student Housing Energy Report');
  console.log('===========================================');
  console.log(`Cities: ${result.cities.join(', ') || 'none'}`);
  console.log(`Years: ${result.years.join(', ') || 'none'}`);
  console.log(`Diagnostics: ${result.dataset.diagnostics.length}${result.cacheHit ? ' (cached dataset)' : ''}`);
  console.log('===========================================\n');

  console.table([{
    'Buildings': result.kpis.buildingCount,
    'Total (kWh)': result.kpis.totalConsumption.toFixed(0),
    'kWh per m²': fixed(result.kpis.consumptionPerArea),
    'kWh per student unit': fixed(result.kpis.consumptionPerUnit)
  }]);

  console.log('\nMonthly consumption:');
  console.table(monthlyConsumptionSeries(result.records).map(entry => ({
    'Year': entry.year,
    'Month': entry.month,
    'Total (kWh)': entry.total.toFixed(0),
    'Buildings': entry.buildings
  })));

  console.log('\nTop consumers:');
  console.table(topConsumers(result.summaries).map(entry => ({
    'Building': entry.buildingId,
    'City': entry.city ?? 'N/A',
    'Total (kWh)': entry.total.toFixed(0)
  })));

  const extremes = compareExtremes(result.summaries);
  console.log(`\nHighest quarter: ${extremes.high.map(entry => entry.buildingId).join(', ') || 'none'}`);
  console.log(`Lowest quarter: ${extremes.low.map(entry => entry.buildingId).join(', ') || 'none'}`);

  console.log('\nTemperature and consumption:');
  console.table(temperatureConsumptionPairs(result.records).map(point => ({
    'City': point.city,
    'Year': point.year,
    'Month': point.month,
    'Mean temp (°C)': fixed(point.meanTemperature),
    'Degree days': fixed(point.meanDegreeDays),
    'Total (kWh)': point.consumption.toFixed(0)
  })));

  const unit = result.metric === 'per-area' ? 'kWh per m²' : 'kWh per student unit';
  console.log(`\nSeverity (${unit}):`);
  console.table(legend.map(range => ({
    'Tier': range.tier,
    'From': range.min ?? '-',
    'Below': range.max ?? '-'
  })));

  // most severe first, unrated last
  const markers = [...result.markers].sort((a, b) =>
    a.tier === null ? (b.tier === null ? 0 : 1) : b.tier === null ? -1 : compareTiers(b.tier, a.tier)
  );
  console.log('\nMap markers:');
  console.table(markers.map(marker => ({
    'Building': marker.building.name,
    'City': marker.building.city ?? 'N/A',
    'Lat': marker.coordinates.lat,
    'Lon': marker.coordinates.lon,
    'Metric': fixed(marker.metric),
    'Tier': marker.tier ?? 'no data'
  })));
}

async function main() {
  const settings = loadSettings();
  const { query, exportCsv } = parseArgs(process.argv.slice(2));
  const logger = new PipelineLogger('energy', { level: settings.logLevel, logDir: settings.logDir });
  const pipeline = new EnergyPipeline(settings, logger);

  const result = await pipeline.execute(query);
  printReport(result, pipeline.classifier(result.metric).legend());

  if (exportCsv) {
    const filePath = path.join(settings.exportDir, exportFileName(query));
    await exportRecords(result.records, filePath, settings.delimiter);
    console.log(`\nExported ${result.records.length} records to: ${filePath}`);
  }
}

main().catch(error => {
  console.error('Error in main execution:', error);
  process.exitCode = 1;
});
