import { describe, it, expect } from 'vitest';
import { join, joinSources } from '../src/core/join';
import { building, consumption, temperature } from './helpers';

describe('join', () => {
  it('emits one record per building and month', () => {
    const records = join(
      [building('B1', { floorArea: 100, city: 'TRONDHEIM' })],
      [],
      [consumption('B1', 2023, 1, 500), consumption('B1', 2023, 2, 300)]
    );

    expect(records).toHaveLength(2);
    expect(records.map(r => [r.buildingId, r.year, r.month, r.consumption])).toEqual([
      ['B1', 2023, 1, 500],
      ['B1', 2023, 2, 300]
    ]);
    expect(records[0]).toMatchObject({ city: 'TRONDHEIM', citySource: 'metadata', floorArea: 100, hasMetadata: true, metrics: null });
  });

  it('uses the first metadata row when identifiers repeat', () => {
    const records = join(
      [building('B1', { city: 'TRONDHEIM' }), building('B1', { city: 'OSLO' })],
      [],
      [consumption('B1', 2023, null, 1000)]
    );

    expect(records).toHaveLength(1);
    expect(records[0].city).toBe('TRONDHEIM');
  });

  it('averages non-missing temperature samples per period', () => {
    const records = join(
      [],
      [
        temperature('B1', 2023, 1, 2),
        temperature('B1', 2023, 1, 4),
        temperature('B1', 2023, 1, null),
        temperature('B1', 2023, 2, null),
        temperature('B1', 2023, 2, Number.NaN)
      ],
      []
    );

    expect(records[0]).toMatchObject({ month: 1, meanTemperature: 3, temperatureSamples: 3, consumption: null });
    expect(records[1]).toMatchObject({ month: 2, meanTemperature: null, temperatureSamples: 2 });
  });

  it('averages degree days per period', () => {
    const records = join(
      [building('B1')],
      [
        temperature('B1', 2023, 1, -4, null, 300),
        temperature('B1', 2023, 1, -2, null, null),
        temperature('B1', 2023, 1, -6, null, 320),
        temperature('B1', 2023, 2, -1)
      ],
      []
    );

    expect(records.map(r => [r.month, r.meanDegreeDays])).toEqual([[1, 310], [2, null]]);
  });

  it('keeps readings without metadata and infers their city', () => {
    const result = joinSources(
      [],
      [temperature('X9', 2023, 1, 1, 'BERGEN')],
      [consumption('X9', 2023, 1, 10, 'OSLO'), consumption('X9', 2023, 2, 20), consumption('X8', 2023, 1, 5)]
    );

    const x9 = result.records.filter(r => r.buildingId === 'X9');
    expect(x9).toHaveLength(2);
    expect(x9[0]).toMatchObject({ city: 'OSLO', citySource: 'readings', coordinates: null, hasMetadata: false });
    expect(result.records.find(r => r.buildingId === 'X8')).toMatchObject({ city: null, citySource: null });

    expect(result.diagnostics.map(d => [d.code, d.buildingId])).toEqual([
      ['unjoinable-record', 'X8'],
      ['unjoinable-record', 'X9']
    ]);
    expect(result.diagnostics[0].message).toBe('No building metadata and no city; excluded from map and city views');
    expect(result.diagnostics[1].message).toBe('No building metadata; city OSLO inferred from readings');
  });

  it('produces nothing for buildings without readings', () => {
    expect(join([building('B1')], [], [])).toEqual([]);
  });

  it('keeps the first consumption value for a repeated period', () => {
    const result = joinSources([building('B1')], [], [consumption('B1', 2023, 1, 100), consumption('B1', 2023, 1, 999)]);

    expect(result.records).toHaveLength(1);
    expect(result.records[0].consumption).toBe(100);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0].code).toBe('duplicate-period');
  });

  it('orders months before the yearly record', () => {
    const records = join(
      [],
      [],
      [consumption('B2', 2023, null, 1), consumption('B1', 2023, 3, 1), consumption('B1', 2022, null, 1), consumption('B1', 2023, 1, 1)]
    );

    expect(records.map(r => [r.buildingId, r.year, r.month])).toEqual([
      ['B1', 2022, null],
      ['B1', 2023, 1],
      ['B1', 2023, 3],
      ['B2', 2023, null]
    ]);
  });

  it('does not depend on the order records arrive in', () => {
    const buildings = [building('B1', { city: 'TRONDHEIM', floorArea: 50 }), building('B2', { city: 'GJØVIK' })];
    const temperatures = [temperature('B1', 2023, 1, -3), temperature('B2', 2023, 1, -7), temperature('B1', 2023, 1, -5)];
    const consumptions = [consumption('B2', 2023, 1, 40), consumption('B1', 2023, 1, 10), consumption('B1', 2023, 2, 20)];

    const forward = join(buildings, temperatures, consumptions);
    const reversed = join([...buildings].reverse(), [...temperatures].reverse(), [...consumptions].reverse());

    expect(reversed).toEqual(forward);
  });
});
