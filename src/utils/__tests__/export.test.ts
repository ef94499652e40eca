import { describe, expect, it } from 'vitest';
import { generateTableData as generateCSV } from '../export';
import type { CalibratedSeries } from '../../types';

describe('generateCSV', () => {
  const series: CalibratedSeries = [
    { column: 0, row: 12, date: '2020-01-01', value: 10 },
    { column: 1, row: 13, date: '2020-01-02', value: 9.5 },
    { column: 2, row: 14.5, date: '2020-01-03', value: -0.125 },
  ];

  it('writes a date,value header and one row per sample', () => {
    const lines = generateCSV(series).split('\n');

    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe('date,value');
    expect(lines[1]).toBe('2020-01-01,10');
    expect(lines[2]).toBe('2020-01-02,9.5');
    expect(lines[3]).toBe('2020-01-03,-0.125');
  });

  it('honours a custom delimiter', () => {
    expect(generateCSV(series.slice(0, 1), ';')).toBe('date;value\n2020-01-01;10');
  });

  it('writes only the header for an empty series', () => {
    expect(generateCSV([])).toBe('date,value');
  });
});
