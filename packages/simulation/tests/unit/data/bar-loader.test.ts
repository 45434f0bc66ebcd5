import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { NotFoundError, ValidationError } from '@crossbar/utils';
import {
  buildBars,
  detectFormat,
  loadBarsFromFile,
  parseJsonRecords,
} from '../../../src/data/bar-loader.js';

const CSV = [
  'datetime,open,high,low,close,volume',
  '2024-01-03T09:30:00,152.00,153.00,151.00,152.50,1200000',
  '2024-01-01T09:30:00,150.25,152.50,149.75,151.00,1000000',
  'bad-date,150,151,149,150,1000',
  '2024-01-02T09:30:00,151.00,153.00,150.50,152.00,1100000',
].join('\n');

describe('bar loader', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'crossbar-loader-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads a CSV file, skips invalid rows and sorts by timestamp', async () => {
    const file = path.join(dir, 'bars.csv');
    await fs.writeFile(file, CSV, 'utf-8');

    const result = await loadBarsFromFile(file);

    expect(result.bars.map((bar) => bar.close)).toEqual([151, 152, 152.5]);
    expect(result.bars.map((bar) => bar.timestamp.toISODate())).toEqual([
      '2024-01-01',
      '2024-01-02',
      '2024-01-03',
    ]);
    expect(result.skipped).toEqual([{ row: 3, reason: 'datetime: Invalid datetime: bad-date' }]);
  });

  it('accepts capitalised CSV headers and ignores extra columns', async () => {
    const file = path.join(dir, 'headers.csv');
    await fs.writeFile(
      file,
      ['Datetime,Open,High,Low,Close,Volume,Symbol', '2024-02-01,10,11,9,10.5,100,ABC'].join('\n'),
      'utf-8'
    );

    const result = await loadBarsFromFile(file);

    expect(result.skipped).toEqual([]);
    expect(result.bars).toHaveLength(1);
    expect(result.bars[0]).toMatchObject({ open: 10, high: 11, low: 9, close: 10.5, volume: 100 });
  });

  it('loads a JSON bulk payload', async () => {
    const file = path.join(dir, 'bulk.json');
    await fs.writeFile(
      file,
      JSON.stringify({
        data: [
          {
            datetime: '2024-01-01T10:30:00',
            open: 151,
            high: 153,
            low: 150.5,
            close: 152.5,
            volume: 1100000,
          },
          {
            datetime: '2024-01-01T09:30:00',
            open: 150.25,
            high: 152.5,
            low: 149.75,
            close: 151,
            volume: 1000000,
          },
        ],
      }),
      'utf-8'
    );

    const result = await loadBarsFromFile(file);

    expect(result.bars.map((bar) => bar.close)).toEqual([151, 152.5]);
  });

  it('throws NotFoundError for a missing file', async () => {
    await expect(loadBarsFromFile(path.join(dir, 'missing.csv'))).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it('rejects unsupported extensions', () => {
    expect(() => detectFormat('bars.txt')).toThrow(ValidationError);
    expect(() => detectFormat('bars.txt')).toThrow("Unsupported bar file extension '.txt'");
    expect(detectFormat('BARS.CSV')).toBe('csv');
  });
});

describe('parseJsonRecords', () => {
  it('accepts a plain array', () => {
    expect(parseJsonRecords('[{"a":1}]')).toEqual([{ a: 1 }]);
  });

  it('rejects malformed JSON', () => {
    expect(() => parseJsonRecords('{nope')).toThrow(ValidationError);
  });

  it('rejects objects without a data array', () => {
    expect(() => parseJsonRecords('{"rows":[]}')).toThrow(
      'JSON bar file must be an array or an object with a "data" array'
    );
  });
});

describe('buildBars', () => {
  it('numbers skipped rows from 1', () => {
    const result = buildBars([{ datetime: '2024-01-01', open: 1, high: 1, low: 1, close: 1 }]);

    expect(result.bars).toEqual([]);
    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0].row).toBe(1);
    expect(result.skipped[0].reason).toContain('volume');
  });
});
