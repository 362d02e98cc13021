import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { NotFoundError } from '../errors.js';
import { formatCsvLine, loadCsv, loadCsvSweeps, saveCsv } from '../spectrum/io.js';

const LINE_A = '2021-11-14,20:27:18,433006,435994,58.59,342414,-30.0,-60.0';
const LINE_B = '2021-11-14,20:28:18,433006,435994,58.59,342414,-60.0,-30.0';

describe('CSV file I/O', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sweepscope-io-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, 'utf-8');
    return path;
  }

  it('rejects a missing file with NotFoundError', async () => {
    const path = join(dir, 'missing.csv');
    await expect(loadCsv(path)).rejects.toBeInstanceOf(NotFoundError);
    await expect(loadCsv(path)).rejects.toThrow(`CSV file not found: ${path}`);
    await expect(loadCsvSweeps(path)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('averages every row of a file', async () => {
    const path = write('scan.csv', `${LINE_A}\n${LINE_B}\n`);
    const bins = await loadCsv(path);
    expect(bins.map((b) => [b.frequencyStartHz, b.dbmAverage])).toEqual([[433006, -45], [433064, -45]]);
  });

  it('handles CRLF endings and blank lines', async () => {
    const path = write('crlf.csv', `${LINE_A}\r\n\r\n${LINE_B}\r\n`);
    const bins = await loadCsv(path);
    expect(bins).toHaveLength(2);
    expect(bins[0].dbmAverage).toBe(-45);
    expect(bins[0].dbmCount).toBe(2);
  });

  it('returns an empty list for an empty file', async () => {
    expect(await loadCsv(write('empty.csv', ''))).toEqual([]);
    expect(await loadCsvSweeps(write('empty2.csv', ''))).toEqual([]);
  });

  it('splits a file into sweeps by timestamp', async () => {
    const path = write('sweeps.csv', `${LINE_A}\n${LINE_B}\n`);
    const sweeps = await loadCsvSweeps(path);
    expect(sweeps.map((s) => s.label)).toEqual(['2021-11-14 20:27:18', '2021-11-14 20:28:18']);
    expect(sweeps[1].bins.map((b) => b.dbmAverage)).toEqual([-60, -30]);
  });

  it('writes the seven-column layout without a header', async () => {
    const bins = await loadCsv(write('scan.csv', `${LINE_A}\n${LINE_B}\n`));
    const out = join(dir, 'out.csv');
    saveCsv(bins, out);
    expect(readFileSync(out, 'utf-8')).toBe(
      '2021-11-14,20:27:18,433006,58.59,58.59,342414,-45\n' +
      '2021-11-14,20:27:18,433064,58.59,58.59,342414,-45\n',
    );
  });

  it('creates missing parent directories', async () => {
    const bins = await loadCsv(write('scan.csv', `${LINE_A}\n`));
    const out = join(dir, 'nested', 'deeper', 'out.csv');
    saveCsv(bins, out);
    expect(readFileSync(out, 'utf-8').split('\n')).toHaveLength(3);
  });

  it('writes an empty file for no records', () => {
    const out = join(dir, 'none.csv');
    saveCsv([], out);
    expect(readFileSync(out, 'utf-8')).toBe('');
  });

  it('reloads a saved file to the same frequencies and averages', async () => {
    const path = write('scan.csv', [
      '2019-06-16,23:10:56,24000000,25000000,1000000.00,1,-24.14,-23.50',
      '2019-06-16,23:10:57,24000000,25000000,1000000.00,1,-24.15,nan',
    ].join('\n'));
    const first = await loadCsv(path);
    const out = join(dir, 'saved.csv');
    saveCsv(first, out);
    const second = await loadCsv(out);

    expect(second.map((b) => b.frequencyStartRaw)).toEqual(first.map((b) => b.frequencyStartRaw));
    second.forEach((b, i) => expect(b.dbmAverage).toBeCloseTo(first[i].dbmAverage, 9));
  });

  it('formats a single record line', () => {
    expect(formatCsvLine({
      date: '2024-01-01',
      time: '00:00:00',
      frequencyStartRaw: '100000000',
      frequencyStartHz: 100000000,
      frequencyEndRaw: '250000',
      binSizeRaw: '250000',
      numSamplesRaw: '8',
      dbmAverage: -12.5,
      dbmTotal: -25,
      dbmCount: 2,
    })).toBe('2024-01-01,00:00:00,100000000,250000,250000,8,-12.5');
  });
});
