import { createReadStream, existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { createInterface } from 'readline';
import type { BinRecord, Sweep } from '@sweepscope/shared';
import { NotFoundError } from '../errors.js';
import { BinAccumulator, SweepAccumulator, type LineSink } from './parser.js';

/**
 * Stream a CSV file into `sink` one line at a time. The file handle is
 * released when reading finishes or fails.
 */
export async function feedFile(path: string, sink: LineSink): Promise<number> {
  if (!existsSync(path)) {
    throw new NotFoundError(`CSV file not found: ${path}`);
  }

  const stream = createReadStream(path, { encoding: 'utf-8' });
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  let count = 0;
  try {
    for await (const raw of lines) {
      const line = raw.replace(/[\r\n]+$/, '');
      if (!line) continue;
      sink.addLine(line);
      count++;
    }
  } finally {
    lines.close();
    stream.destroy();
  }
  return count;
}

/** Load a CSV file, averaging every row into one record per frequency. */
export async function loadCsv(path: string): Promise<BinRecord[]> {
  const parser = new BinAccumulator();
  await feedFile(path, parser);
  return parser.finalize();
}

/** Load a CSV file keeping each sweep separate. */
export async function loadCsvSweeps(path: string): Promise<Sweep[]> {
  const parser = new SweepAccumulator();
  await feedFile(path, parser);
  return parser.finalize();
}

export function formatCsvLine(record: BinRecord): string {
  return [
    record.date,
    record.time,
    record.frequencyStartRaw,
    record.frequencyEndRaw,
    record.binSizeRaw,
    record.numSamplesRaw,
    String(record.dbmAverage),
  ].join(',');
}

/** Write records in the 7-column rtl_power layout, no header row. */
export function saveCsv(records: BinRecord[], path: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, records.map((r) => `${formatCsvLine(r)}\n`).join(''), 'utf-8');
}
