import type { BinRecord } from '@sweepscope/shared';

export type BinRecordFields = Omit<BinRecord, 'dbmAverage'>;

export function createBinRecord(fields: BinRecordFields): BinRecord {
  return { ...fields, dbmAverage: 0 };
}

/**
 * Copy every field of `template`, then overwrite the statistic fields so the
 * result reads as a finalized single-sample record. The template is never
 * mutated.
 */
export function deriveRecord(template: BinRecord, value: number): BinRecord {
  return { ...template, dbmAverage: value, dbmTotal: value, dbmCount: 1 };
}

export function finalizeRecord(record: BinRecord): BinRecord {
  record.dbmAverage = record.dbmTotal / record.dbmCount;
  return record;
}

/**
 * Running-sum merge: a new key is inserted as-is, a known key has its total
 * and count added to the existing record. Summation order is the feed order.
 */
export function mergeInto(target: Map<string, BinRecord>, records: Map<string, BinRecord>): void {
  for (const [key, record] of records) {
    const existing = target.get(key);
    if (!existing) {
      target.set(key, record);
    } else {
      existing.dbmTotal += record.dbmTotal;
      existing.dbmCount += record.dbmCount;
    }
  }
}

export function byFrequency(a: BinRecord, b: BinRecord): number {
  return a.frequencyStartHz - b.frequencyStartHz;
}
