import type { BinRecord, Sweep } from '@sweepscope/shared';
import { decodeLine } from './decoder.js';
import { byFrequency, finalizeRecord, mergeInto } from './record.js';

/** Anything that consumes rtl_power CSV rows one at a time. */
export interface LineSink {
  addLine(line: string): void;
}

function finalizeAll(cache: Map<string, BinRecord>): BinRecord[] {
  return [...cache.values()].sort(byFrequency).map((r) => finalizeRecord({ ...r }));
}

/**
 * Merges every row into one averaged record per frequency.
 * One instance per load; not shared between callers.
 */
export class BinAccumulator implements LineSink {
  private cache = new Map<string, BinRecord>();

  get size() { return this.cache.size; }

  addLine(line: string): void {
    mergeInto(this.cache, decodeLine(line));
  }

  /** Sorted, averaged copies. The running totals stay with the accumulator. */
  finalize(): BinRecord[] {
    return finalizeAll(this.cache);
  }
}

interface OpenSweep {
  label: string;
  cache: Map<string, BinRecord>;
}

/**
 * Groups rows into sweeps. A new sweep starts whenever the `date time` of a
 * row differs from the row before it; within a sweep rows are merged like
 * {@link BinAccumulator}.
 */
export class SweepAccumulator implements LineSink {
  private completed: OpenSweep[] = [];
  private open: OpenSweep | null = null;

  get sweepCount() { return this.completed.length + (this.open ? 1 : 0); }

  addLine(line: string): void {
    const bins = decodeLine(line);
    const first = bins.values().next();
    if (first.done) return;

    const label = `${first.value.date} ${first.value.time}`;
    if (!this.open || this.open.label !== label) {
      if (this.open) this.completed.push(this.open);
      this.open = { label, cache: new Map() };
    }
    mergeInto(this.open.cache, bins);
  }

  /** Sweeps in the order their labels first appeared; no re-sorting by time. */
  finalize(): Sweep[] {
    const all = this.open ? [...this.completed, this.open] : this.completed;
    return all.map(({ label, cache }) => ({ label, bins: finalizeAll(cache) }));
  }
}
