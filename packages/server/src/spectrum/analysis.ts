import type { BinRecord, EnvelopeSeries, Sweep } from '@sweepscope/shared';
import { EmptyInputError } from '../errors.js';
import { byFrequency, deriveRecord } from './record.js';

// ============================================================================
// Baseline subtraction
// ============================================================================

/**
 * Subtract `baseline` from `signal` bin by bin. Bins are matched on the exact
 * `frequencyStartRaw` string; signal bins without a baseline match are dropped.
 */
export function subtract(signal: BinRecord[], baseline: BinRecord[]): BinRecord[] {
  const baselineMap = new Map<string, BinRecord>();
  for (const b of baseline) baselineMap.set(b.frequencyStartRaw, b);

  const result: BinRecord[] = [];
  for (const sig of signal) {
    const base = baselineMap.get(sig.frequencyStartRaw);
    if (!base) continue;
    result.push(deriveRecord(sig, sig.dbmAverage - base.dbmAverage));
  }
  return result;
}

export function subtractMulti(signals: BinRecord[][], baseline: BinRecord[]): BinRecord[][] {
  return signals.map((series) => subtract(series, baseline));
}

// ============================================================================
// Cross-sweep statistics
// ============================================================================

/**
 * Maximum power per frequency across sweeps. A frequency absent from some
 * sweeps is taken over the sweeps where it is present.
 */
export function peakHold(sweeps: Sweep[]): BinRecord[] {
  if (sweeps.length === 0) {
    throw new EmptyInputError('Cannot compute peak hold on empty sweeps');
  }

  const peaks = new Map<string, { max: number; template: BinRecord }>();
  for (const { bins } of sweeps) {
    for (const b of bins) {
      const current = peaks.get(b.frequencyStartRaw);
      if (!current) {
        peaks.set(b.frequencyStartRaw, { max: b.dbmAverage, template: b });
      } else if (b.dbmAverage >= current.max) {
        current.max = b.dbmAverage;
        current.template = b;
      }
    }
  }

  return [...peaks.values()]
    .map(({ max, template }) => deriveRecord(template, max))
    .sort(byFrequency);
}

interface EnvelopeStats {
  min: number;
  max: number;
  sum: number;
  count: number;
  template: BinRecord;
}

/**
 * Min, max and mean power per frequency across sweeps, skipping sweeps where
 * the frequency is absent. Each series copies the first record seen for the key.
 */
export function envelope(sweeps: Sweep[]): EnvelopeSeries {
  if (sweeps.length === 0) {
    throw new EmptyInputError('Cannot compute envelope on empty sweeps');
  }

  const stats = new Map<string, EnvelopeStats>();
  for (const { bins } of sweeps) {
    for (const b of bins) {
      const val = b.dbmAverage;
      const s = stats.get(b.frequencyStartRaw);
      if (!s) {
        stats.set(b.frequencyStartRaw, { min: val, max: val, sum: val, count: 1, template: b });
        continue;
      }
      if (val < s.min) s.min = val;
      if (val > s.max) s.max = val;
      s.sum += val;
      s.count++;
    }
  }

  const all = [...stats.values()];
  return {
    min: all.map((s) => deriveRecord(s.template, s.min)).sort(byFrequency),
    max: all.map((s) => deriveRecord(s.template, s.max)).sort(byFrequency),
    avg: all.map((s) => deriveRecord(s.template, s.sum / s.count)).sort(byFrequency),
  };
}
