import type { BinRecord } from '@sweepscope/shared';
import { createBinRecord } from './record.js';

/**
 * rtl_power CSV row:
 *   date, time, freq_start, freq_end, step, num_samples, dBm0[, dBm1, ...]
 * Column 6+i is the sub-bin at freq_start + i * step.
 */
const MIN_COLUMNS = 7;
const FIRST_DBM_COLUMN = 6;

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;
const INFINITY = /^([+-]?)inf(inity)?$/i;
const NOT_A_NUMBER = /^[+-]?nan$/i;

/**
 * Parse a float with the same grammar as the capture tool's number parser,
 * returning `undefined` for text that is not a number at all.
 */
export function parseNumber(raw: string): number | undefined {
  const text = raw.trim();
  if (DECIMAL.test(text)) return Number(text);
  const inf = INFINITY.exec(text);
  if (inf) return inf[1] === '-' ? -Infinity : Infinity;
  if (NOT_A_NUMBER.test(text)) return NaN;
  return undefined;
}

/** Power reading for one sub-bin, or `undefined` when it must be skipped. */
function parsePower(raw: string): number | undefined {
  const text = raw.trim();
  if (text.toLowerCase() === 'nan') return undefined;
  const value = parseNumber(text);
  if (value === undefined || Number.isNaN(value)) return undefined;
  return value;
}

/**
 * Split one CSV row into per-frequency records keyed by the integer start
 * frequency. Short or malformed rows yield an empty map; a repeated key
 * within one row keeps the later sub-bin.
 */
export function decodeLine(line: string): Map<string, BinRecord> {
  const result = new Map<string, BinRecord>();
  const parts = line.split(',');
  if (parts.length < MIN_COLUMNS) return result;

  const startText = parts[2].trim();
  const step = parseNumber(parts[4]);
  if (!INTEGER.test(startText) || step === undefined || !Number.isFinite(step)) return result;

  const date = parts[0].trim();
  const time = parts[1].trim();
  const frequencyStart = Number(startText);
  const stepRaw = parts[4].trim();
  const numSamplesRaw = parts[5].trim();

  for (let i = 0; i < parts.length - FIRST_DBM_COLUMN; i++) {
    const value = parsePower(parts[FIRST_DBM_COLUMN + i]);
    if (value === undefined) continue;

    const freq = Math.trunc(frequencyStart + i * step);
    const key = String(freq);
    result.set(key, createBinRecord({
      date,
      time,
      frequencyStartRaw: key,
      frequencyStartHz: freq,
      frequencyEndRaw: stepRaw,
      binSizeRaw: stepRaw,
      numSamplesRaw,
      dbmTotal: value,
      dbmCount: 1,
    }));
  }

  return result;
}
