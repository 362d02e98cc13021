import { existsSync, readFileSync } from 'fs';
import { parse } from 'yaml';
import type { BandEntry, BandTable } from '@sweepscope/shared';
import { BandSchemaError, NotFoundError } from '../errors.js';

/**
 * Frequency allocation table loaded from YAML:
 *
 *   - primary_service_category: BROADCASTING
 *     primary_frequency_range: [87500.0, 108000.0]      # kHz
 *     subbands:
 *     - frequency_range: [87500.0, 108000.0]
 *       width: 20500.0
 *       usage: FM Radio
 *
 * Frequencies are converted to Hz so they line up with `BinRecord.frequencyStartHz`.
 */

// Only the first few entries are checked when a document is loaded.
const VALIDATE_MAX_ENTRIES = 5;

export function khzToHz(khz: number): number {
  return Math.trunc(khz * 1000);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  return typeof value;
}

export function validateBandDocument(data: unknown): asserts data is unknown[] {
  if (!Array.isArray(data)) {
    throw new BandSchemaError(`Invalid band YAML: expected a list of entries, got ${describe(data)}`);
  }
  if (data.length === 0) {
    throw new BandSchemaError('Invalid band YAML: file contains an empty list');
  }

  data.slice(0, VALIDATE_MAX_ENTRIES).forEach((entry: unknown, i) => {
    const label = `entry ${i}`;
    if (!isRecord(entry)) {
      throw new BandSchemaError(`Invalid band YAML: ${label} is not a mapping (got ${describe(entry)})`);
    }

    const psc = entry.primary_service_category;
    if (typeof psc !== 'string' || !psc.trim()) {
      throw new BandSchemaError(
        `Invalid band YAML: ${label} is missing or has an empty 'primary_service_category'`,
      );
    }

    const pfr = entry.primary_frequency_range;
    if (!Array.isArray(pfr) || pfr.length !== 2) {
      throw new BandSchemaError(
        `Invalid band YAML: ${label} 'primary_frequency_range' must be a list of exactly 2 numbers`,
      );
    }
    pfr.forEach((val: unknown, j) => {
      if (typeof val !== 'number') {
        throw new BandSchemaError(
          `Invalid band YAML: ${label} 'primary_frequency_range[${j}]' is not a number (got ${describe(val)})`,
        );
      }
    });

    if (!Array.isArray(entry.subbands)) {
      throw new BandSchemaError(`Invalid band YAML: ${label} 'subbands' must be a list`);
    }
  });
}

/** Sort by start ascending; on equal starts the wider band goes first so narrower ones win lookups. */
export function buildBandTable(entries: BandEntry[]): BandTable {
  const bands = [...entries].sort((a, b) =>
    a.startHz - b.startHz || (b.endHz - b.startHz) - (a.endHz - a.startHz));
  return { bands, starts: bands.map((b) => b.startHz) };
}

function rangeOf(value: unknown): [unknown, unknown] | null {
  return Array.isArray(value) && value.length >= 2 ? [value[0], value[1]] : null;
}

function toHz(khz: unknown): number {
  return khzToHz(Number(khz));
}

/** Flatten validated document entries into band rows. */
export function bandsFromDocument(entries: unknown[]): BandEntry[] {
  const all: BandEntry[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const pfr = rangeOf(entry.primary_frequency_range);
    if (!pfr) continue;
    const primary = typeof entry.primary_service_category === 'string' ? entry.primary_service_category : '';

    let hasSubband = false;
    const subbands = Array.isArray(entry.subbands) ? entry.subbands : [];
    for (const sb of subbands) {
      if (!isRecord(sb)) continue;
      const fr = rangeOf(sb.frequency_range);
      if (!fr) continue;
      const usage = typeof sb.usage === 'string' ? sb.usage : '';
      if (!usage) continue;

      hasSubband = true;
      all.push({
        startHz: toHz(fr[0]),
        endHz: toHz(fr[1]),
        widthKhz: Number(sb.width) || 0,
        usage,
        primaryService: primary,
      });
    }

    if (!hasSubband) {
      all.push({
        startHz: toHz(pfr[0]),
        endHz: toHz(pfr[1]),
        widthKhz: Number(pfr[1]) - Number(pfr[0]),
        usage: primary,
        primaryService: primary,
      });
    }
  }

  return all;
}

export function loadBands(path: string): BandTable {
  if (!existsSync(path)) {
    throw new NotFoundError(`Band allocation file not found: ${path}`);
  }
  const document: unknown = parse(readFileSync(path, 'utf-8'));
  validateBandDocument(document);
  const table = buildBandTable(bandsFromDocument(document));
  console.log(`🗺️ Loaded ${table.bands.length} band entries from ${path}`);
  return table;
}

/** Index of the first start greater than `value`. */
function upperBound(starts: number[], value: number): number {
  let lo = 0;
  let hi = starts.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (starts[mid] <= value) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Narrowest band whose `[startHz, endHz)` contains `freqHz`.
 *
 * Scans backwards from the last band starting at or below `freqHz`. Once a
 * match is held, the first non-containing band ends the scan. That early exit
 * assumes at most two levels of nesting (wide primary + narrow sub-bands).
 */
export function lookupBand(freqHz: number, table: BandTable): BandEntry | undefined {
  const idx = upperBound(table.starts, freqHz);
  let best: BandEntry | undefined;
  let bestWidth = Infinity;

  for (let i = idx - 1; i >= 0; i--) {
    const band = table.bands[i];
    if (band.startHz > freqHz) continue;
    if (band.endHz <= freqHz) {
      if (best) break;
      continue;
    }
    const width = band.endHz - band.startHz;
    if (width < bestWidth) {
      best = band;
      bestWidth = width;
    }
  }

  return best;
}
