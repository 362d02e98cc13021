/**
 * Server configuration: environment variables plus scan defaults from
 * config/scan-defaults.json.
 */
import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import type { RtlPowerScanConfig } from '@sweepscope/shared';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const SCAN_DEFAULTS_PATH = join(__dirname, '..', 'config', 'scan-defaults.json');

export const BUILTIN_SCAN_DEFAULTS: RtlPowerScanConfig = {
  freqStart: 24_000_000,     // 24 MHz
  freqEnd: 1_700_000_000,    // 1.7 GHz
  step: 1_000_000,
  integration: 120,
  gain: 0,                   // auto
  crop: '20%',
};

export interface ServerConfig {
  port: number;
  dataDir: string;
  bandsPath: string | null;
  rtlPowerPath: string;
  scanDefaults: RtlPowerScanConfig;
}

const NUMERIC_SCAN_KEYS = ['freqStart', 'freqEnd', 'step', 'integration', 'gain'] as const;

/**
 * Overlay the recognised keys of `input` on `base`. Throws on a key with the
 * wrong type so bad request bodies and bad config files are both reported.
 */
export function mergeScanConfig(base: RtlPowerScanConfig, input: unknown): RtlPowerScanConfig {
  if (input === undefined || input === null) return { ...base };
  if (typeof input !== 'object' || Array.isArray(input)) {
    throw new Error('scan config must be an object');
  }
  const merged = { ...base };
  const fields = new Map(Object.entries(input));
  for (const key of NUMERIC_SCAN_KEYS) {
    const value = fields.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new Error(`${key} must be a number`);
    }
    merged[key] = Math.trunc(value);
  }
  const crop = fields.get('crop');
  if (crop !== undefined) {
    if (typeof crop !== 'string') throw new Error('crop must be a string');
    merged.crop = crop;
  }
  if (merged.freqEnd <= merged.freqStart) {
    throw new Error('freqEnd must be greater than freqStart');
  }
  return merged;
}

export function loadScanDefaults(path = SCAN_DEFAULTS_PATH): RtlPowerScanConfig {
  if (!existsSync(path)) return { ...BUILTIN_SCAN_DEFAULTS };
  try {
    const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return mergeScanConfig(BUILTIN_SCAN_DEFAULTS, data);
  } catch (err) {
    console.error('Failed to load scan defaults:', err);
    return { ...BUILTIN_SCAN_DEFAULTS };
  }
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT || '3410'),
    dataDir: resolve(env.SWEEPSCOPE_DATA_DIR || 'data'),
    bandsPath: env.SWEEPSCOPE_BANDS ? resolve(env.SWEEPSCOPE_BANDS) : null,
    rtlPowerPath: env.RTL_POWER_PATH || 'rtl_power',
    scanDefaults: loadScanDefaults(),
  };
}
