// ============================================================================
// SweepScope Spectrum Service
// ============================================================================
import { existsSync, readdirSync } from 'fs';
import { basename, extname, join, parse as parsePath } from 'path';
import type {
  BandEntry,
  BandLookup,
  BandTable,
  BinRecord,
  ChartPayload,
  RtlPowerScanConfig,
  SpectrumChart,
  SpectrumDataset,
  ViewMode,
} from '@sweepscope/shared';
import { bandLookup } from '../bands/hover.js';
import { loadBands, lookupBand } from '../bands/table.js';
import type { RtlPowerRunner } from '../scanner/rtl-power.js';
import { envelope, peakHold, subtract } from './analysis.js';
import { buildEnvelopeChart, buildSpectrumChart, buildWaterfallChart } from './charts.js';
import { loadCsv, loadCsvSweeps, saveCsv } from './io.js';

export const VIEW_MODES: readonly ViewMode[] = ['average', 'waterfall', 'peak', 'envelope'];

export function isViewMode(value: unknown): value is ViewMode {
  return VIEW_MODES.some((m) => m === value);
}

export interface ViewRequest {
  files: string[];
  mode?: ViewMode;
  title?: string;
  bands?: string;
}

export interface ViewResult {
  mode: ViewMode;
  summary: string;
  chart: ChartPayload;
}

export interface SubtractRequest {
  signal: string;
  baseline: string;
  output?: string;
  title?: string;
}

export interface SubtractResult {
  bins: number;
  savedTo: string | null;
  chart: SpectrumChart;
}

export interface ScanResult {
  bins: number;
  savedTo: string | null;
  chart: SpectrumChart;
}

export interface SpectrumServiceOptions {
  dataDir: string;
  bandsPath?: string | null;
  runner?: RtlPowerRunner;
}

/**
 * Loads rtl_power CSV files from the data directory and turns them into chart
 * payloads. File names are always resolved inside `dataDir`.
 */
export class SpectrumService {
  private readonly dataDir: string;
  private readonly runner: RtlPowerRunner | null;
  private defaultBands: BandTable | null = null;

  constructor(options: SpectrumServiceOptions) {
    this.dataDir = options.dataDir;
    this.runner = options.runner ?? null;
    if (options.bandsPath) {
      this.defaultBands = loadBands(options.bandsPath);
    }
  }

  resolvePath(name: string): string {
    return join(this.dataDir, basename(name));
  }

  listFiles(): string[] {
    if (!existsSync(this.dataDir)) return [];
    return readdirSync(this.dataDir)
      .filter((f) => extname(f).toLowerCase() === '.csv')
      .sort();
  }

  lookup(freqHz: number): BandEntry | null {
    if (!this.defaultBands) return null;
    return lookupBand(freqHz, this.defaultBands) ?? null;
  }

  private bandsFor(bandsFile?: string): BandLookup | undefined {
    const table = bandsFile ? loadBands(this.resolvePath(bandsFile)) : this.defaultBands;
    return table ? bandLookup(table) : undefined;
  }

  async view(request: ViewRequest): Promise<ViewResult> {
    const mode = request.mode ?? 'average';
    if (request.files.length === 0) {
      throw new Error('At least one file is required');
    }
    const lookup = this.bandsFor(request.bands);

    if (mode === 'average') {
      const datasets: SpectrumDataset[] = [];
      for (const file of request.files) {
        const bins = await loadCsv(this.resolvePath(file));
        console.log(`📊 Loaded ${bins.length} bins from ${file}`);
        datasets.push({ name: parsePath(file).name, bins });
      }
      const chart = buildSpectrumChart(datasets, request.title, lookup);
      const total = datasets.reduce((n, d) => n + d.bins.length, 0);
      return { mode, summary: `Loaded ${total} frequency bins.`, chart };
    }

    // Time-aware modes work on a single file
    const [file, ...ignored] = request.files;
    if (ignored.length > 0) {
      console.log(`📊 --mode ${mode} uses only the first file; ignoring ${ignored.length} additional file(s)`);
    }
    const sweeps = await loadCsvSweeps(this.resolvePath(file));

    if (mode === 'waterfall') {
      const totalBins = sweeps.reduce((n, s) => n + s.bins.length, 0);
      return {
        mode,
        summary: `Loaded ${sweeps.length} sweeps, ${totalBins} total bins.`,
        chart: buildWaterfallChart(sweeps, request.title),
      };
    }

    if (mode === 'peak') {
      const peak = peakHold(sweeps);
      return {
        mode,
        summary: `Peak hold: ${peak.length} frequency bins from ${sweeps.length} sweeps.`,
        chart: buildSpectrumChart([{ name: 'Peak Hold', bins: peak }], request.title, lookup),
      };
    }

    const series = envelope(sweeps);
    return {
      mode,
      summary: `Envelope: ${series.avg.length} frequency bins from ${sweeps.length} sweeps.`,
      chart: buildEnvelopeChart(series, request.title, lookup),
    };
  }

  async subtract(request: SubtractRequest): Promise<SubtractResult> {
    const signal = await loadCsv(this.resolvePath(request.signal));
    const baseline = await loadCsv(this.resolvePath(request.baseline));
    const result = subtract(signal, baseline);
    console.log(`📊 Subtracted ${request.baseline} from ${request.signal}: ${result.length} bins`);

    const savedTo = request.output ? this.save(result, request.output) : null;
    return {
      bins: result.length,
      savedTo,
      chart: buildSpectrumChart([{ name: 'Subtracted', bins: result }], request.title ?? 'Subtracted Spectrum'),
    };
  }

  /** Re-export a CSV in the averaged 7-column layout. */
  async exportCsv(input: string, output: string): Promise<{ bins: number; savedTo: string }> {
    const bins = await loadCsv(this.resolvePath(input));
    return { bins: bins.length, savedTo: this.save(bins, output) };
  }

  async runScan(config: RtlPowerScanConfig, output?: string): Promise<ScanResult> {
    if (!this.runner) {
      throw new Error('Scanning is not available on this server');
    }
    const bins = await this.runner.run(config);
    console.log(`📡 Captured ${bins.length} frequency bins`);
    const savedTo = output ? this.save(bins, output) : null;
    return {
      bins: bins.length,
      savedTo,
      chart: buildSpectrumChart([{ name: 'Scan', bins }], 'rtl_power Scan'),
    };
  }

  private save(bins: BinRecord[], output: string): string {
    const path = this.resolvePath(output);
    saveCsv(bins, path);
    console.log(`📊 Saved ${bins.length} bins to ${path}`);
    return path;
  }
}
