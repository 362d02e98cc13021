import type {
  BandLookup,
  BinRecord,
  EnvelopeChart,
  EnvelopeSeries,
  LineTrace,
  SpectrumChart,
  SpectrumDataset,
  Sweep,
  WaterfallChart,
} from '@sweepscope/shared';
import { annotateHover } from '../bands/hover.js';
import { EmptyInputError } from '../errors.js';
import { formatFrequency, formatPower } from './format.js';

/** Dark navy → blue → green → yellow → red, as in most SDR waterfalls. */
export const SDR_COLORSCALE: [number, string][] = [
  [0.0, '#000080'],
  [0.25, '#0000ff'],
  [0.5, '#00ff00'],
  [0.75, '#ffff00'],
  [1.0, '#ff0000'],
];

function lineTrace(name: string, bins: BinRecord[], label: string, lookup?: BandLookup): LineTrace {
  return {
    name,
    x: bins.map((b) => b.frequencyStartHz),
    y: bins.map((b) => b.dbmAverage),
    hoverText: bins.map((b) => annotateHover(
      b.frequencyStartHz,
      `${formatFrequency(b.frequencyStartHz)}<br>${label}${formatPower(b.dbmAverage)} dBm`,
      lookup,
    )),
  };
}

export function buildSpectrumChart(
  datasets: SpectrumDataset[],
  title = 'RF Spectrum',
  lookup?: BandLookup,
): SpectrumChart {
  return {
    kind: 'spectrum',
    title,
    xAxisTitle: 'Frequency',
    yAxisTitle: 'Power (dBm)',
    traces: datasets.map((d) => lineTrace(d.name, d.bins, '', lookup)),
  };
}

/** Heatmap rows are sweeps, columns the union of all sweep frequencies. */
export function buildWaterfallChart(
  sweeps: Sweep[],
  title = 'RF Waterfall / Spectrogram',
): WaterfallChart {
  if (sweeps.length === 0) {
    throw new EmptyInputError('Cannot plot waterfall with empty sweeps');
  }

  const freqSet = new Set<number>();
  for (const { bins } of sweeps) {
    for (const b of bins) freqSet.add(b.frequencyStartHz);
  }
  const frequencies = [...freqSet].sort((a, b) => a - b);
  const column = new Map(frequencies.map((f, i) => [f, i]));

  const z = sweeps.map(({ bins }) => {
    const row = new Array<number | null>(frequencies.length).fill(null);
    for (const b of bins) {
      const idx = column.get(b.frequencyStartHz);
      if (idx !== undefined) row[idx] = b.dbmAverage;
    }
    return row;
  });

  return {
    kind: 'waterfall',
    title,
    frequencies,
    timestamps: sweeps.map((s) => s.label),
    z,
    colorscale: SDR_COLORSCALE,
  };
}

export function buildEnvelopeChart(
  series: EnvelopeSeries,
  title = 'RF Spectrum Envelope',
  lookup?: BandLookup,
): EnvelopeChart {
  const max = { ...lineTrace('Max', series.max, 'Max: ', lookup), color: '#ff4444' };
  const min = { ...lineTrace('Min', series.min, 'Min: ', lookup), color: '#4488ff', fillToPrevious: true };
  const avg = { ...lineTrace('Average', series.avg, 'Avg: ', lookup), color: '#00ff00' };
  return {
    kind: 'envelope',
    title,
    xAxisTitle: 'Frequency',
    yAxisTitle: 'Power (dBm)',
    traces: [max, min, avg],
  };
}
