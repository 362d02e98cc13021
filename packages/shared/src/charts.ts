// Chart payloads handed to the renderer. Frequencies in Hz, power in dBm.

export interface LineTrace {
  name: string;
  x: number[];
  y: number[];
  hoverText: string[];
  color?: string;
  fillToPrevious?: boolean;
}

export interface SpectrumChart {
  kind: 'spectrum';
  title: string;
  xAxisTitle: string;
  yAxisTitle: string;
  traces: LineTrace[];
}

export interface WaterfallChart {
  kind: 'waterfall';
  title: string;
  frequencies: number[];
  timestamps: string[];
  z: (number | null)[][];
  colorscale: [number, string][];
}

export interface EnvelopeChart {
  kind: 'envelope';
  title: string;
  xAxisTitle: string;
  yAxisTitle: string;
  traces: [LineTrace, LineTrace, LineTrace]; // max, min, avg
}

export type ChartPayload = SpectrumChart | WaterfallChart | EnvelopeChart;
