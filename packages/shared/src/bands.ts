// ============================================================================
// SweepScope Frequency Band Allocation Types
// ============================================================================

/** A band or sub-band allocation, half-open `[startHz, endHz)`. */
export interface BandEntry {
  startHz: number;
  endHz: number;
  widthKhz: number;
  usage: string;
  primaryService: string;
}

/** Bands sorted by `startHz` (wider first on ties), with a parallel `starts` index. */
export interface BandTable {
  bands: BandEntry[];
  starts: number[];
}

export type BandLookup = (freqHz: number) => BandEntry | undefined;
