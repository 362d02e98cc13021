// ============================================================================
// SweepScope Spectrum Data Types
// ============================================================================

/**
 * One frequency bin decoded from an rtl_power CSV row.
 *
 * The `*Raw` fields keep the source text so a record can be written back
 * byte-for-byte. `frequencyEndRaw` and `binSizeRaw` both hold the step column.
 */
export interface BinRecord {
  date: string;
  time: string;
  frequencyStartRaw: string;   // merge/lookup key
  frequencyStartHz: number;    // integer Hz, used for ordering
  frequencyEndRaw: string;
  binSizeRaw: string;
  numSamplesRaw: string;
  dbmAverage: number;          // valid once finalized
  dbmTotal: number;            // running sum while accumulating
  dbmCount: number;
}

/** One scan pass, labelled `"{date} {time}"` of its first row. */
export interface Sweep {
  label: string;
  bins: BinRecord[];
}

export interface EnvelopeSeries {
  min: BinRecord[];
  max: BinRecord[];
  avg: BinRecord[];
}

export type ViewMode = 'average' | 'waterfall' | 'peak' | 'envelope';

/** A named series for overlay charts. */
export interface SpectrumDataset {
  name: string;
  bins: BinRecord[];
}
