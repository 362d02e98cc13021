// ============================================================================
// SweepScope rtl_power Scan Types
// ============================================================================

export interface RtlPowerScanConfig {
  freqStart: number;    // Hz
  freqEnd: number;      // Hz
  step: number;         // Hz
  integration: number;  // seconds
  gain: number;         // dB, 0 = auto
  crop: string;         // e.g. "20%"
}

export interface ScanStatus {
  running: boolean;
  startedAt: number | null;
  finishedAt: number | null;
  linesRead: number;
  binCount: number;
  lastError: string | null;
  config: RtlPowerScanConfig | null;
}

export interface ScanProgressMessage {
  type: 'scan_progress';
  message: string;
  timestamp: number;
}
