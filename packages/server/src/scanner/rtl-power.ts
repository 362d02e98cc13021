// ============================================================================
// SweepScope rtl_power Scan Runner
// ============================================================================
import { EventEmitter } from 'events';
import { spawn } from 'child_process';
import type { Readable } from 'stream';
import type { BinRecord, RtlPowerScanConfig, ScanStatus } from '@sweepscope/shared';
import { NotFoundError, ScanBusyError, ScanError } from '../errors.js';
import { BinAccumulator } from '../spectrum/parser.js';

// rtl_power reports these on stderr while still exiting 0
const KNOWN_ERRORS = [
  'No supported devices found.',
  'usb_claim_interface',
  'stdbuf:',
];

/** The parts of a child process the runner relies on. */
export interface ScanProcess extends EventEmitter {
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
}

export type ScanSpawner = (command: string, args: readonly string[]) => ScanProcess;

const defaultSpawner: ScanSpawner = (command, args) => spawn(command, args);

export function buildRtlPowerArgs(config: RtlPowerScanConfig): string[] {
  return [
    '-f', `${config.freqStart}:${config.freqEnd}:${config.step}`,
    '-i', String(config.integration),
    '-g', String(config.gain),
    '-c', config.crop,
    '-1',
    '-',
  ];
}

export function findKnownError(stderr: string): string | null {
  for (const line of stderr.split(/\r?\n/)) {
    const text = line.trim().toLowerCase();
    if (!text) continue;
    if (KNOWN_ERRORS.some((known) => text.includes(known.toLowerCase()))) return line.trim();
  }
  return null;
}

/**
 * Runs a single rtl_power pass and streams its stdout rows into a
 * {@link BinAccumulator} as they arrive.
 *
 * Events: `progress` (message), `started` (config), `finished` (bin count),
 * `failed` (error).
 */
export class RtlPowerRunner extends EventEmitter {
  private process: ScanProcess | null = null;
  private status: ScanStatus = {
    running: false, startedAt: null, finishedAt: null,
    linesRead: 0, binCount: 0, lastError: null, config: null,
  };

  constructor(
    private readonly binary = 'rtl_power',
    private readonly spawner: ScanSpawner = defaultSpawner,
  ) {
    super();
  }

  getStatus(): ScanStatus {
    return { ...this.status };
  }

  run(config: RtlPowerScanConfig): Promise<BinRecord[]> {
    if (this.process) {
      return Promise.reject(new ScanBusyError('A scan is already running'));
    }

    const args = buildRtlPowerArgs(config);
    this.status = {
      running: true, startedAt: Date.now(), finishedAt: null,
      linesRead: 0, binCount: 0, lastError: null, config,
    };
    this.progress(`Running: ${[this.binary, ...args].join(' ')}`);

    return new Promise<BinRecord[]>((resolve, reject) => {
      const parser = new BinAccumulator();
      let buffer = '';
      let stderr = '';
      let stdoutEnded = false;
      let exited = false;
      let settled = false;

      const feed = (line: string) => {
        const trimmed = line.replace(/\r$/, '');
        if (!trimmed) return;
        parser.addLine(trimmed);
        this.status.linesRead++;
      };

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        this.process = null;
        this.status.running = false;
        this.status.finishedAt = Date.now();
        this.status.lastError = err.message;
        console.error(`📡 rtl_power failed: ${err.message}`);
        this.emit('failed', err);
        reject(err);
      };

      const finish = () => {
        if (settled || !stdoutEnded || !exited) return;
        if (buffer) feed(buffer);
        buffer = '';

        const known = findKnownError(stderr);
        if (known) {
          fail(new ScanError(`rtl_power error: ${known}`));
          return;
        }

        settled = true;
        const bins = parser.finalize();
        this.process = null;
        this.status.running = false;
        this.status.finishedAt = Date.now();
        this.status.binCount = bins.length;
        this.progress('rtl_power completed');
        this.emit('finished', bins.length);
        resolve(bins);
      };

      let proc: ScanProcess;
      try {
        proc = this.spawner(this.binary, args);
      } catch (err) {
        fail(err instanceof Error ? err : new Error(String(err)));
        return;
      }
      this.process = proc;

      proc.stdout.on('data', (data: Buffer | string) => {
        buffer += data.toString();
        const lines = buffer.split('\n');
        buffer = lines.pop() || '';
        for (const line of lines) feed(line);
      });
      proc.stdout.on('end', () => {
        stdoutEnded = true;
        finish();
      });

      proc.stderr.on('data', (data: Buffer | string) => {
        stderr += data.toString();
      });

      proc.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'ENOENT') {
          fail(new NotFoundError(`${this.binary} not found. Ensure it is installed and on your $PATH.`));
        } else {
          fail(new ScanError(err.message));
        }
      });

      proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        exited = true;
        if (code !== 0 && code !== null) {
          console.log(`📡 rtl_power exited (code=${code}, signal=${signal})`);
        }
        finish();
      });

      this.emit('started', config);
    });
  }

  stop(): void {
    if (!this.process) return;
    try {
      this.process.kill('SIGTERM');
    } catch (err) {
      console.error('📡 Failed to stop rtl_power:', err);
    }
  }

  private progress(message: string) {
    console.log(`📡 ${message}`);
    this.emit('progress', message);
  }
}
