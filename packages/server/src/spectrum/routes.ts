/**
 * Spectrum REST API Routes
 */
import { Router, type Response } from 'express';
import { errorMessage, errorStatus } from '../errors.js';
import { mergeScanConfig } from '../config.js';
import type { RtlPowerScanConfig } from '@sweepscope/shared';
import type { RtlPowerRunner } from '../scanner/rtl-power.js';
import { VIEW_MODES, isViewMode, type SpectrumService } from './service.js';

function sendError(res: Response, err: unknown) {
  const status = errorStatus(err);
  if (status >= 500) console.error('📊 Request failed:', err);
  res.status(status).json({ error: errorMessage(err) });
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') throw new Error(`${field} must be a string`);
  return value;
}

function requiredString(value: unknown, field: string): string {
  const text = optionalString(value, field);
  if (!text) throw new Error(`${field} required`);
  return text;
}

function fileList(body: Record<string, unknown>): string[] {
  if (Array.isArray(body.files)) {
    return body.files.map((f: unknown, i) => requiredString(f, `files[${i}]`));
  }
  return [requiredString(body.file, 'file')];
}

function bodyOf(req: { body: unknown }): Record<string, unknown> {
  const body = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return {};
  const entries: [string, unknown][] = Object.entries(body);
  return Object.fromEntries(entries);
}

export function createSpectrumRouter(
  service: SpectrumService,
  runner: RtlPowerRunner,
  scanDefaults: RtlPowerScanConfig,
): Router {
  const router = Router();

  router.get('/spectrum/files', (_req, res) => {
    res.json(service.listFiles());
  });

  router.post('/spectrum/view', async (req, res) => {
    try {
      const body = bodyOf(req);
      const mode = body.mode ?? 'average';
      if (!isViewMode(mode)) {
        throw new Error(`mode must be one of ${VIEW_MODES.join(', ')}`);
      }
      const result = await service.view({
        files: fileList(body),
        mode,
        title: optionalString(body.title, 'title'),
        bands: optionalString(body.bands, 'bands'),
      });
      res.json(result);
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/spectrum/subtract', async (req, res) => {
    try {
      const body = bodyOf(req);
      const result = await service.subtract({
        signal: requiredString(body.signal, 'signal'),
        baseline: requiredString(body.baseline, 'baseline'),
        output: optionalString(body.output, 'output'),
        title: optionalString(body.title, 'title'),
      });
      res.json(result);
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/spectrum/export', async (req, res) => {
    try {
      const body = bodyOf(req);
      res.json(await service.exportCsv(
        requiredString(body.input, 'input'),
        requiredString(body.output, 'output'),
      ));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/bands/lookup', (req, res) => {
    const frequency = Number(req.query.frequency);
    if (!req.query.frequency || !Number.isFinite(frequency)) {
      return res.status(400).json({ error: 'frequency parameter required (Hz)' });
    }
    res.json({ frequency, band: service.lookup(frequency) });
  });

  router.post('/scan/run', async (req, res) => {
    try {
      const body = bodyOf(req);
      const config = mergeScanConfig(scanDefaults, body.config);
      res.json(await service.runScan(config, optionalString(body.output, 'output')));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post('/scan/stop', (_req, res) => {
    runner.stop();
    res.json({ ok: true, status: runner.getStatus() });
  });

  router.get('/scan/status', (_req, res) => {
    res.json(runner.getStatus());
  });

  return router;
}
