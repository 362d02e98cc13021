import express from 'express';
import cors from 'cors';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import type { ScanProgressMessage } from '@sweepscope/shared';
import { loadServerConfig } from './config.js';
import { RtlPowerRunner } from './scanner/rtl-power.js';
import { createSpectrumRouter } from './spectrum/routes.js';
import { SpectrumService } from './spectrum/service.js';

const config = loadServerConfig();
const app = express();
app.use(cors());
app.use(express.json());

const server = createServer(app);
const wss = new WebSocketServer({ server, path: '/ws' });

// Services
const runner = new RtlPowerRunner(config.rtlPowerPath);
const spectrum = new SpectrumService({ dataDir: config.dataDir, bandsPath: config.bandsPath, runner });

// Broadcast to all WS clients
function broadcast(data: unknown) {
  const msg = JSON.stringify(data);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) client.send(msg);
  });
}

runner.on('progress', (message: string) => {
  const event: ScanProgressMessage = { type: 'scan_progress', message, timestamp: Date.now() };
  broadcast(event);
});

// ============================================================================
// REST endpoints
// ============================================================================

app.get('/api/health', (_req, res) => {
  res.json({
    name: 'SweepScope',
    version: '0.1.0',
    uptime: process.uptime(),
    status: 'operational',
    dataDir: config.dataDir,
    bands: config.bandsPath,
  });
});

app.use('/api', createSpectrumRouter(spectrum, runner, config.scanDefaults));

wss.on('connection', (ws) => {
  ws.send(JSON.stringify({ type: 'scan_status', status: runner.getStatus() }));
});

server.listen(config.port, () => {
  console.log(`📊 SweepScope server listening on http://localhost:${config.port}`);
  console.log(`📊 Data directory: ${config.dataDir}`);
});
