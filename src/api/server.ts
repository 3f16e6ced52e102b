/**
 * Read API over a running monitor.
 *
 * GET routes serve the latest published report and never start collection.
 * POST /api/cycle runs one cycle on demand, one at a time.
 */

import express, { type ErrorRequestHandler, type Express, type Response } from 'express';
import type { Server } from 'http';
import type { AlertState } from '../alerts/state-tracker.js';
import { log } from '../logger.js';
import { nodeToJSON, reportToJSON } from '../monitor/report.js';
import type { ClusterReport } from '../types.js';

/** The parts of HealthMonitor the API reads */
export interface MonitorView {
  getLatestReport(): ClusterReport | null;
  getAlertStates(): AlertState[];
  runCycle(): Promise<ClusterReport>;
}

export interface ApiOptions {
  version: string;
  now?: () => number;
}

function isoOrNull(at: number | null): string | null {
  return at === null ? null : new Date(at).toISOString();
}

function alertToJSON(state: AlertState): Record<string, unknown> {
  return {
    ...state,
    lastTransitionAt: isoOrNull(state.lastTransitionAt),
    lastNotifiedAt: isoOrNull(state.lastNotifiedAt),
  };
}

function noReport(res: Response): void {
  res.status(503).json({ error: 'No health check has been performed yet' });
}

export function createApiServer(monitor: MonitorView, options: ApiOptions): Express {
  const now = options.now ?? Date.now;
  const app = express();
  app.disable('x-powered-by');

  let running = false;

  app.get(['/health', '/healthz'], (_req, res) => {
    res.json({ status: 'healthy', timestamp: new Date(now()).toISOString(), version: options.version });
  });

  app.get('/api/health', (_req, res) => {
    const report = monitor.getLatestReport();
    if (!report) return noReport(res);
    res.json(reportToJSON(report));
  });

  app.get('/api/health/summary', (_req, res) => {
    const report = monitor.getLatestReport();
    if (!report) {
      res.json({ status: 'unknown', message: 'No health check has been performed yet' });
      return;
    }
    res.json({
      status: report.severity,
      cycle: report.cycle,
      timestamp: report.timestamp.toISOString(),
      durationMs: report.durationMs,
      nodes: report.summary,
      alerts: monitor.getAlertStates().filter(s => s.phase !== 'normal').length,
    });
  });

  app.get('/api/node/:name', (req, res) => {
    const report = monitor.getLatestReport();
    if (!report) return noReport(res);
    const node = report.nodes.find(n => n.name === req.params.name);
    if (!node) {
      res.status(404).json({ error: `Node not found: ${req.params.name}` });
      return;
    }
    res.json(nodeToJSON(node));
  });

  app.get('/api/alerts', (req, res) => {
    const all = req.query.all === 'true' || req.query.all === '1';
    const states = monitor.getAlertStates().filter(s => all || s.phase !== 'normal');
    res.json({ alerts: states.map(alertToJSON) });
  });

  const runCycle = async (res: Response): Promise<void> => {
    if (running) {
      res.status(409).json({ error: 'A check cycle is already running' });
      return;
    }
    running = true;
    try {
      const report = await monitor.runCycle();
      res.json(reportToJSON(report));
    } finally {
      running = false;
    }
  };

  app.post('/api/cycle', (_req, res, next) => {
    runCycle(res).catch(next);
  });

  app.use((req, res) => {
    res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
  });

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    log(`[API] ${req.method} ${req.path} failed: ${err instanceof Error ? err.message : String(err)}`, 'error');
    res.status(500).json({ error: 'Internal server error' });
  };
  app.use(onError);

  return app;
}

/** Listen on host:port; resolves once the socket is bound. */
export function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      server.off('error', reject);
      log(`[API] Listening on http://${host}:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}
