import http from 'node:http';

import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

import { logger } from './logger';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const actionAttempts = new Counter({
  name: 'hook_action_attempt_total',
  help: 'Number of hook handler invocations',
  labelNames: ['action_kind', 'scheduled'],
  registers: [registry],
});

export const actionFailures = new Counter({
  name: 'hook_action_failure_total',
  help: 'Number of hook handler invocations that did not succeed',
  labelNames: ['action_kind', 'reason'],
  registers: [registry],
});

export const actionLatency = new Histogram({
  name: 'hook_action_duration_seconds',
  help: 'Hook handler latency in seconds',
  labelNames: ['action_kind'],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 5, 30],
  registers: [registry],
});

export const actionRetries = new Counter({
  name: 'hook_action_retry_total',
  help: 'Number of retries armed for scheduled actions',
  labelNames: ['action_kind'],
  registers: [registry],
});

export const scheduledActionsFinished = new Counter({
  name: 'hook_scheduled_action_finished_total',
  help: 'Scheduled actions that reached a terminal state',
  labelNames: ['status'],
  registers: [registry],
});

export interface MetricsServerOptions {
  host?: string;
  /** Extra fields for the `/healthz` body, read on every request. */
  health?: () => Record<string, unknown>;
}

export interface MetricsServerHandle {
  server: http.Server;
  /** Bound port, which differs from the requested one when that was 0. */
  port: number;
  close: () => Promise<void>;
}

const sendJson = (res: http.ServerResponse, status: number, body: Record<string, unknown>) => {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
};

/** Serves `/metrics` in the Prometheus text format and a JSON `/healthz`. */
export const startMetricsServer = async (
  port: number,
  { host, health }: MetricsServerOptions = {},
): Promise<MetricsServerHandle> => {
  const server = http.createServer(async (req, res) => {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');
    if (req.method !== 'GET') {
      res.writeHead(405, { Allow: 'GET' });
      res.end();
      return;
    }
    try {
      if (pathname === '/healthz') {
        sendJson(res, 200, { status: 'ok', service: 'hook-orchestrator', ...health?.() });
        return;
      }
      if (pathname === '/metrics') {
        const metrics = await registry.metrics();
        res.writeHead(200, { 'Content-Type': registry.contentType });
        res.end(metrics);
        return;
      }
      sendJson(res, 404, { error: `No route for ${pathname}` });
    } catch (error) {
      logger.error({ err: error, pathname }, 'Metrics request failed');
      sendJson(res, 500, { error: 'metrics collection failed' });
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
  const address = server.address();
  const boundPort = typeof address === 'object' && address !== null ? address.port : port;
  logger.info({ port: boundPort }, 'Metrics server listening');

  const close = () =>
    new Promise<void>((resolve) => {
      if (!server.listening) {
        resolve();
        return;
      }
      server.close((error) => {
        if (error) {
          logger.warn({ err: error }, 'Failed to close metrics server gracefully');
        }
        resolve();
      });
    });

  return { server, port: boundPort, close };
};
