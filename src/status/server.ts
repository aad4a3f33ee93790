/**
 * Status server
 *
 * Serves the process status while the bot starts and runs:
 *
 *   GET /        HTML page, "operational" once bootstrap finished, "starting" before
 *   GET /health  JSON `{ ok, ready, uptimeSeconds }`
 *
 * Started before the bot logs in and kept up for the whole process lifetime,
 * so hosting platforms see a live port even while bootstrap waits on retries.
 */

import http from 'node:http';
import type { LoggerLike } from '../logging/logger-like.js';
import type { ReadinessFlag } from '../bootstrap/readiness.js';

export type StatusServerOptions = {
  /** Port to listen on. 0 picks a free port. */
  port: number;
  /** Host to bind to. Default: '0.0.0.0'. */
  host?: string;
  readiness: Pick<ReadinessFlag, 'isReady'>;
  /** `Date.now()` at process start, for uptime. */
  startedAt?: number;
  now?: () => number;
  log?: LoggerLike;
};

export type StatusServer = {
  /** The underlying Node.js HTTP server. */
  server: http.Server;
  /** The port actually bound (differs from the option when it was 0). */
  port: number;
  close(): Promise<void>;
};

export function renderStatusPage(ready: boolean): string {
  const state = ready ? 'operational' : 'starting';
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head><meta charset="utf-8"><title>Bot status</title></head>',
    '<body>',
    '<h1>Bot is running!</h1>',
    `<p>Status: ${state}</p>`,
    '</body>',
    '</html>',
  ].join('\n');
}

function respond(res: http.ServerResponse, status: number, contentType: string, body: string, headOnly: boolean): void {
  res.writeHead(status, { 'Content-Type': contentType, 'Cache-Control': 'no-store' });
  res.end(headOnly ? undefined : body);
}

export async function startStatusServer(opts: StatusServerOptions): Promise<StatusServer> {
  const { port, host = '0.0.0.0', readiness, log } = opts;
  const now = opts.now ?? Date.now;
  const startedAt = opts.startedAt ?? now();

  const server = http.createServer((req, res) => {
    const pathname = (req.url ?? '/').split('?')[0];
    const known = pathname === '/' || pathname === '/health';
    if (!known) {
      respond(res, 404, 'application/json', JSON.stringify({ ok: false, message: 'Not found' }), false);
      return;
    }
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      res.setHeader('Allow', 'GET, HEAD');
      respond(res, 405, 'application/json', JSON.stringify({ ok: false, message: 'Method not allowed' }), false);
      return;
    }

    const headOnly = req.method === 'HEAD';
    const ready = readiness.isReady();
    if (pathname === '/health') {
      const uptimeSeconds = Math.max(0, Math.floor((now() - startedAt) / 1000));
      respond(res, 200, 'application/json', JSON.stringify({ ok: true, ready, uptimeSeconds }), headOnly);
      return;
    }
    respond(res, 200, 'text/html; charset=utf-8', renderStatusPage(ready), headOnly);
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => resolve());
  });

  const address = server.address();
  const boundPort = address !== null && typeof address === 'object' ? address.port : port;
  log?.info({ port: boundPort, host }, 'status:server listening');

  return {
    server,
    port: boundPort,
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}
