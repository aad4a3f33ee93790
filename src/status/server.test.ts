import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import http from 'node:http';
import { renderStatusPage, startStatusServer } from './server.js';
import type { StatusServer } from './server.js';
import { ReadinessFlag } from '../bootstrap/readiness.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type Response = {
  status: number;
  contentType: string | undefined;
  text: string;
};

function makeRequest(port: number, path: string, method = 'GET'): Promise<Response> {
  return new Promise((resolve, reject) => {
    const req = http.request({ hostname: '127.0.0.1', port, path, method }, (res) => {
      const chunks: Buffer[] = [];
      res.on('data', (c: Buffer) => chunks.push(c));
      res.on('end', () => {
        resolve({
          status: res.statusCode ?? 0,
          contentType: res.headers['content-type'],
          text: Buffer.concat(chunks).toString('utf8'),
        });
      });
      res.on('error', reject);
    });
    req.on('error', reject);
    req.end();
  });
}

function mockLog() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// ---------------------------------------------------------------------------
// Page
// ---------------------------------------------------------------------------

describe('renderStatusPage', () => {
  it('reports starting until ready', () => {
    expect(renderStatusPage(false)).toContain('<p>Status: starting</p>');
    expect(renderStatusPage(true)).toContain('<p>Status: operational</p>');
  });
});

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

describe('startStatusServer', () => {
  let handle: StatusServer;
  let readiness: ReadinessFlag;
  let clock: number;
  const log = mockLog();

  beforeEach(async () => {
    readiness = new ReadinessFlag();
    clock = 1_000_000;
    handle = await startStatusServer({
      port: 0,
      host: '127.0.0.1',
      readiness,
      startedAt: 1_000_000,
      now: () => clock,
      log,
    });
  });

  afterEach(async () => {
    await handle.close();
  });

  it('binds a free port and logs it', () => {
    expect(handle.port).toBeGreaterThan(0);
    expect(log.info).toHaveBeenCalledWith({ port: handle.port, host: '127.0.0.1' }, 'status:server listening');
  });

  it('serves the HTML page while starting and after ready', async () => {
    const before = await makeRequest(handle.port, '/');
    expect(before.status).toBe(200);
    expect(before.contentType).toBe('text/html; charset=utf-8');
    expect(before.text).toContain('<h1>Bot is running!</h1>');
    expect(before.text).toContain('<p>Status: starting</p>');

    readiness.markReady();
    const after = await makeRequest(handle.port, '/');
    expect(after.text).toContain('<p>Status: operational</p>');
  });

  it('serves health JSON with uptime', async () => {
    clock = 1_000_000 + 61_500;
    const res = await makeRequest(handle.port, '/health');
    expect(res.status).toBe(200);
    expect(JSON.parse(res.text)).toEqual({ ok: true, ready: false, uptimeSeconds: 61 });
  });

  it('ignores the query string', async () => {
    const res = await makeRequest(handle.port, '/health?verbose=1');
    expect(res.status).toBe(200);
  });

  it('returns 404 for unknown paths', async () => {
    const res = await makeRequest(handle.port, '/admin');
    expect(res.status).toBe(404);
    expect(JSON.parse(res.text)).toEqual({ ok: false, message: 'Not found' });
  });

  it('returns 405 for other methods', async () => {
    const res = await makeRequest(handle.port, '/', 'POST');
    expect(res.status).toBe(405);
  });

  it('answers HEAD without a body', async () => {
    const res = await makeRequest(handle.port, '/', 'HEAD');
    expect(res.status).toBe(200);
    expect(res.text).toBe('');
  });
});

describe('startStatusServer listen errors', () => {
  it('rejects when the port is taken', async () => {
    const first = await startStatusServer({ port: 0, host: '127.0.0.1', readiness: new ReadinessFlag() });
    try {
      await expect(
        startStatusServer({ port: first.port, host: '127.0.0.1', readiness: new ReadinessFlag() }),
      ).rejects.toThrow(/EADDRINUSE/);
    } finally {
      await first.close();
    }
  });
});
