import express from 'express';
import request from 'supertest';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MaintenanceManager } from '../src/maintenance/manager.js';
import { createMaintenanceMiddleware, renderMaintenancePage } from '../src/maintenance/middleware.js';
import { makeTempDir, removeDir } from './helpers.js';

describe('createMaintenanceMiddleware', () => {
  let root: string;
  let maintenance: MaintenanceManager;

  beforeEach(async () => {
    root = await makeTempDir();
    maintenance = new MaintenanceManager({ appRoot: root, now: () => new Date('2026-03-01T10:00:00.000Z') });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  function app(trustProxyHeaders?: boolean) {
    const server = express();
    server.use(createMaintenanceMiddleware(maintenance, { trustProxyHeaders }));
    server.get('/', (_req, res) => {
      res.send('transcriber');
    });
    return server;
  }

  it('passes requests through while maintenance is off', async () => {
    const response = await request(app()).get('/').set('X-Forwarded-For', '203.0.113.7');

    expect(response.status).toBe(200);
    expect(response.text).toBe('transcriber');
  });

  it('answers 503 with the maintenance page for outside callers', async () => {
    await maintenance.enable({ title: 'Upgrading', message: 'Back in a moment', durationMinutes: 10 });

    const response = await request(app()).get('/').set('X-Forwarded-For', '203.0.113.7, 10.0.0.1');

    expect(response.status).toBe(503);
    expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(response.headers['cache-control']).toBe('no-cache, no-store, must-revalidate');
    expect(response.headers['pragma']).toBe('no-cache');
    expect(response.headers['retry-after']).toBe('120');
    expect(response.text).toContain('<h1>Upgrading</h1>');
    expect(response.text).toContain('<p>Back in a moment</p>');
    expect(response.text).toContain('Estimated completion: 2026-03-01T10:10:00.000Z');
  });

  it('lets allow-listed callers through', async () => {
    await maintenance.enable({ ipWhitelist: ['198.51.100.0/24'] });

    const viaRealIp = await request(app()).get('/').set('X-Real-IP', '198.51.100.20');
    const viaCloudflare = await request(app()).get('/').set('CF-Connecting-IP', '198.51.100.21');

    expect(viaRealIp.status).toBe(200);
    expect(viaCloudflare.status).toBe(200);
  });

  it('uses the socket address when proxy headers are not trusted', async () => {
    await maintenance.enable();

    const response = await request(app(false)).get('/').set('X-Forwarded-For', '203.0.113.7');

    expect(response.status).toBe(200);
  });

  it('lets local callers through without proxy headers', async () => {
    await maintenance.enable();

    const response = await request(app()).get('/');

    expect(response.status).toBe(200);
  });
});

describe('renderMaintenancePage', () => {
  it('escapes the configured text', () => {
    const html = renderMaintenancePage({ title: 'Down & out', message: '<script>alert(1)</script>', estimatedEnd: null });

    expect(html).toContain('<title>Down &amp; out</title>');
    expect(html).toContain('<p>&lt;script&gt;alert(1)&lt;/script&gt;</p>');
    expect(html).not.toContain('class="eta"');
  });
});
