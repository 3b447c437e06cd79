import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MaintenanceManager, MAINTENANCE_CONFIG_FILE, MAINTENANCE_MARKER_FILE } from '../src/maintenance/manager.js';
import { DEFAULT_MAINTENANCE_MESSAGE } from '../src/maintenance/schema.js';
import { UpdateErrorCode } from '../src/utils/errors.js';
import { fileExists, makeTempDir, readFile, removeDir, writeFile } from './helpers.js';

const STARTED = new Date('2026-03-01T10:00:00.000Z');

describe('MaintenanceManager', () => {
  let root: string;
  let clock: Date;
  let maintenance: MaintenanceManager;

  beforeEach(async () => {
    root = await makeTempDir();
    clock = STARTED;
    maintenance = new MaintenanceManager({ appRoot: root, now: () => clock, pid: 4242 });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('is inactive by default', async () => {
    expect(maintenance.isActive()).toBe(false);

    const status = await maintenance.status();
    expect(status.active).toBe(false);
    expect(status.enabled).toBe(false);
    expect(status.message).toBe(DEFAULT_MAINTENANCE_MESSAGE);
    expect(status.ipWhitelist).toEqual(['127.0.0.1', '::1', 'localhost']);
  });

  it('writes the config and the marker when enabled', async () => {
    const result = await maintenance.enable({ message: 'Upgrading models', durationMinutes: 30, autoMode: true });

    expect(result.success).toBe(true);
    expect(result.message).toBe('Maintenance mode enabled');
    expect(maintenance.isActive()).toBe(true);

    const marker: unknown = JSON.parse(await readFile(root, MAINTENANCE_MARKER_FILE));
    expect(marker).toEqual({ enabled_at: STARTED.toISOString(), auto_mode: true, pid: 4242 });

    const config: unknown = JSON.parse(await readFile(root, MAINTENANCE_CONFIG_FILE));
    expect(config).toMatchObject({
      enabled: true,
      auto_mode: true,
      message: 'Upgrading models',
      started_at: '2026-03-01T10:00:00.000Z',
      estimated_end: '2026-03-01T10:30:00.000Z',
    });
  });

  it('reports how long maintenance has been running', async () => {
    await maintenance.enable();
    clock = new Date(STARTED.getTime() + 12 * 60_000);

    const status = await maintenance.status();

    expect(status.active).toBe(true);
    expect(status.durationMinutes).toBe(12);
    expect(status.estimatedEnd).toBeNull();
    expect(status.marker).toEqual({ enabled_at: STARTED.toISOString(), auto_mode: false, pid: 4242 });
  });

  it('removes the marker and clears the timing fields when disabled', async () => {
    await maintenance.enable({ durationMinutes: 5 });

    const result = await maintenance.disable();

    expect(result.success).toBe(true);
    expect(result.message).toBe('Maintenance mode disabled');
    expect(maintenance.isActive()).toBe(false);
    expect(await fileExists(path.join(root, MAINTENANCE_MARKER_FILE))).toBe(false);
    expect(result.status).toMatchObject({ active: false, enabled: false, startedAt: null, estimatedEnd: null });
  });

  it('treats the marker as the source of truth and resyncs the config', async () => {
    await writeFile(
      root,
      MAINTENANCE_MARKER_FILE,
      JSON.stringify({ enabled_at: STARTED.toISOString(), auto_mode: false, pid: 1 })
    );

    const status = await maintenance.status();

    expect(status.enabled).toBe(true);
    const config: unknown = JSON.parse(await readFile(root, MAINTENANCE_CONFIG_FILE));
    expect(config).toMatchObject({ enabled: true });
  });

  it('clears a stale enabled flag when the marker is gone', async () => {
    await maintenance.enable();
    await fs.rm(path.join(root, MAINTENANCE_MARKER_FILE));

    const status = await maintenance.status();

    expect(status).toMatchObject({ active: false, enabled: false, startedAt: null });
  });

  it('gates only requests from addresses that are not allowed', async () => {
    expect(maintenance.isMaintenanceRequest('203.0.113.7')).toBe(false);

    await maintenance.enable({ ipWhitelist: ['192.168.1.10', '10.0.0.0/8'] });

    expect(maintenance.isMaintenanceRequest('203.0.113.7')).toBe(true);
    expect(maintenance.isMaintenanceRequest('192.168.1.10')).toBe(false);
    expect(maintenance.isMaintenanceRequest('10.20.30.40')).toBe(false);
    expect(maintenance.isMaintenanceRequest('127.0.0.1')).toBe(false);
    expect(maintenance.isMaintenanceRequest('::ffff:127.0.0.1')).toBe(false);
  });

  it('adds and removes allow-list entries', async () => {
    const added = await maintenance.addIpToWhitelist(' 192.168.1.10 ');
    expect(added.success).toBe(true);
    expect(added.message).toBe('Added 192.168.1.10 to whitelist');
    expect(added.status?.ipWhitelist).toEqual(['127.0.0.1', '::1', 'localhost', '192.168.1.10']);

    const duplicate = await maintenance.addIpToWhitelist('192.168.1.10');
    expect(duplicate.success).toBe(false);
    expect(duplicate.message).toBe('192.168.1.10 is already whitelisted');

    const removed = await maintenance.removeIpFromWhitelist('192.168.1.10');
    expect(removed.message).toBe('Removed 192.168.1.10 from whitelist');
    expect(removed.status?.ipWhitelist).toEqual(['127.0.0.1', '::1', 'localhost']);

    const missing = await maintenance.removeIpFromWhitelist('10.9.9.9');
    expect(missing.success).toBe(false);
    expect(missing.message).toBe('10.9.9.9 is not whitelisted');
  });

  it('rejects entries that are not addresses or ranges', async () => {
    const result = await maintenance.addIpToWhitelist('not-an-ip');

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe(UpdateErrorCode.CONFIG_INCONSISTENCY);
    expect(await fileExists(path.join(root, MAINTENANCE_CONFIG_FILE))).toBe(false);
  });

  it('serializes concurrent edits', async () => {
    await Promise.all([
      maintenance.enable({ message: 'Back soon' }),
      maintenance.addIpToWhitelist('198.51.100.1'),
      maintenance.addIpToWhitelist('198.51.100.2'),
    ]);

    const status = await maintenance.status();
    expect(status.active).toBe(true);
    expect(status.message).toBe('Back soon');
    expect(status.ipWhitelist).toEqual(['127.0.0.1', '::1', 'localhost', '198.51.100.1', '198.51.100.2']);
  });

  it('exposes the page details', async () => {
    await maintenance.enable({ title: 'Down for upgrades', message: 'Installing a new model', durationMinutes: 15 });

    expect(maintenance.pageInfo()).toEqual({
      title: 'Down for upgrades',
      message: 'Installing a new model',
      estimatedEnd: '2026-03-01T10:15:00.000Z',
    });
  });
});
