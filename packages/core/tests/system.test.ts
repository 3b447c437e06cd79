import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createUpdateSystem } from '../src/system.js';
import { DeploymentType } from '../src/deployment/types.js';
import { OperatingSystem } from '../src/types/common.js';
import { fakeHttp, fakeRunner, makeTempDir, removeDir, writeFile } from './helpers.js';
import { isolatedDetector, readRecord } from './fixtures.js';

describe('createUpdateSystem', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('creates the config and wires a file-download deployment', async () => {
    await writeFile(root, 'src/main.py', 'print("hi")');
    await writeFile(root, 'VERSION', '1.0.0');
    const now = () => new Date(2026, 2, 1, 9, 0, 0);
    const configPath = path.join(root, 'update-config.json');

    const system = await createUpdateSystem({
      env: { APPLIANCE_REPOSITORY_URL: 'https://github.com/acme/speech' },
      configPath,
      detector: isolatedDetector(root, now),
      runner: fakeRunner(() => undefined),
      http: fakeHttp(() => '1.1.0'),
      os: OperatingSystem.LINUX,
      now,
    });

    expect(system.config.getConfigPath()).toBe(configPath);
    expect(system.config.deploymentType()).toBe(DeploymentType.FILE_DOWNLOAD);
    expect(system.git).toBeUndefined();
    expect(system.backups.getBackupDir()).toBe(path.join(root, '.update_backups'));
    expect(system.maintenance.getMarkerPath()).toBe(path.join(root, '.maintenance_mode'));
    expect((await readRecord(configPath)).repository).toMatchObject({
      raw_url: 'https://raw.githubusercontent.com/acme/speech/main',
    });

    const check = await system.updater.checkForUpdates();
    expect(check).toMatchObject({ status: 'success', updateAvailable: true, latestVersion: '1.1.0' });
  });

  it('adds a git monitor for git deployments', async () => {
    await writeFile(root, '.git/HEAD', 'ref: refs/heads/main');
    const now = () => new Date(2026, 2, 1, 9, 0, 0);

    const system = await createUpdateSystem({
      env: {},
      configPath: path.join(root, 'update-config.json'),
      detector: isolatedDetector(root, now),
      runner: fakeRunner(() => undefined),
      http: fakeHttp(() => {
        throw new Error('offline');
      }),
      os: OperatingSystem.LINUX,
      now,
    });

    expect(system.config.updateMethod()).toBe('git_pull');
    expect(system.git?.getRepoPath()).toBe(root);
    expect(system.git?.getBranch()).toBe('main');
  });
});
