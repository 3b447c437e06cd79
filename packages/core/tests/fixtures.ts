import fs from 'node:fs/promises';
import path from 'node:path';
import { DeploymentDetector } from '../src/deployment/detector.js';
import { DeploymentType, ServicePrimitive } from '../src/deployment/types.js';
import { createDefaultRecord, UpdateConfigStore } from '../src/config/store.js';
import type { UpdateConfigRecord } from '../src/config/types.js';
import type { CommandRunner } from '../src/types/common.js';

export const RAW_URL = 'https://raw.githubusercontent.com/acme/speech/main';

export interface RecordOptions {
  type?: DeploymentType;
  version?: string;
  primitive?: ServicePrimitive;
  repositoryUrl?: string;
}

/**
 * A valid record for a deployment rooted at `root`
 */
export function buildRecord(root: string, options: RecordOptions = {}): UpdateConfigRecord {
  return createDefaultRecord(
    {
      type: options.type ?? DeploymentType.FILE_DOWNLOAD,
      targetDir: root,
      serviceName: 'speech-appliance.service',
      servicePrimitive: options.primitive ?? ServicePrimitive.NONE,
      detectedAt: '2026-03-01T09:00:00.000Z',
    },
    options.version ?? '1.0.0',
    { url: options.repositoryUrl ?? 'https://github.com/acme/speech' }
  );
}

export async function writeRecord(configPath: string, record: unknown): Promise<void> {
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, JSON.stringify(record, null, 2), 'utf-8');
}

export async function readRecord(configPath: string): Promise<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(await fs.readFile(configPath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Not a JSON object: ${configPath}`);
  }
  return { ...parsed };
}

/**
 * Detector confined to `root`, with no service manager on the host
 */
export function isolatedDetector(root: string, now: () => Date): DeploymentDetector {
  return new DeploymentDetector({
    candidateRoots: [root],
    systemdRuntimeDir: path.join(root, '.no-systemd'),
    dockerEnvFile: path.join(root, '.no-dockerenv'),
    cwd: () => root,
    now,
  });
}

export async function openStore(
  root: string,
  configPath: string,
  now: () => Date,
  runner?: CommandRunner
): Promise<UpdateConfigStore> {
  const store = new UpdateConfigStore({ configPath, detector: isolatedDetector(root, now), runner, now });
  await store.loadOrCreate();
  return store;
}
