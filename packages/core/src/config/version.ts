/**
 * Version inference
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../utils/logger.js';
import { runCommand } from '../utils/exec.js';
import type { CommandRunner } from '../types/common.js';
import type { DeploymentProfile } from '../deployment/types.js';
import { DeploymentType } from '../deployment/types.js';

export const VERSION_FILES = ['VERSION', path.join('src', 'VERSION')];

function datestamp(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}${month}${day}`;
}

/**
 * Read the first non-empty version marker file under `targetDir`
 */
export async function readVersionFile(targetDir: string): Promise<string | null> {
  for (const relative of VERSION_FILES) {
    try {
      const content = (await fs.readFile(path.join(targetDir, relative), 'utf-8')).trim();
      if (content.length > 0) {
        return content;
      }
    } catch {
      // Not present, try the next one
    }
  }
  return null;
}

/**
 * Best known version of the installed tree. Always returns a non-empty string:
 * git short hash, then a VERSION file, then `file-YYYYMMDD`.
 */
export async function inferVersion(
  profile: Pick<DeploymentProfile, 'type' | 'targetDir'>,
  options: { runner?: CommandRunner; now?: () => Date } = {}
): Promise<string> {
  const runner = options.runner ?? runCommand;
  const now = options.now ?? (() => new Date());

  if (profile.type === DeploymentType.GIT) {
    const result = await runner('git', ['rev-parse', '--short', 'HEAD'], {
      cwd: profile.targetDir,
      timeoutMs: 10_000,
    });
    const hash = result.stdout.trim();
    if (result.success && hash.length > 0) {
      return hash;
    }
    logger.debug('Could not read git version, trying version files', { stderr: result.stderr.trim() });
  }

  const fromFile = await readVersionFile(profile.targetDir);
  if (fromFile) {
    return fromFile;
  }

  return `file-${datestamp(now())}`;
}
