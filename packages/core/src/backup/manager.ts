/**
 * Backup Manager
 * Creates, lists, restores and prunes backup slots
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';
import { UpdateErrorCode, describeError, toUpdateError } from '../utils/errors.js';
import { resolveInside } from '../utils/paths.js';
import { DEFAULT_KEEP_BACKUPS } from '../config/schema.js';
import type {
  BackupManagerOptions,
  BackupMetadata,
  BackupSlot,
  CreateBackupOptions,
  RollbackResult,
} from './types.js';

export const BACKUP_PREFIX = 'backup_';
export const BACKUP_METADATA_FILE = '.backup-meta.json';

const SLOT_NAME_PATTERN = /^backup_\d{8}_\d{6}(_\d+)?$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `backup_YYYYMMDD_HHMMSS` in local time
 */
export function formatSlotName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${BACKUP_PREFIX}${day}_${time}`;
}

export function isValidSlotName(name: string): boolean {
  return SLOT_NAME_PATTERN.test(name);
}

/**
 * Order slot names by timestamp, then by numeric collision suffix (`_9` before `_10`)
 */
export function compareSlotNames(a: string, b: string): number {
  const [baseA, suffixA] = splitSlotName(a);
  const [baseB, suffixB] = splitSlotName(b);
  return baseA.localeCompare(baseB) || suffixA - suffixB;
}

function splitSlotName(name: string): [string, number] {
  const match = /^(backup_\d{8}_\d{6})_(\d+)$/.exec(name);
  if (!match?.[1] || !match[2]) {
    return [name, 0];
  }
  return [match[1], Number.parseInt(match[2], 10)];
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
}

async function measure(target: string): Promise<number> {
  const stats = await fs.lstat(target);
  if (!stats.isDirectory()) {
    return stats.size;
  }
  const entries = await fs.readdir(target);
  let total = 0;
  for (const entry of entries) {
    total += await measure(path.join(target, entry));
  }
  return total;
}

function isMetadata(value: unknown): value is BackupMetadata {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const files: unknown = Reflect.get(value, 'files');
  return Array.isArray(files) && files.every((entry) => typeof entry === 'string');
}

/**
 * Backup Manager class
 */
export class BackupManager {
  private readonly rootDir: string;
  private readonly backupDir: string;
  private readonly keepCount: number;
  private readonly now: () => Date;
  private readonly mutex = new Mutex();

  constructor(options: BackupManagerOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.backupDir = path.resolve(options.rootDir, options.backupDir);
    this.keepCount = options.keepCount ?? DEFAULT_KEEP_BACKUPS;
    this.now = options.now ?? (() => new Date());
  }

  public getBackupDir(): string {
    return this.backupDir;
  }

  /**
   * Copy every existing path in `files` (relative to the deployment root) into a
   * new slot. Missing sources are skipped; a failed copy removes the partial slot.
   */
  public async createBackup(files: readonly string[], options: CreateBackupOptions = {}): Promise<BackupSlot> {
    return this.mutex.runExclusive(async () => {
      const createdAt = this.now();
      const slotPath = await this.allocateSlot(createdAt);
      const name = path.basename(slotPath);
      const copied: string[] = [];
      const skipped: string[] = [];

      try {
        for (const relative of files) {
          const source = resolveInside(this.rootDir, relative);
          if (!source) {
            logger.warn('Skipping backup path outside the deployment root', { path: relative });
            skipped.push(relative);
            continue;
          }
          if (!(await pathExists(source))) {
            logger.debug('Skipping missing backup path', { path: relative });
            skipped.push(relative);
            continue;
          }

          const destination = path.join(slotPath, path.relative(this.rootDir, source));
          await fs.mkdir(path.dirname(destination), { recursive: true });
          await fs.cp(source, destination, { recursive: true, preserveTimestamps: true });
          copied.push(relative);
        }

        const metadata: BackupMetadata = {
          created_at: createdAt.toISOString(),
          version: options.version ?? null,
          files: copied,
          skipped,
        };
        await fs.writeFile(path.join(slotPath, BACKUP_METADATA_FILE), JSON.stringify(metadata, null, 2), 'utf-8');
        // Ordering is by mtime; pin it to the creation time rather than the last write
        await fs.utimes(slotPath, createdAt, createdAt);
      } catch (error) {
        await fs.rm(slotPath, { recursive: true, force: true }).catch((cleanupError: unknown) => {
          logger.warn('Failed to remove partial backup slot', { slot: name, error: describeError(cleanupError) });
        });
        const wrapped = toUpdateError(error, UpdateErrorCode.IO_FAILURE);
        logger.error('Backup failed', { slot: name, code: wrapped.code, error: wrapped.message });
        throw wrapped;
      }

      const sizeBytes = await measure(slotPath);
      logger.info('Backup created', { slot: name, files: copied.length, skipped: skipped.length, sizeBytes });
      return {
        name,
        path: slotPath,
        createdAt,
        sizeBytes,
        version: options.version,
        files: copied,
      };
    });
  }

  /**
   * Slots, newest first; entries that cannot be read are left out
   */
  public async listBackups(): Promise<BackupSlot[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.backupDir);
    } catch (error) {
      if (toUpdateError(error).code !== UpdateErrorCode.NOT_FOUND) {
        logger.warn('Could not read backup directory', { dir: this.backupDir, error: describeError(error) });
      }
      return [];
    }

    const slots: BackupSlot[] = [];
    for (const name of entries) {
      if (!name.startsWith(BACKUP_PREFIX)) {
        continue;
      }
      const slotPath = path.join(this.backupDir, name);
      try {
        const stats = await fs.stat(slotPath);
        if (!stats.isDirectory()) {
          continue;
        }
        const metadata = await this.readMetadata(slotPath);
        slots.push({
          name,
          path: slotPath,
          createdAt: stats.mtime,
          sizeBytes: await measure(slotPath),
          version: metadata?.version ?? undefined,
          files: metadata?.files,
        });
      } catch (error) {
        logger.warn('Skipping unreadable backup slot', { slot: name, error: describeError(error) });
      }
    }

    return slots.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || compareSlotNames(b.name, a.name));
  }

  /**
   * Most recent slot, if any
   */
  public async latestBackup(): Promise<BackupSlot | null> {
    const [latest] = await this.listBackups();
    return latest ?? null;
  }

  /**
   * Put every path captured in the slot back in place. Never throws.
   */
  public async rollbackTo(name: string): Promise<RollbackResult> {
    if (!isValidSlotName(name)) {
      return { success: false, message: `Backup not found: ${name}`, restored: [] };
    }

    return this.mutex.runExclusive(async () => {
      const slotPath = path.join(this.backupDir, name);
      if (!(await pathExists(slotPath))) {
        return { success: false, message: `Backup not found: ${name}`, restored: [] };
      }

      const restored: string[] = [];
      try {
        const entries = await this.restorableEntries(slotPath);
        for (const relative of entries) {
          const source = resolveInside(slotPath, relative);
          const destination = resolveInside(this.rootDir, relative);
          if (!source || !destination || !(await pathExists(source))) {
            logger.warn('Skipping unrestorable backup entry', { slot: name, path: relative });
            continue;
          }
          await fs.rm(destination, { recursive: true, force: true });
          await fs.mkdir(path.dirname(destination), { recursive: true });
          await fs.cp(source, destination, { recursive: true, preserveTimestamps: true });
          restored.push(relative);
        }
      } catch (error) {
        const wrapped = toUpdateError(error, UpdateErrorCode.IO_FAILURE);
        logger.error('Rollback failed', { slot: name, restored, error: wrapped.message });
        return { success: false, message: `Rollback failed: ${wrapped.message}`, backupName: name, restored };
      }

      logger.info('Rolled back to backup', { slot: name, restored: restored.length });
      return { success: true, message: `Restored ${restored.length} path(s) from ${name}`, backupName: name, restored };
    });
  }

  /**
   * Delete every slot beyond the newest `keepCount`. Returns the removed names.
   */
  public async cleanupOldBackups(keepCount: number = this.keepCount): Promise<string[]> {
    return this.mutex.runExclusive(async () => {
      const keep = Math.max(0, Math.floor(keepCount));
      const slots = await this.listBackups();
      const removed: string[] = [];

      for (const slot of slots.slice(keep)) {
        try {
          await fs.rm(slot.path, { recursive: true, force: true });
          removed.push(slot.name);
        } catch (error) {
          logger.warn('Failed to remove old backup', { slot: slot.name, error: describeError(error) });
        }
      }

      if (removed.length > 0) {
        logger.info('Pruned old backups', { removed: removed.length, kept: Math.min(keep, slots.length) });
      }
      return removed;
    });
  }

  // ==================== Private Helper Methods ====================

  private async allocateSlot(createdAt: Date): Promise<string> {
    await fs.mkdir(this.backupDir, { recursive: true });
    const base = formatSlotName(createdAt);
    let candidate = base;
    for (let suffix = 1; ; suffix++) {
      try {
        const slotPath = path.join(this.backupDir, candidate);
        await fs.mkdir(slotPath);
        return slotPath;
      } catch (error) {
        if (toUpdateError(error).code === UpdateErrorCode.PERMISSION_DENIED || suffix > 1000) {
          throw toUpdateError(error, UpdateErrorCode.IO_FAILURE);
        }
        candidate = `${base}_${suffix}`;
      }
    }
  }

  private async readMetadata(slotPath: string): Promise<BackupMetadata | null> {
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(path.join(slotPath, BACKUP_METADATA_FILE), 'utf-8'));
      return isMetadata(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }

  /**
   * Paths recorded in the metadata, or the slot's top-level entries without it
   */
  private async restorableEntries(slotPath: string): Promise<string[]> {
    const metadata = await this.readMetadata(slotPath);
    if (metadata) {
      return metadata.files;
    }
    const entries = await fs.readdir(slotPath);
    return entries.filter((entry) => entry !== BACKUP_METADATA_FILE);
  }
}
