/**
 * Maintenance Manager
 * Maintenance flag (marker file + config) and IP allow-list
 */

import fs from 'node:fs/promises';
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { logger } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';
import { UpdateErrorCode, describeError, toUpdateError } from '../utils/errors.js';
import { maintenanceConfigSchema, maintenanceMarkerSchema } from './schema.js';
import { isIpAllowed, isValidWhitelistEntry, normalizeIp } from './ip.js';
import type {
  EnableMaintenanceOptions,
  MaintenanceConfig,
  MaintenanceManagerOptions,
  MaintenanceMarker,
  MaintenancePage,
  MaintenanceResult,
  MaintenanceStatus,
} from './types.js';

export const MAINTENANCE_MARKER_FILE = '.maintenance_mode';
export const MAINTENANCE_CONFIG_FILE = 'maintenance-config.json';

function parseConfig(raw: string | null): MaintenanceConfig {
  if (raw === null) {
    return maintenanceConfigSchema.parse({});
  }
  try {
    const result = maintenanceConfigSchema.safeParse(JSON.parse(raw));
    if (result.success) {
      return result.data;
    }
    logger.warn('Invalid maintenance config, using defaults', { issues: result.error.issues.length });
  } catch (error) {
    logger.warn('Unreadable maintenance config, using defaults', { error: describeError(error) });
  }
  return maintenanceConfigSchema.parse({});
}

async function writeAtomic(target: string, content: string): Promise<void> {
  const tempPath = `${target}.${process.pid}.tmp`;
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(tempPath, content, 'utf-8');
  await fs.rename(tempPath, target);
}

/**
 * Maintenance Manager class
 *
 * The marker file is the source of truth for "maintenance is on". The config
 * carries the details and is kept in step with the marker.
 */
export class MaintenanceManager {
  private readonly markerPath: string;
  private readonly configPath: string;
  private readonly now: () => Date;
  private readonly pid: number;
  private readonly mutex = new Mutex();

  constructor(options: MaintenanceManagerOptions) {
    this.markerPath = path.join(options.appRoot, options.markerFileName ?? MAINTENANCE_MARKER_FILE);
    this.configPath = path.join(options.appRoot, options.configFileName ?? MAINTENANCE_CONFIG_FILE);
    this.now = options.now ?? (() => new Date());
    this.pid = options.pid ?? process.pid;
  }

  public getMarkerPath(): string {
    return this.markerPath;
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Turn maintenance on. The config is saved before the marker appears, so a
   * reader that sees the marker also sees the new details.
   */
  public async enable(options: EnableMaintenanceOptions = {}): Promise<MaintenanceResult> {
    const autoMode = options.autoMode ?? false;
    return this.guard('enable maintenance mode', async () => {
      const started = this.now();
      const config = await this.loadConfig();

      config.enabled = true;
      config.auto_mode = autoMode;
      config.started_at = started.toISOString();
      config.estimated_end =
        options.durationMinutes && options.durationMinutes > 0
          ? new Date(started.getTime() + options.durationMinutes * 60_000).toISOString()
          : null;
      if (options.message) config.message = options.message;
      if (options.title) config.title = options.title;
      if (options.adminEmail) config.admin_email = options.adminEmail;
      if (options.ipWhitelist && options.ipWhitelist.length > 0) config.ip_whitelist = [...options.ipWhitelist];

      await this.saveConfig(config);

      const marker: MaintenanceMarker = { enabled_at: started.toISOString(), auto_mode: autoMode, pid: this.pid };
      await writeAtomic(this.markerPath, JSON.stringify(marker, null, 2));

      logger.info('Maintenance mode enabled', { autoMode, estimatedEnd: config.estimated_end });
      return { success: true, message: 'Maintenance mode enabled', status: await this.buildStatus(config) };
    });
  }

  /**
   * Turn maintenance off: config first, then the marker
   */
  public async disable(): Promise<MaintenanceResult> {
    return this.guard('disable maintenance mode', async () => {
      const config = await this.loadConfig();
      config.enabled = false;
      config.auto_mode = false;
      config.started_at = null;
      config.estimated_end = null;

      await this.saveConfig(config);
      await fs.rm(this.markerPath, { force: true });

      logger.info('Maintenance mode disabled');
      return { success: true, message: 'Maintenance mode disabled', status: await this.buildStatus(config) };
    });
  }

  /**
   * Lock-free per-request check
   */
  public isActive(): boolean {
    return existsSync(this.markerPath);
  }

  /**
   * Current state. A config whose `enabled` flag disagrees with the marker is
   * brought back in line with it.
   */
  public async status(): Promise<MaintenanceStatus> {
    return this.mutex.runExclusive(async () => {
      const config = await this.loadConfig();
      const active = this.isActive();

      if (config.enabled !== active) {
        logger.warn('Maintenance config out of sync with marker, resyncing', { markerPresent: active });
        config.enabled = active;
        if (!active) {
          config.auto_mode = false;
          config.started_at = null;
          config.estimated_end = null;
        }
        try {
          await this.saveConfig(config);
        } catch (error) {
          logger.error('Failed to resync maintenance config', { error: describeError(error) });
        }
      }

      return this.buildStatus(config);
    });
  }

  /**
   * Whether a request from `clientIp` should get the maintenance page
   */
  public isMaintenanceRequest(clientIp: string): boolean {
    if (!this.isActive()) {
      return false;
    }
    return !isIpAllowed(clientIp, this.readConfigSync().ip_whitelist);
  }

  /**
   * Details shown on the maintenance page
   */
  public pageInfo(): MaintenancePage {
    const config = this.readConfigSync();
    return { title: config.title, message: config.message, estimatedEnd: config.estimated_end };
  }

  /**
   * Add an address or CIDR range. `success` is false when it was already listed.
   */
  public async addIpToWhitelist(ip: string): Promise<MaintenanceResult> {
    const entry = ip.trim();
    if (!isValidWhitelistEntry(entry)) {
      return {
        success: false,
        message: `Not an IP address or CIDR range: ${ip}`,
        error: { code: UpdateErrorCode.CONFIG_INCONSISTENCY, message: `Invalid whitelist entry: ${ip}` },
      };
    }

    return this.guard('add IP to whitelist', async () => {
      const config = await this.loadConfig();
      const normalized = normalizeIp(entry);
      if (config.ip_whitelist.some((existing) => normalizeIp(existing) === normalized)) {
        return { success: false, message: `${entry} is already whitelisted`, status: await this.buildStatus(config) };
      }
      config.ip_whitelist = [...config.ip_whitelist, entry];
      await this.saveConfig(config);
      logger.info('Added IP to maintenance whitelist', { ip: entry });
      return { success: true, message: `Added ${entry} to whitelist`, status: await this.buildStatus(config) };
    });
  }

  /**
   * Remove every entry equal to `ip` after normalization
   */
  public async removeIpFromWhitelist(ip: string): Promise<MaintenanceResult> {
    return this.guard('remove IP from whitelist', async () => {
      const config = await this.loadConfig();
      const normalized = normalizeIp(ip);
      const remaining = config.ip_whitelist.filter((existing) => normalizeIp(existing) !== normalized);
      if (remaining.length === config.ip_whitelist.length) {
        return { success: false, message: `${ip.trim()} is not whitelisted`, status: await this.buildStatus(config) };
      }
      config.ip_whitelist = remaining;
      await this.saveConfig(config);
      logger.info('Removed IP from maintenance whitelist', { ip: ip.trim() });
      return { success: true, message: `Removed ${ip.trim()} from whitelist`, status: await this.buildStatus(config) };
    });
  }

  // ==================== Private Helper Methods ====================

  /**
   * Run a mutation under the maintenance lock, turning failures into a result
   */
  private async guard(action: string, task: () => Promise<MaintenanceResult>): Promise<MaintenanceResult> {
    try {
      return await this.mutex.runExclusive(task);
    } catch (error) {
      const wrapped = toUpdateError(error, UpdateErrorCode.IO_FAILURE);
      logger.error(`Failed to ${action}`, { code: wrapped.code, error: wrapped.message });
      return { success: false, message: `Failed to ${action}: ${wrapped.message}`, error: wrapped.toJSON() };
    }
  }

  private async loadConfig(): Promise<MaintenanceConfig> {
    try {
      return parseConfig(await fs.readFile(this.configPath, 'utf-8'));
    } catch (error) {
      if (toUpdateError(error).code !== UpdateErrorCode.NOT_FOUND) {
        logger.warn('Failed to read maintenance config, using defaults', { error: describeError(error) });
      }
      return parseConfig(null);
    }
  }

  private readConfigSync(): MaintenanceConfig {
    try {
      return parseConfig(readFileSync(this.configPath, 'utf-8'));
    } catch {
      return parseConfig(null);
    }
  }

  private async saveConfig(config: MaintenanceConfig): Promise<void> {
    await writeAtomic(this.configPath, `${JSON.stringify(config, null, 2)}\n`);
  }

  private async readMarker(): Promise<MaintenanceMarker | null> {
    try {
      const result = maintenanceMarkerSchema.safeParse(JSON.parse(await fs.readFile(this.markerPath, 'utf-8')));
      return result.success ? result.data : null;
    } catch {
      return null;
    }
  }

  private async buildStatus(config: MaintenanceConfig): Promise<MaintenanceStatus> {
    const active = this.isActive();
    const started = config.started_at ? Date.parse(config.started_at) : Number.NaN;
    const durationMinutes = Number.isNaN(started)
      ? null
      : Math.max(0, Math.round((this.now().getTime() - started) / 60_000));

    return {
      active,
      enabled: config.enabled,
      autoMode: config.auto_mode,
      title: config.title,
      message: config.message,
      startedAt: config.started_at,
      estimatedEnd: config.estimated_end,
      durationMinutes,
      ipWhitelist: [...config.ip_whitelist],
      adminEmail: config.admin_email,
      marker: active ? await this.readMarker() : null,
    };
  }
}
