/**
 * Maintenance Module Types
 */

import type { z } from 'zod';
import type { maintenanceConfigSchema, maintenanceMarkerSchema } from './schema.js';
import type { UpdateErrorInfo } from '../utils/errors.js';

/**
 * Persisted maintenance configuration (`maintenance-config.json`)
 */
export type MaintenanceConfig = z.infer<typeof maintenanceConfigSchema>;

/**
 * Contents of the `.maintenance_mode` marker file
 */
export type MaintenanceMarker = z.infer<typeof maintenanceMarkerSchema>;

export interface EnableMaintenanceOptions {
  message?: string;
  title?: string;
  ipWhitelist?: string[];
  /** Set when the update system turns maintenance on */
  autoMode?: boolean;
  durationMinutes?: number;
  adminEmail?: string;
}

export interface MaintenanceStatus {
  /** Marker present; the authoritative flag */
  active: boolean;
  /** Flag stored in the config file */
  enabled: boolean;
  autoMode: boolean;
  title: string;
  message: string;
  startedAt: string | null;
  estimatedEnd: string | null;
  durationMinutes: number | null;
  ipWhitelist: string[];
  adminEmail: string | null;
  marker: MaintenanceMarker | null;
}

export interface MaintenanceResult {
  success: boolean;
  message: string;
  status?: MaintenanceStatus;
  error?: UpdateErrorInfo;
}

/**
 * What the maintenance page shows
 */
export interface MaintenancePage {
  title: string;
  message: string;
  estimatedEnd: string | null;
}

export interface MaintenanceManagerOptions {
  /** Directory holding the marker and the config file */
  appRoot: string;
  markerFileName?: string;
  configFileName?: string;
  now?: () => Date;
  pid?: number;
}

export interface MaintenanceMiddlewareOptions {
  /**
   * Read the client address from X-Forwarded-For, X-Real-IP and
   * CF-Connecting-IP before the socket address. Turn off when the app is not
   * behind a proxy that sets them.
   */
  trustProxyHeaders?: boolean;
}
