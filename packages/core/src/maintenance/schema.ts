/**
 * Maintenance configuration schema
 */

import { z } from 'zod';

export const DEFAULT_MAINTENANCE_WHITELIST: readonly string[] = ['127.0.0.1', '::1', 'localhost'];

export const DEFAULT_MAINTENANCE_MESSAGE =
  "Our system is currently undergoing maintenance. We'll be back very soon. Sorry for any inconvenience.";

export const DEFAULT_MAINTENANCE_TITLE = 'Maintenance Mode';

export const maintenanceConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    ip_whitelist: z.array(z.string()).default([...DEFAULT_MAINTENANCE_WHITELIST]),
    message: z.string().default(DEFAULT_MAINTENANCE_MESSAGE),
    title: z.string().default(DEFAULT_MAINTENANCE_TITLE),
    auto_mode: z.boolean().default(false),
    started_at: z.string().nullable().default(null),
    estimated_end: z.string().nullable().default(null),
    admin_email: z.string().nullable().default(null),
  })
  .passthrough();

export const maintenanceMarkerSchema = z.object({
  enabled_at: z.string(),
  auto_mode: z.boolean(),
  pid: z.number().int(),
});
