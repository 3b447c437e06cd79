/**
 * Update configuration schema
 * The persisted record keeps snake_case keys; unknown keys pass through untouched.
 */

import { z } from 'zod';
import { DeploymentType, ServicePrimitive } from '../deployment/types.js';

export const AUTO_UPDATE_SCHEDULES = ['hourly', 'daily', 'weekly'] as const;

export const DEFAULT_KEEP_BACKUPS = 5;

export const DEFAULT_FILES_TO_UPDATE: readonly string[] = [
  'src/main.py',
  'src/modules/__init__.py',
  'src/modules/live_speech.py',
  'src/modules/upload_handler.py',
  'src/modules/admin_panel.py',
  'src/modules/api_docs.py',
  'src/modules/chat_history.py',
  'src/modules/model_manager.py',
  'src/templates/main_interface.html',
  'src/whisper-service/audio_input_manager.py',
  'requirements.txt',
];

export const DEFAULT_GIT_BACKUP_PATHS: readonly string[] = ['src', 'requirements.txt', 'config', 'templates', 'static'];

export const DEFAULT_DEPENDENCY_FILE = 'requirements.txt';

export const DEFAULT_INSTALL_COMMAND: readonly string[] = ['python3', '-m', 'pip', 'install', '-r', DEFAULT_DEPENDENCY_FILE];

export const DEFAULT_INSTALL_TIMEOUT_MS = 300_000;

const timeOfDay = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM');

export const repositorySchema = z
  .object({
    url: z.string(),
    raw_url: z.string(),
    api_url: z.string(),
    branch: z.string().min(1).default('main'),
  })
  .passthrough();

export const deploymentSchema = z
  .object({
    type: z.nativeEnum(DeploymentType),
    target_dir: z.string().min(1),
    service_name: z.string().min(1),
    service_enabled: z.boolean().default(true),
    service_primitive: z.nativeEnum(ServicePrimitive).default(ServicePrimitive.NONE),
    detected_at: z.string().optional(),
  })
  .passthrough();

export const versionTrackingSchema = z
  .object({
    current_version: z.string().min(1),
    last_update: z.string().nullable().default(null),
    last_check: z.string().nullable().default(null),
  })
  .passthrough();

export const fileDownloadConfigSchema = z
  .object({
    files_to_update: z.array(z.string().min(1)).default([...DEFAULT_FILES_TO_UPDATE]),
    backup_enabled: z.boolean().default(true),
    backup_dir: z.string().min(1).default('.update_backups'),
    keep_backups: z.number().int().min(1).max(100).default(DEFAULT_KEEP_BACKUPS),
  })
  .passthrough();

export const gitConfigSchema = z
  .object({
    remote: z.string().min(1).default('origin'),
    backup_paths: z.array(z.string().min(1)).default([...DEFAULT_GIT_BACKUP_PATHS]),
    /** A pull that touches this file triggers `install_command` */
    dependency_file: z.string().min(1).default(DEFAULT_DEPENDENCY_FILE),
    install_command: z.array(z.string().min(1)).min(1).default([...DEFAULT_INSTALL_COMMAND]),
    install_timeout_ms: z.number().int().min(1_000).max(3_600_000).default(DEFAULT_INSTALL_TIMEOUT_MS),
  })
  .passthrough();

export const autoUpdateSchema = z
  .object({
    enabled: z.boolean().default(false),
    schedule: z.enum(AUTO_UPDATE_SCHEDULES).default('daily'),
    time: timeOfDay.default('02:00'),
  })
  .passthrough();

export const updateConfigSchema = z
  .object({
    repository: repositorySchema,
    deployment: deploymentSchema,
    update_method: z.enum(['git_pull', 'file_download']),
    version_tracking: versionTrackingSchema,
    file_download_config: fileDownloadConfigSchema.default({}),
    git_config: gitConfigSchema.default({}),
    auto_update: autoUpdateSchema.default({}),
  })
  .passthrough();
