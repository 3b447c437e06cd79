/**
 * Update API
 * Express router exposing checks, installs, backups and rollbacks over HTTP.
 * Mount it under `/api/update`.
 */

import express, { type Request, type RequestHandler, type Response, type Router } from 'express';
import { z, ZodError } from 'zod';
import { logger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import type { BackupManager } from '../backup/manager.js';
import type { GitMonitor } from '../git/monitor.js';
import type { UpdateManager } from './manager.js';

export interface UpdateRouterDependencies {
  updater: UpdateManager;
  backups: BackupManager;
  /** Present for git deployments; history is empty without it */
  git?: GitMonitor;
}

const installRequestSchema = z.object({
  force: z.boolean().optional(),
});

const rollbackRequestSchema = z.object({
  backup_name: z
    .string({ required_error: 'backup_name required', invalid_type_error: 'backup_name must be a string' })
    .trim()
    .min(1, 'backup_name required'),
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function sendRouteError(res: Response, action: string, error: unknown): void {
  if (error instanceof ZodError) {
    const [first] = error.issues;
    res.status(400).json({
      error: first?.message ?? 'Validation failed',
      details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
    return;
  }

  const message = describeError(error);
  logger.error(`Update API: ${action} failed`, { error: message });
  res.status(500).json({ error: message });
}

function route(action: string, handler: AsyncRoute): RequestHandler {
  return (req, res) => {
    handler(req, res).catch((error: unknown) => sendRouteError(res, action, error));
  };
}

/**
 * Build the update API router
 */
export function createUpdateRouter(deps: UpdateRouterDependencies): Router {
  const router = express.Router();
  router.use(express.json());

  router.get(
    '/check',
    route('update check', async (_req, res) => {
      res.json(await deps.updater.checkForUpdates());
    })
  );

  router.post(
    '/install',
    route('update install', async (req, res) => {
      const body = installRequestSchema.parse(req.body ?? {});
      const result = await deps.updater.performUpdate({ force: body.force ?? false });
      res.status(result.status === 'busy' ? 409 : 200).json(result);
    })
  );

  router.get(
    '/status',
    route('status', async (_req, res) => {
      res.json(deps.updater.getStatus());
    })
  );

  router.get(
    '/history',
    route('history', async (req, res) => {
      const { limit } = historyQuerySchema.parse(req.query);
      const commits = deps.git ? await deps.git.commitHistory(limit) : [];
      res.json({ commits });
    })
  );

  router.get(
    '/backups',
    route('backup list', async (_req, res) => {
      const slots = await deps.backups.listBackups();
      res.json({
        backups: slots.map((slot) => ({
          name: slot.name,
          createdAt: slot.createdAt.toISOString(),
          sizeBytes: slot.sizeBytes,
          version: slot.version ?? null,
          files: slot.files ?? [],
        })),
      });
    })
  );

  router.post(
    '/rollback',
    route('rollback', async (req, res) => {
      const body = rollbackRequestSchema.parse(req.body ?? {});
      res.json(await deps.updater.rollback(body.backup_name));
    })
  );

  router.post(
    '/restart',
    route('restart', async (_req, res) => {
      const outcome = await deps.updater.restartService();
      res.json({ success: outcome.restarted, ...outcome });
    })
  );

  return router;
}
