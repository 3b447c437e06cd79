/**
 * Maintenance Middleware
 * Serves the maintenance page to callers that are not on the allow-list
 */

import type { Request, RequestHandler } from 'express';
import { logger } from '../utils/logger.js';
import type { MaintenanceManager } from './manager.js';
import type { MaintenanceMiddlewareOptions, MaintenancePage } from './types.js';

const PROXY_HEADERS = ['x-forwarded-for', 'x-real-ip', 'cf-connecting-ip'] as const;

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Client address: proxy headers in order (first hop of a list), then the socket
 */
export function resolveClientIp(req: Request, trustProxyHeaders = true): string {
  if (trustProxyHeaders) {
    for (const header of PROXY_HEADERS) {
      const value = req.headers[header];
      const raw = Array.isArray(value) ? value[0] : value;
      const first = raw?.split(',')[0]?.trim();
      if (first) {
        return first;
      }
    }
  }
  return req.socket.remoteAddress ?? '127.0.0.1';
}

export function renderMaintenancePage(page: MaintenancePage): string {
  const title = escapeHtml(page.title);
  const eta = page.estimatedEnd
    ? `\n      <div class="eta">Estimated completion: ${escapeHtml(page.estimatedEnd)}</div>`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${title}</title>
    <style>
      body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; background: #f1f3f5; margin: 0; min-height: 100vh; display: flex; align-items: center; justify-content: center; }
      .maintenance { background: #fff; border-radius: 12px; padding: 48px 40px; text-align: center; box-shadow: 0 12px 32px rgba(0, 0, 0, 0.08); max-width: 520px; margin: 20px; }
      h1 { color: #333; font-size: 28px; }
      p { color: #666; line-height: 1.6; }
      .eta { background: #f8f9fa; padding: 12px; border-radius: 8px; color: #495057; font-size: 14px; }
    </style>
  </head>
  <body>
    <div class="maintenance">
      <h1>${title}</h1>
      <p>${escapeHtml(page.message)}</p>${eta}
    </div>
  </body>
</html>
`;
}

/**
 * Express middleware answering 503 while maintenance is active for callers that
 * are not allowed through
 */
export function createMaintenanceMiddleware(
  manager: MaintenanceManager,
  options: MaintenanceMiddlewareOptions = {}
): RequestHandler {
  const trustProxyHeaders = options.trustProxyHeaders ?? true;

  return (req, res, next) => {
    const clientIp = resolveClientIp(req, trustProxyHeaders);
    if (!manager.isMaintenanceRequest(clientIp)) {
      next();
      return;
    }

    logger.debug('Serving maintenance page', { ip: clientIp, path: req.path });
    res
      .status(503)
      .set({
        'Content-Type': 'text/html; charset=utf-8',
        'Cache-Control': 'no-cache, no-store, must-revalidate',
        Pragma: 'no-cache',
        Expires: '0',
        'Retry-After': '120',
      })
      .send(renderMaintenancePage(manager.pageInfo()));
  };
}
