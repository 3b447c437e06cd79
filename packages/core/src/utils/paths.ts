/**
 * Path helpers
 */

import path from 'node:path';

/**
 * Absolute path of `relative` under `base`, or null when it is absolute or
 * would land outside `base`
 */
export function resolveInside(base: string, relative: string): string | null {
  if (path.isAbsolute(relative)) {
    return null;
  }
  const resolved = path.resolve(base, relative);
  const offset = path.relative(base, resolved);
  if (offset === '' || offset.startsWith('..') || path.isAbsolute(offset)) {
    return null;
  }
  return resolved;
}
