/**
 * Repository coordinates
 */

import type { RepositoryConfig } from './types.js';

export const DEFAULT_REPOSITORY_URL = 'https://github.com/example/speech-appliance';

/**
 * Derive raw-file and API endpoints from a repository URL. GitHub URLs map onto
 * raw.githubusercontent.com and api.github.com; anything else needs explicit values.
 */
export function deriveRepositoryConfig(overrides: Partial<RepositoryConfig> = {}): RepositoryConfig {
  const url = (overrides.url ?? DEFAULT_REPOSITORY_URL).replace(/\.git$/, '').replace(/\/+$/, '');
  const branch = overrides.branch ?? 'main';
  const github = /^https:\/\/github\.com\/([^/]+)\/([^/]+)$/.exec(url);

  const rawUrl = github ? `https://raw.githubusercontent.com/${github[1]}/${github[2]}/${branch}` : '';
  const apiUrl = github ? `https://api.github.com/repos/${github[1]}/${github[2]}` : '';

  return {
    url,
    raw_url: overrides.raw_url ?? rawUrl,
    api_url: overrides.api_url ?? apiUrl,
    branch,
  };
}
