/**
 * Git Monitor
 * Compares the local checkout against its remote branch
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import { runCommand } from '../utils/exec.js';
import type { CommandRunner, ExecutionResult } from '../types/common.js';
import type {
  CommitSummary,
  GitMonitorOptions,
  GitTimeouts,
  RemoteCommit,
  UpdateAvailability,
} from './types.js';

export const DEFAULT_GIT_TIMEOUTS: GitTimeouts = {
  localLookup: 5_000,
  api: 10_000,
  lsRemote: 15_000,
  fetch: 30_000,
  pull: 60_000,
};

const commitPayloadSchema = z.object({
  sha: z.string().min(1),
  commit: z.object({
    message: z.string(),
    author: z
      .object({
        name: z.string(),
        date: z.string(),
      })
      .nullable(),
  }),
});

type CommitPayload = z.infer<typeof commitPayloadSchema>;

/**
 * Git Monitor class
 *
 * Every method reports failure as a sentinel (`null`, `false`, `[]`). Git and the
 * hosting API are unreliable collaborators and an update check must never take
 * the service down.
 */
export class GitMonitor {
  private readonly repoPath: string;
  private readonly apiUrl?: string;
  private readonly branch: string;
  private readonly remote: string;
  private readonly runner: CommandRunner;
  private readonly http: AxiosInstance;
  private readonly timeouts: GitTimeouts;

  constructor(options: GitMonitorOptions) {
    this.repoPath = options.repoPath;
    this.apiUrl = options.apiUrl?.replace(/\/+$/, '') || undefined;
    this.branch = options.branch ?? 'main';
    this.remote = options.remote ?? 'origin';
    this.runner = options.runner ?? runCommand;
    this.http = options.http ?? axios.create();
    this.timeouts = { ...DEFAULT_GIT_TIMEOUTS, ...options.timeouts };
  }

  public getRepoPath(): string {
    return this.repoPath;
  }

  public getBranch(): string {
    return this.branch;
  }

  private git(args: string[], timeoutMs: number): Promise<ExecutionResult> {
    return this.runner('git', args, { cwd: this.repoPath, timeoutMs });
  }

  /**
   * Full hash of the local HEAD, or null when this is not a usable checkout
   */
  public async currentCommit(): Promise<string | null> {
    const result = await this.git(['rev-parse', 'HEAD'], this.timeouts.localLookup);
    if (!result.success) {
      logger.debug('Could not resolve local HEAD', { repoPath: this.repoPath, stderr: result.stderr.trim() });
      return null;
    }
    const sha = result.stdout.trim();
    return sha.length > 0 ? sha : null;
  }

  /**
   * Short hash of the local HEAD
   */
  public async currentShortCommit(): Promise<string | null> {
    const result = await this.git(['rev-parse', '--short', 'HEAD'], this.timeouts.localLookup);
    const sha = result.stdout.trim();
    return result.success && sha.length > 0 ? sha : null;
  }

  /**
   * Latest commit on the remote branch. Uses the hosting API first and falls back
   * to `git ls-remote`; null when neither answers.
   */
  public async latestRemote(branch: string = this.branch): Promise<RemoteCommit | null> {
    if (this.apiUrl) {
      const fromApi = await this.latestRemoteFromApi(branch);
      if (fromApi) {
        return fromApi;
      }
    }
    return this.latestRemoteFromLsRemote(branch);
  }

  private async latestRemoteFromApi(branch: string): Promise<RemoteCommit | null> {
    try {
      const response = await this.http.get<unknown>(`${this.apiUrl}/commits/${encodeURIComponent(branch)}`, {
        timeout: this.timeouts.api,
        headers: { Accept: 'application/vnd.github+json' },
      });
      const parsed = commitPayloadSchema.safeParse(response.data);
      if (!parsed.success) {
        logger.warn('Unexpected commit payload from hosting API', { branch });
        return null;
      }
      return { ...toSummary(parsed.data, false), source: 'api' };
    } catch (error) {
      logger.warn('Remote commit lookup failed', { branch, error: describeError(error) });
      return null;
    }
  }

  private async latestRemoteFromLsRemote(branch: string): Promise<RemoteCommit | null> {
    const result = await this.git(['ls-remote', this.remote, `refs/heads/${branch}`], this.timeouts.lsRemote);
    if (!result.success) {
      logger.warn('git ls-remote failed', { remote: this.remote, branch, stderr: result.stderr.trim() });
      return null;
    }
    const sha = result.stdout.trim().split(/\s+/)[0] ?? '';
    if (!/^[0-9a-f]{7,64}$/i.test(sha)) {
      return null;
    }
    return { sha, message: '', author: '', date: '', source: 'ls-remote' };
  }

  /**
   * Update available iff both local and remote heads resolved and differ
   */
  public async checkForUpdates(): Promise<UpdateAvailability> {
    const [current, latest] = await Promise.all([this.currentCommit(), this.latestRemote()]);
    if (!current || !latest) {
      return { available: false, info: null };
    }
    if (current !== latest.sha) {
      return { available: true, info: latest };
    }
    return { available: false, info: null };
  }

  /**
   * Fetch the remote branch without merging
   */
  public async fetchUpdates(): Promise<boolean> {
    const result = await this.git(['fetch', this.remote, this.branch], this.timeouts.fetch);
    if (!result.success) {
      logger.warn('git fetch failed', { remote: this.remote, branch: this.branch, stderr: result.stderr.trim() });
      return false;
    }
    logger.debug('git fetch completed', { remote: this.remote, branch: this.branch });
    return true;
  }

  /**
   * Number of commits on the fetched remote branch that HEAD does not have
   */
  public async commitsBehind(branch: string = this.branch): Promise<number | null> {
    const result = await this.git(
      ['rev-list', '--count', `HEAD..${this.remote}/${branch}`],
      this.timeouts.localLookup
    );
    if (!result.success) {
      return null;
    }
    const count = Number.parseInt(result.stdout.trim(), 10);
    return Number.isFinite(count) && count >= 0 ? count : null;
  }

  /**
   * Paths that differ between two commits, or null when git cannot tell
   */
  public async changedFiles(from: string, to: string): Promise<string[] | null> {
    const result = await this.git(['diff', '--name-only', from, to], this.timeouts.localLookup);
    if (!result.success) {
      logger.debug('git diff failed', { from, to, stderr: result.stderr.trim() });
      return null;
    }
    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  /**
   * Recent commits on the branch, newest first; empty on any failure
   */
  public async commitHistory(limit = 10): Promise<CommitSummary[]> {
    if (!this.apiUrl) {
      return [];
    }
    try {
      const response = await this.http.get<unknown>(`${this.apiUrl}/commits`, {
        timeout: this.timeouts.api,
        params: { sha: this.branch, per_page: limit },
        headers: { Accept: 'application/vnd.github+json' },
      });
      const parsed = z.array(commitPayloadSchema).safeParse(response.data);
      if (!parsed.success) {
        return [];
      }
      return parsed.data.slice(0, limit).map((commit) => toSummary(commit, true));
    } catch (error) {
      logger.warn('Commit history lookup failed', { error: describeError(error) });
      return [];
    }
  }

  /**
   * Pull the branch into the working tree
   */
  public async pull(): Promise<ExecutionResult> {
    logger.info('Pulling latest changes', { remote: this.remote, branch: this.branch, repoPath: this.repoPath });
    return this.git(['pull', this.remote, this.branch], this.timeouts.pull);
  }
}

function toSummary(payload: CommitPayload, abbreviate: boolean): CommitSummary {
  return {
    sha: abbreviate ? payload.sha.slice(0, 7) : payload.sha,
    message: abbreviate ? (payload.commit.message.split('\n')[0] ?? '') : payload.commit.message,
    author: payload.commit.author?.name ?? '',
    date: payload.commit.author?.date ?? '',
  };
}
