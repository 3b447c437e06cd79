/**
 * Git Module Types
 */

import type { AxiosInstance } from 'axios';
import type { CommandRunner } from '../types/common.js';

/**
 * Head of a remote branch
 */
export interface RemoteCommit {
  sha: string;
  message: string;
  author: string;
  date: string;
  /** Where the information came from */
  source: 'api' | 'ls-remote';
}

/**
 * One line of commit history
 */
export interface CommitSummary {
  sha: string;
  message: string;
  author: string;
  date: string;
}

/**
 * Per-operation timeouts in milliseconds
 */
export interface GitTimeouts {
  localLookup: number;
  api: number;
  lsRemote: number;
  fetch: number;
  pull: number;
}

export interface GitMonitorOptions {
  repoPath: string;
  /** Source-control hosting API base for the repository, e.g. https://api.github.com/repos/owner/name */
  apiUrl?: string;
  branch?: string;
  remote?: string;
  runner?: CommandRunner;
  http?: AxiosInstance;
  timeouts?: Partial<GitTimeouts>;
}

export interface UpdateAvailability {
  available: boolean;
  info: RemoteCommit | null;
}
