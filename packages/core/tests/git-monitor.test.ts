import { describe, it, expect } from 'vitest';
import { GitMonitor } from '../src/git/monitor.js';
import type { ExecutionResult } from '../src/types/common.js';
import { failed, fakeHttp, fakeRunner, ok, type RecordedCommand } from './helpers.js';

const LOCAL_SHA = 'a'.repeat(40);
const REMOTE_SHA = 'b'.repeat(40);
const API_URL = 'https://api.example.test/repos/acme/speech';

function commitPayload(sha: string, message: string) {
  return {
    sha,
    commit: { message, author: { name: 'Dev One', date: '2026-02-27T08:00:00Z' } },
  };
}

function gitResponder(overrides: Record<string, ExecutionResult> = {}) {
  return (command: string, args: string[]): ExecutionResult | undefined => {
    const key = `${command} ${args.join(' ')}`;
    if (key in overrides) {
      return overrides[key];
    }
    switch (key) {
      case 'git rev-parse HEAD':
        return ok(`${LOCAL_SHA}\n`);
      case 'git rev-parse --short HEAD':
        return ok('aaaaaaa\n');
      case 'git ls-remote origin refs/heads/main':
        return ok(`${REMOTE_SHA}\trefs/heads/main\n`);
      default:
        return undefined;
    }
  };
}

describe('GitMonitor', () => {
  it('reads the local HEAD from the repository directory', async () => {
    const calls: RecordedCommand[] = [];
    const monitor = new GitMonitor({ repoPath: '/srv/app', runner: fakeRunner(gitResponder(), calls) });

    expect(await monitor.currentCommit()).toBe(LOCAL_SHA);
    expect(await monitor.currentShortCommit()).toBe('aaaaaaa');
    expect(calls[0]).toEqual({ command: 'git', args: ['rev-parse', 'HEAD'], cwd: '/srv/app', timeoutMs: 5_000 });
  });

  it('returns null when HEAD cannot be resolved', async () => {
    const runner = fakeRunner(gitResponder({ 'git rev-parse HEAD': failed('fatal: not a git repository') }));
    const monitor = new GitMonitor({ repoPath: '/srv/app', runner });

    expect(await monitor.currentCommit()).toBeNull();
  });

  it('takes the latest remote commit from the hosting API', async () => {
    const requests: string[] = [];
    const http = fakeHttp(() => commitPayload(REMOTE_SHA, 'Fix audio input\n\nLonger body'), requests);
    const monitor = new GitMonitor({ repoPath: '/srv/app', apiUrl: `${API_URL}/`, runner: fakeRunner(gitResponder()), http });

    expect(await monitor.latestRemote()).toEqual({
      sha: REMOTE_SHA,
      message: 'Fix audio input\n\nLonger body',
      author: 'Dev One',
      date: '2026-02-27T08:00:00Z',
      source: 'api',
    });
    expect(requests).toEqual([`${API_URL}/commits/main`]);
  });

  it('falls back to ls-remote when the API fails', async () => {
    const http = fakeHttp(() => {
      throw new Error('rate limited');
    });
    const calls: RecordedCommand[] = [];
    const monitor = new GitMonitor({ repoPath: '/srv/app', apiUrl: API_URL, runner: fakeRunner(gitResponder(), calls), http });

    expect(await monitor.latestRemote()).toEqual({ sha: REMOTE_SHA, message: '', author: '', date: '', source: 'ls-remote' });
    expect(calls.map((call) => call.timeoutMs)).toEqual([15_000]);
  });

  it('falls back to ls-remote when the API payload is malformed', async () => {
    const http = fakeHttp(() => ({ unexpected: true }));
    const monitor = new GitMonitor({ repoPath: '/srv/app', apiUrl: API_URL, runner: fakeRunner(gitResponder()), http });

    expect((await monitor.latestRemote())?.source).toBe('ls-remote');
  });

  it('returns null when neither source answers', async () => {
    const runner = fakeRunner(gitResponder({ 'git ls-remote origin refs/heads/main': failed('could not resolve host') }));
    const monitor = new GitMonitor({ repoPath: '/srv/app', runner });

    expect(await monitor.latestRemote()).toBeNull();
  });

  it('reports an update only when both heads resolve and differ', async () => {
    const monitor = new GitMonitor({ repoPath: '/srv/app', runner: fakeRunner(gitResponder()) });
    const result = await monitor.checkForUpdates();
    expect(result.available).toBe(true);
    expect(result.info?.sha).toBe(REMOTE_SHA);

    const same = new GitMonitor({
      repoPath: '/srv/app',
      runner: fakeRunner(gitResponder({ 'git ls-remote origin refs/heads/main': ok(`${LOCAL_SHA}\trefs/heads/main`) })),
    });
    expect(await same.checkForUpdates()).toEqual({ available: false, info: null });

    const broken = new GitMonitor({
      repoPath: '/srv/app',
      runner: fakeRunner(gitResponder({ 'git rev-parse HEAD': failed('fatal') })),
    });
    expect(await broken.checkForUpdates()).toEqual({ available: false, info: null });
  });

  it('counts commits behind the fetched remote branch', async () => {
    const calls: RecordedCommand[] = [];
    const runner = fakeRunner(
      gitResponder({
        'git fetch origin release': ok(),
        'git rev-list --count HEAD..origin/release': ok('3\n'),
      }),
      calls
    );
    const monitor = new GitMonitor({ repoPath: '/srv/app', branch: 'release', runner });

    expect(await monitor.fetchUpdates()).toBe(true);
    expect(await monitor.commitsBehind()).toBe(3);
    expect(calls.map((call) => call.timeoutMs)).toEqual([30_000, 5_000]);
  });

  it('returns sentinels when fetch or rev-list fail', async () => {
    const monitor = new GitMonitor({ repoPath: '/srv/app', runner: fakeRunner(gitResponder()) });

    expect(await monitor.fetchUpdates()).toBe(false);
    expect(await monitor.commitsBehind()).toBeNull();
  });

  it('lists the paths changed between two commits', async () => {
    const runner = fakeRunner(
      gitResponder({ [`git diff --name-only ${LOCAL_SHA} ${REMOTE_SHA}`]: ok('requirements.txt\nsrc/main.py\n\n') })
    );
    const monitor = new GitMonitor({ repoPath: '/srv/app', runner });

    expect(await monitor.changedFiles(LOCAL_SHA, REMOTE_SHA)).toEqual(['requirements.txt', 'src/main.py']);
    expect(await monitor.changedFiles(REMOTE_SHA, LOCAL_SHA)).toBeNull();
  });

  it('lists recent commits with abbreviated hashes and subjects', async () => {
    const http = fakeHttp(() => [
      commitPayload(REMOTE_SHA, 'Second change\n\ndetails'),
      commitPayload(LOCAL_SHA, 'First change'),
    ]);
    const monitor = new GitMonitor({ repoPath: '/srv/app', apiUrl: API_URL, runner: fakeRunner(gitResponder()), http });

    expect(await monitor.commitHistory(5)).toEqual([
      { sha: 'bbbbbbb', message: 'Second change', author: 'Dev One', date: '2026-02-27T08:00:00Z' },
      { sha: 'aaaaaaa', message: 'First change', author: 'Dev One', date: '2026-02-27T08:00:00Z' },
    ]);
  });

  it('returns an empty history without an API or on failure', async () => {
    const offline = new GitMonitor({ repoPath: '/srv/app', runner: fakeRunner(gitResponder()) });
    expect(await offline.commitHistory()).toEqual([]);

    const http = fakeHttp(() => {
      throw new Error('boom');
    });
    const failing = new GitMonitor({ repoPath: '/srv/app', apiUrl: API_URL, runner: fakeRunner(gitResponder()), http });
    expect(await failing.commitHistory()).toEqual([]);
  });

  it('pulls the configured remote and branch with the pull timeout', async () => {
    const calls: RecordedCommand[] = [];
    const runner = fakeRunner(gitResponder({ 'git pull upstream main': ok('Updating') }), calls);
    const monitor = new GitMonitor({ repoPath: '/srv/app', remote: 'upstream', runner });

    const result = await monitor.pull();

    expect(result.success).toBe(true);
    expect(calls).toEqual([{ command: 'git', args: ['pull', 'upstream', 'main'], cwd: '/srv/app', timeoutMs: 60_000 }]);
  });
});
