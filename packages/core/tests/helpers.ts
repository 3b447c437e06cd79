import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import axios, { type AxiosInstance } from 'axios';
import type { CommandRunner, ExecutionResult } from '../src/types/common.js';

export async function makeTempDir(prefix = 'appliance-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFile(root: string, relative: string, content: string): Promise<void> {
  const target = path.join(root, relative);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, 'utf-8');
}

export async function readFile(root: string, relative: string): Promise<string> {
  return fs.readFile(path.join(root, relative), 'utf-8');
}

export async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export function ok(stdout = ''): ExecutionResult {
  return { stdout, stderr: '', code: 0, success: true, timedOut: false };
}

export function failed(stderr: string, code = 1): ExecutionResult {
  return { stdout: '', stderr, code, success: false, timedOut: false };
}

export interface RecordedCommand {
  command: string;
  args: string[];
  cwd?: string;
  timeoutMs: number;
}

/**
 * Command runner answering from `respond`; unknown commands fail
 */
export function fakeRunner(
  respond: (command: string, args: string[]) => ExecutionResult | undefined,
  calls: RecordedCommand[] = []
): CommandRunner {
  return async (command, args, options) => {
    calls.push({ command, args, cwd: options.cwd, timeoutMs: options.timeoutMs });
    return respond(command, args) ?? failed(`unexpected command: ${command} ${args.join(' ')}`);
  };
}

/**
 * Axios instance served in-process. `handler` returns the response body (or a
 * promise of it) for a URL, or throws to fail the request.
 */
export function fakeHttp(handler: (url: string) => unknown, requests: string[] = []): AxiosInstance {
  return axios.create({
    adapter: async (config) => {
      const url = config.url ?? '';
      requests.push(url);
      const data: unknown = await handler(url);
      return { data, status: 200, statusText: 'OK', headers: {}, config };
    },
  });
}
