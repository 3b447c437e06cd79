/**
 * Command execution helper
 */

import { execFile, type ExecFileException } from 'node:child_process';
import type { CommandOptions, CommandRunner, ExecutionResult } from '../types/common.js';

/**
 * Run a command with a hard timeout. Never rejects: spawn errors, non-zero exits
 * and timeouts all come back as an unsuccessful result.
 */
export const runCommand: CommandRunner = (command, args, options: CommandOptions) => {
  return new Promise<ExecutionResult>((resolve) => {
    execFile(
      command,
      args,
      {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        env: options.env ?? process.env,
        maxBuffer: 10 * 1024 * 1024,
        encoding: 'utf8',
      },
      (error: ExecFileException | null, stdout: string, stderr: string) => {
        if (!error) {
          resolve({ stdout, stderr, code: 0, success: true, timedOut: false });
          return;
        }

        const timedOut = error.killed === true && error.signal === 'SIGTERM';
        resolve({
          stdout: stdout ?? '',
          stderr: timedOut ? `${command} timed out after ${options.timeoutMs}ms` : stderr || error.message,
          code: typeof error.code === 'number' ? error.code : 1,
          success: false,
          timedOut,
        });
      }
    );
  });
};
