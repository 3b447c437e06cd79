/**
 * Output helpers shared by the commands
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import inquirer from 'inquirer';
import { UpdateError, toUpdateError } from '@appliance-updater/core';

/**
 * Spinner that stays silent in JSON mode
 */
export function createSpinner(text: string, json = false): Ora {
  return ora({ text, isSilent: json });
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Mark the invocation as failed without exiting, so pending output still flushes
 */
export function fail(): void {
  process.exitCode = 1;
}

/**
 * Report an unexpected error: structured in JSON mode, readable otherwise
 */
export function reportError(error: unknown, json = false): void {
  const wrapped = error instanceof UpdateError ? error : toUpdateError(error);
  if (json) {
    printJson({ success: false, error: wrapped.toJSON() });
  } else {
    console.error(chalk.red(`\n❌ ${wrapped.message}`) + chalk.gray(` [${wrapped.code}]\n`));
  }
  fail();
}

/**
 * Ask before a destructive action. Without a terminal nothing is asked and the
 * answer is no, unless `--yes` was given.
 */
export async function confirmAction(message: string, options: { yes?: boolean; json?: boolean }): Promise<boolean> {
  if (options.yes) {
    return true;
  }
  if (options.json || !process.stdin.isTTY) {
    return false;
  }
  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message,
      default: false,
    },
  ]);
  return confirm;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / 1024 / 1024).toFixed(2)} MB`;
}
