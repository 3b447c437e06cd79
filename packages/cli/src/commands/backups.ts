/**
 * Backups Command
 * List backup slots, newest first
 */

import chalk from 'chalk';
import { loadSystem, type CommonOptions } from '../utils/context.js';
import { formatBytes, printJson, reportError } from '../utils/output.js';

export async function backupsCommand(options: CommonOptions): Promise<void> {
  try {
    const system = await loadSystem(options);
    const slots = await system.backups.listBackups();

    if (options.json) {
      printJson(
        slots.map((slot) => ({
          name: slot.name,
          createdAt: slot.createdAt.toISOString(),
          sizeBytes: slot.sizeBytes,
          version: slot.version ?? null,
          files: slot.files ?? [],
        }))
      );
      return;
    }

    if (slots.length === 0) {
      console.log(chalk.yellow(`\nNo backups in ${system.backups.getBackupDir()}\n`));
      return;
    }

    console.log(chalk.cyan(`\n💾 Backups (${slots.length})\n`));
    for (const slot of slots) {
      const version = slot.version ? chalk.white(slot.version) : chalk.gray('unknown');
      console.log(
        `  ${chalk.bold(slot.name)}  ${version}  ${chalk.gray(formatBytes(slot.sizeBytes))}  ${chalk.gray(slot.createdAt.toLocaleString())}`
      );
    }
    console.log();
  } catch (error) {
    reportError(error, options.json);
  }
}
