/**
 * Rollback Command
 * Restore a backup slot and restart the service
 */

import chalk from 'chalk';
import { loadSystem, type CommonOptions } from '../utils/context.js';
import { confirmAction, createSpinner, fail, printJson, reportError } from '../utils/output.js';

export interface RollbackOptions extends CommonOptions {
  yes?: boolean;
}

/**
 * Rollback command handler. Without a slot name the newest backup is used.
 */
export async function rollbackCommand(slot: string | undefined, options: RollbackOptions): Promise<void> {
  const spinner = createSpinner('Rolling back...', options.json);

  try {
    const system = await loadSystem(options);
    const target = slot ?? (await system.backups.latestBackup())?.name;

    if (!target) {
      if (options.json) {
        printJson({ success: false, message: 'No backups available', restored: [] });
      } else {
        console.log(chalk.yellow('\n⚠️  No backups available\n'));
      }
      fail();
      return;
    }

    const confirmed = await confirmAction(`Restore backup ${target}? Current files will be overwritten.`, options);
    if (!confirmed) {
      if (options.json) {
        printJson({ success: false, message: 'Rollback not confirmed; pass --yes to proceed', restored: [] });
      } else {
        console.log(chalk.yellow('\n⚠️  Rollback cancelled\n'));
      }
      fail();
      return;
    }

    spinner.start(`Restoring ${target}...`);
    const result = await system.updater.rollback(target);

    if (result.success) {
      spinner.succeed(result.message);
    } else {
      spinner.fail(result.message);
    }

    if (options.json) {
      printJson(result);
    } else if (result.success) {
      console.log(chalk.white(`\n  Version:  ${result.version ?? 'unknown'}`));
      console.log(chalk.white(`  Restored: ${result.restored.join(', ') || 'nothing'}`));
      if (result.restart && !result.restart.restarted) {
        console.log(chalk.yellow(`\n⚠️  ${result.restart.message}`));
      }
      console.log();
    }

    if (!result.success) {
      fail();
    }
  } catch (error) {
    spinner.stop();
    reportError(error, options.json);
  }
}
