/**
 * Apply Command
 * Check for an update and apply it with backup and automatic rollback
 */

import chalk from 'chalk';
import {
  UpdateStep,
  UpdateStepStatus,
  type UpdateProgress,
  type UpdateResult,
} from '@appliance-updater/core';
import type { Ora } from 'ora';
import { loadSystem, type CommonOptions } from '../utils/context.js';
import { confirmAction, createSpinner, fail, printJson, reportError } from '../utils/output.js';
import { printCheckResult } from './check.js';

export interface ApplyOptions extends CommonOptions {
  yes?: boolean;
  force?: boolean;
}

/**
 * Format step name for display
 */
function formatStepName(step: UpdateStep): string {
  const stepNames: Record<UpdateStep, string> = {
    [UpdateStep.ENABLE_MAINTENANCE]: 'Enabling maintenance mode',
    [UpdateStep.CREATE_BACKUP]: 'Creating backup',
    [UpdateStep.APPLY]: 'Applying update',
    [UpdateStep.INSTALL_DEPENDENCIES]: 'Installing dependencies',
    [UpdateStep.VERIFY]: 'Verifying update',
    [UpdateStep.RECORD_VERSION]: 'Recording version',
    [UpdateStep.CLEANUP]: 'Pruning old backups',
    [UpdateStep.DISABLE_MAINTENANCE]: 'Disabling maintenance mode',
    [UpdateStep.RESTART_SERVICE]: 'Restarting service',
    [UpdateStep.ROLLBACK]: 'Rolling back',
    [UpdateStep.COMPLETE]: 'Complete',
  };
  return stepNames[step];
}

function createProgressCallback(spinner: Ora) {
  return (progress: UpdateProgress): void => {
    const stepName = formatStepName(progress.step);

    if (progress.status === UpdateStepStatus.IN_PROGRESS) {
      spinner.text = `${stepName}... (${progress.progress}%)`;
    } else if (progress.status === UpdateStepStatus.COMPLETED) {
      spinner.text = `${stepName} ✓`;
    } else if (progress.status === UpdateStepStatus.FAILED) {
      spinner.warn(chalk.red(`${stepName} failed: ${progress.error?.message ?? progress.message}`));
      spinner.start();
    } else if (progress.status === UpdateStepStatus.SKIPPED) {
      spinner.text = `${stepName} (skipped: ${progress.message})`;
    }
  };
}

function printUpdateResult(result: UpdateResult): void {
  if (result.success) {
    console.log(chalk.green(`\n✅ ${result.message}`));
    if (result.backup) {
      console.log(chalk.gray(`   Backup: ${result.backup}`));
    }
    if (result.restart && !result.restart.restarted) {
      console.log(chalk.yellow(`\n⚠️  ${result.restart.message}`));
    }
    console.log(chalk.gray(`   Duration: ${(result.duration / 1000).toFixed(1)}s\n`));
    return;
  }

  console.log(chalk.red(`\n❌ ${result.message}`));
  if (result.rolledBack) {
    console.log(chalk.yellow(`   Restored backup ${result.backup ?? ''}`.trimEnd()));
  }
  if (result.status === 'rolled_back' || result.status === 'failed') {
    console.log(chalk.yellow('   Maintenance mode is still enabled. Disable it with: appliance-updater maintenance disable'));
  }
  console.log();
}

/**
 * Apply command handler
 */
export async function applyCommand(options: ApplyOptions): Promise<void> {
  const spinner = createSpinner('Checking for updates...', options.json);

  try {
    const system = await loadSystem(options);

    spinner.start();
    const check = await system.updater.checkForUpdates();
    spinner.stop();

    if (!options.force && (check.status === 'error' || !check.updateAvailable)) {
      if (options.json) {
        printJson({ check });
      } else {
        printCheckResult(check);
      }
      if (check.status === 'error') {
        fail();
      }
      return;
    }

    if (!options.json) {
      printCheckResult(check);
    }

    const confirmed = await confirmAction('Apply the update now? The service will be restarted.', options);
    if (!confirmed) {
      if (options.json) {
        printJson({ check, applied: false, message: 'Update not confirmed; pass --yes to apply' });
      } else {
        console.log(chalk.yellow('\n⚠️  Update cancelled (pass --yes to apply without a prompt)\n'));
      }
      fail();
      return;
    }

    spinner.start('Applying update...');
    const result = await system.updater.performUpdate({
      force: options.force,
      progressCallback: options.json ? undefined : createProgressCallback(spinner),
    });

    if (result.success) {
      spinner.succeed('Update applied');
    } else {
      spinner.fail('Update failed');
    }

    if (options.json) {
      printJson({ check, result });
    } else {
      printUpdateResult(result);
    }
    if (!result.success) {
      fail();
    }
  } catch (error) {
    spinner.stop();
    reportError(error, options.json);
  }
}
