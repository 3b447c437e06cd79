/**
 * Check Command
 * Compare the installed version with the remote one
 */

import chalk from 'chalk';
import type { UpdateCheckResult } from '@appliance-updater/core';
import { loadSystem, type CommonOptions } from '../utils/context.js';
import { createSpinner, fail, printJson, reportError } from '../utils/output.js';

export function printCheckResult(result: UpdateCheckResult): void {
  if (result.status === 'error') {
    console.log(chalk.red(`\n❌ Update check failed: ${result.message ?? 'unknown error'}\n`));
    return;
  }

  console.log(chalk.cyan('\n📦 Update check\n'));
  console.log(chalk.white(`  Deployment:       ${result.deploymentType}`));
  console.log(chalk.white(`  Current version:  ${result.currentVersion}`));
  console.log(chalk.white(`  Latest version:   ${result.latestVersion ?? 'unknown'}`));
  if (result.remote?.message) {
    console.log(chalk.gray(`  Latest commit:    ${result.remote.message.split('\n')[0]}`));
  }

  if (result.updateAvailable) {
    console.log(chalk.green(`\n✅ Update available (${result.commitsBehind} behind)`));
    console.log(chalk.cyan('💡 Apply it with: appliance-updater apply\n'));
  } else {
    console.log(chalk.green('\n✅ Already up to date\n'));
  }
}

/**
 * Check command handler
 */
export async function checkCommand(options: CommonOptions): Promise<void> {
  const spinner = createSpinner('Checking for updates...', options.json);

  try {
    const system = await loadSystem(options);
    spinner.start();
    const result = await system.updater.checkForUpdates();
    spinner.stop();

    if (options.json) {
      printJson(result);
    } else {
      printCheckResult(result);
    }
    if (result.status === 'error') {
      fail();
    }
  } catch (error) {
    spinner.stop();
    reportError(error, options.json);
  }
}
