/**
 * Schedule Command
 * Run the auto-update scheduler in the foreground, or a single scheduled run
 */

import chalk from 'chalk';
import { loadSystem, type CommonOptions } from '../utils/context.js';
import { fail, printJson, reportError } from '../utils/output.js';

export interface ScheduleOptions extends CommonOptions {
  once?: boolean;
}

export async function scheduleCommand(options: ScheduleOptions): Promise<void> {
  try {
    const system = await loadSystem(options);

    if (options.once) {
      const result = await system.scheduler.runOnce();
      if (options.json) {
        printJson(result);
      } else if (!result.ran) {
        console.log(chalk.yellow(`\n⚠️  Skipped: ${result.reason ?? 'nothing to do'}\n`));
      } else if (result.update) {
        const color = result.update.success ? chalk.green : chalk.red;
        console.log(color(`\n${result.update.message}\n`));
      } else {
        console.log(chalk.green(`\n${result.check?.message ?? 'Check complete'}\n`));
      }
      if (result.check?.status === 'error' || (result.update && !result.update.success)) {
        fail();
      }
      return;
    }

    const auto = system.config.autoUpdate();
    if (!auto.enabled) {
      console.log(chalk.yellow('\n⚠️  Auto-update is disabled; updates will be checked but not applied\n'));
    }

    system.scheduler.start();
    console.log(chalk.cyan(`\n⏰ Scheduler running (${auto.schedule} at ${auto.time})`));
    console.log(chalk.gray(`   Next run: ${system.scheduler.getNextRun()?.toLocaleString() ?? 'unknown'}`));
    console.log(chalk.gray('   Press Ctrl+C to stop\n'));

    await new Promise<void>((resolve) => {
      const shutdown = (): void => {
        system.scheduler.stop();
        resolve();
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
    console.log(chalk.gray('\nScheduler stopped\n'));
  } catch (error) {
    reportError(error, options.json);
  }
}
