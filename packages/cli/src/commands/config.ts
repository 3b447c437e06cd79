/**
 * Config Command
 * Show the update configuration
 */

import chalk from 'chalk';
import { loadSystem, type CommonOptions } from '../utils/context.js';
import { printJson, reportError } from '../utils/output.js';

export async function configShowCommand(options: CommonOptions): Promise<void> {
  try {
    const system = await loadSystem(options);
    const record = system.config.getRecord();

    if (options.json) {
      printJson({ path: system.config.getConfigPath(), config: record });
      return;
    }

    console.log(chalk.cyan(`\n⚙️  ${system.config.getConfigPath() ?? 'Update configuration'}\n`));
    console.log(JSON.stringify(record, null, 2));
    console.log();
  } catch (error) {
    reportError(error, options.json);
  }
}
