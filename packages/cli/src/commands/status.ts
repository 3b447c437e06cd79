/**
 * Status Command
 * Deployment, version, maintenance and service overview
 */

import chalk from 'chalk';
import { ServiceStatus } from '@appliance-updater/core';
import { loadSystem, type CommonOptions } from '../utils/context.js';
import { createSpinner, printJson, reportError } from '../utils/output.js';

/**
 * Format service status with colors
 */
function formatServiceStatus(status: ServiceStatus): string {
  switch (status) {
    case ServiceStatus.ACTIVE:
      return chalk.green('● active');
    case ServiceStatus.INACTIVE:
      return chalk.gray('○ inactive');
    case ServiceStatus.FAILED:
      return chalk.red('✗ failed');
    default:
      return chalk.yellow('? unknown');
  }
}

export async function statusCommand(options: CommonOptions): Promise<void> {
  const spinner = createSpinner('Reading status...', options.json);

  try {
    const system = await loadSystem(options);
    spinner.start();

    const updater = system.updater.getStatus();
    const service = await system.services.status({
      serviceName: system.config.serviceName(),
      servicePrimitive: system.config.getRecord().deployment.service_primitive,
    });
    const record = system.config.getRecord();
    spinner.stop();

    if (options.json) {
      printJson({
        configPath: system.config.getConfigPath(),
        deploymentType: updater.deploymentType,
        updateMethod: updater.updateMethod,
        targetDir: system.config.targetDir(),
        currentVersion: updater.currentVersion,
        lastUpdate: record.version_tracking.last_update,
        lastCheck: record.version_tracking.last_check,
        maintenanceActive: updater.maintenanceActive,
        service: { name: system.config.serviceName(), ...service },
        autoUpdate: system.config.autoUpdate(),
        issues: system.config.issues(),
      });
      return;
    }

    console.log(chalk.cyan('\n📊 Appliance status\n'));
    console.log(chalk.white(`  Config:       ${system.config.getConfigPath() ?? 'none'}`));
    console.log(chalk.white(`  Deployment:   ${updater.deploymentType} (${updater.updateMethod})`));
    console.log(chalk.white(`  Directory:    ${system.config.targetDir()}`));
    console.log(chalk.white(`  Version:      ${updater.currentVersion}`));
    console.log(chalk.white(`  Last update:  ${record.version_tracking.last_update ?? 'never'}`));
    console.log(chalk.white(`  Last check:   ${record.version_tracking.last_check ?? 'never'}`));
    console.log(`  Service:      ${system.config.serviceName()} ${formatServiceStatus(service.status)}`);
    console.log(`  Maintenance:  ${updater.maintenanceActive ? chalk.yellow('enabled') : chalk.green('disabled')}`);

    const auto = system.config.autoUpdate();
    console.log(
      chalk.white(`  Auto-update:  ${auto.enabled ? `${auto.schedule} at ${auto.time}` : 'disabled'}`)
    );

    for (const issue of system.config.issues()) {
      console.log(chalk.yellow(`\n⚠️  ${issue.message}`));
    }
    console.log();
  } catch (error) {
    spinner.stop();
    reportError(error, options.json);
  }
}
