/**
 * Maintenance Command
 * Toggle maintenance mode and manage the IP allow-list
 */

import chalk from 'chalk';
import type { MaintenanceResult, MaintenanceStatus } from '@appliance-updater/core';
import { loadSystem, type CommonOptions } from '../utils/context.js';
import { fail, printJson, reportError } from '../utils/output.js';

export interface EnableOptions extends CommonOptions {
  message?: string;
  title?: string;
  duration?: string;
  whitelist?: string[];
}

function printStatus(status: MaintenanceStatus): void {
  const state = status.active ? chalk.yellow('ENABLED') : chalk.green('disabled');
  console.log(chalk.cyan('\n🛠  Maintenance mode\n'));
  console.log(`  State:      ${state}${status.autoMode ? chalk.gray(' (automatic)') : ''}`);
  if (status.active) {
    console.log(chalk.white(`  Message:    ${status.message}`));
    if (status.startedAt) {
      console.log(chalk.white(`  Started:    ${status.startedAt} (${status.durationMinutes ?? 0} min ago)`));
    }
    if (status.estimatedEnd) {
      console.log(chalk.white(`  Until:      ${status.estimatedEnd}`));
    }
  }
  console.log(chalk.white(`  Allow-list: ${status.ipWhitelist.join(', ') || 'none'}`));
  console.log();
}

function report(result: MaintenanceResult, options: CommonOptions): void {
  if (options.json) {
    printJson(result);
  } else if (result.success) {
    console.log(chalk.green(`\n✅ ${result.message}`));
    if (result.status) {
      printStatus(result.status);
    }
  } else {
    console.log(chalk.red(`\n❌ ${result.message}\n`));
  }
  if (!result.success) {
    fail();
  }
}

function parseDuration(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const minutes = Number.parseInt(value, 10);
  return Number.isNaN(minutes) || minutes <= 0 ? undefined : minutes;
}

export async function maintenanceEnableCommand(options: EnableOptions): Promise<void> {
  try {
    const system = await loadSystem(options);
    const result = await system.maintenance.enable({
      message: options.message,
      title: options.title,
      durationMinutes: parseDuration(options.duration),
      ipWhitelist: options.whitelist,
    });
    report(result, options);
  } catch (error) {
    reportError(error, options.json);
  }
}

export async function maintenanceDisableCommand(options: CommonOptions): Promise<void> {
  try {
    const system = await loadSystem(options);
    report(await system.maintenance.disable(), options);
  } catch (error) {
    reportError(error, options.json);
  }
}

export async function maintenanceStatusCommand(options: CommonOptions): Promise<void> {
  try {
    const system = await loadSystem(options);
    const status = await system.maintenance.status();
    if (options.json) {
      printJson(status);
    } else {
      printStatus(status);
    }
  } catch (error) {
    reportError(error, options.json);
  }
}

export async function maintenanceAllowCommand(ip: string, options: CommonOptions): Promise<void> {
  try {
    const system = await loadSystem(options);
    report(await system.maintenance.addIpToWhitelist(ip), options);
  } catch (error) {
    reportError(error, options.json);
  }
}

export async function maintenanceRevokeCommand(ip: string, options: CommonOptions): Promise<void> {
  try {
    const system = await loadSystem(options);
    report(await system.maintenance.removeIpFromWhitelist(ip), options);
  } catch (error) {
    reportError(error, options.json);
  }
}
