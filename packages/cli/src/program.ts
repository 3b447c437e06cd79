/**
 * CLI program
 * Command definitions, kept apart from the entry point so tests can drive them
 */

import { Command } from 'commander';
import type { UpdateSystemOptions } from '@appliance-updater/core';
import type { CommonOptions } from './utils/context.js';
import { checkCommand } from './commands/check.js';
import { applyCommand, type ApplyOptions } from './commands/apply.js';
import { rollbackCommand, type RollbackOptions } from './commands/rollback.js';
import { backupsCommand } from './commands/backups.js';
import {
  maintenanceAllowCommand,
  maintenanceDisableCommand,
  maintenanceEnableCommand,
  maintenanceRevokeCommand,
  maintenanceStatusCommand,
  type EnableOptions,
} from './commands/maintenance.js';
import { statusCommand } from './commands/status.js';
import { configShowCommand } from './commands/config.js';
import { scheduleCommand, type ScheduleOptions } from './commands/schedule.js';

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Options shared by every command
 */
function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Use a specific update configuration file')
    .option('--json', 'Print machine-readable JSON')
    .option('-v, --verbose', 'Verbose logging');
}

/**
 * Build the CLI. `systemOptions` reaches the update system of every command.
 */
export function createProgram(systemOptions: UpdateSystemOptions = {}): Command {
  const program = new Command();
  const wire = <T extends CommonOptions>(options: T): T => ({ ...options, system: systemOptions });

  program
    .name('appliance-updater')
    .description('Check, apply and roll back updates of the speech appliance')
    .version('1.0.0');

  /**
   * Check command - Compare installed and remote versions
   */
  withCommonOptions(program.command('check').description('Check whether an update is available')).action(
    (options: CommonOptions) => checkCommand(wire(options))
  );

  /**
   * Apply command - Backup, apply, verify, restart
   */
  withCommonOptions(
    program
      .command('apply')
      .description('Apply the available update (backup first, automatic rollback on failure)')
      .option('-y, --yes', 'Skip confirmation prompt')
      .option('-f, --force', 'Apply even when no update was reported')
  ).action((options: ApplyOptions) => applyCommand(wire(options)));

  /**
   * Rollback command - Restore a backup slot
   */
  withCommonOptions(
    program
      .command('rollback [slot]')
      .description('Restore a backup (newest when no slot is given)')
      .option('-y, --yes', 'Skip confirmation prompt')
  ).action((slot: string | undefined, options: RollbackOptions) => rollbackCommand(slot, wire(options)));

  withCommonOptions(program.command('backups').description('List backups, newest first')).action(
    (options: CommonOptions) => backupsCommand(wire(options))
  );

  /**
   * Maintenance commands
   */
  const maintenance = program.command('maintenance').description('Manage maintenance mode');

  withCommonOptions(
    maintenance
      .command('enable')
      .description('Enable maintenance mode')
      .option('-m, --message <text>', 'Message shown to visitors')
      .option('-t, --title <text>', 'Page title')
      .option('-d, --duration <minutes>', 'Expected duration in minutes')
      .option('-w, --whitelist <ip>', 'Allowed IP or CIDR range (repeatable)', collect)
  ).action((options: EnableOptions) => maintenanceEnableCommand(wire(options)));

  withCommonOptions(maintenance.command('disable').description('Disable maintenance mode')).action(
    (options: CommonOptions) => maintenanceDisableCommand(wire(options))
  );

  withCommonOptions(maintenance.command('status').description('Show maintenance mode status')).action(
    (options: CommonOptions) => maintenanceStatusCommand(wire(options))
  );

  withCommonOptions(
    maintenance.command('allow <ip>').description('Add an IP or CIDR range to the allow-list')
  ).action((ip: string, options: CommonOptions) => maintenanceAllowCommand(ip, wire(options)));

  withCommonOptions(
    maintenance.command('revoke <ip>').description('Remove an IP or CIDR range from the allow-list')
  ).action((ip: string, options: CommonOptions) => maintenanceRevokeCommand(ip, wire(options)));

  withCommonOptions(program.command('status').description('Show deployment, version and service status')).action(
    (options: CommonOptions) => statusCommand(wire(options))
  );

  /**
   * Config commands
   */
  const config = program.command('config').description('Inspect the update configuration');
  withCommonOptions(config.command('show').description('Print the update configuration')).action(
    (options: CommonOptions) => configShowCommand(wire(options))
  );

  withCommonOptions(
    program
      .command('schedule')
      .description('Run the auto-update scheduler in the foreground')
      .option('--once', 'Perform a single scheduled run and exit')
  ).action((options: ScheduleOptions) => scheduleCommand(wire(options)));

  return program;
}
