/**
 * Service Manager
 * Restarts and inspects the appliance service through the host's service primitive
 */

import { logger } from '../utils/logger.js';
import { runCommand } from '../utils/exec.js';
import { OSDetector } from '../os/detector.js';
import { OperatingSystem } from '../types/common.js';
import type { CommandRunner, ExecutionResult } from '../types/common.js';
import { ServicePrimitive } from '../deployment/types.js';
import type { RestartMethod, RestartOutcome, ServiceInfo, ServiceManagerOptions, ServiceTarget } from './types.js';
import { ServiceStatus } from './types.js';

const DEFAULT_SERVICE_TIMEOUT_MS = 30_000;

/**
 * Container name for a unit name (`speech-appliance.service` → `speech-appliance`)
 */
export function containerNameFor(serviceName: string): string {
  return serviceName.replace(/\.service$/, '');
}

/**
 * launchd label for a unit name
 */
export function launchdLabelFor(serviceName: string): string {
  return `system/${containerNameFor(serviceName)}`;
}

/**
 * Service Manager class
 */
export class ServiceManager {
  private readonly runner: CommandRunner;
  private readonly os: OperatingSystem;
  private readonly timeoutMs: number;

  constructor(options: ServiceManagerOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.os = options.os ?? OSDetector.detect();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SERVICE_TIMEOUT_MS;
  }

  /**
   * Restart the service. Falls back to a manual-restart instruction when no
   * primitive is available or the command fails.
   */
  public async restart(target: ServiceTarget): Promise<RestartOutcome> {
    const method = this.methodFor(target);
    logger.info('Restarting service', { service: target.serviceName, method, os: this.os });

    if (method === 'manual') {
      return this.manual(target, 'No service manager available for this deployment');
    }

    const result = await this.execute(this.restartCommand(method, target.serviceName));
    if (!result.success) {
      const reason = result.timedOut ? 'timed out' : result.stderr.trim() || `exit code ${result.code}`;
      logger.warn('Service restart failed', { service: target.serviceName, method, reason });
      return this.manual(target, `Automatic restart via ${method} failed (${reason})`);
    }

    logger.info('Service restarted successfully', { service: target.serviceName, method });
    return { restarted: true, method, message: `Service ${target.serviceName} restarted via ${method}` };
  }

  /**
   * Get service status
   */
  public async status(target: ServiceTarget): Promise<ServiceInfo> {
    const method = this.methodFor(target);
    if (method === 'manual') {
      return { status: ServiceStatus.UNKNOWN, method };
    }

    const result = await this.execute(this.statusCommand(method, target.serviceName));
    const status = this.parseStatus(method, result);
    logger.debug('Service status', { service: target.serviceName, method, status });
    return { status, method, detail: result.stdout.trim() || result.stderr.trim() || undefined };
  }

  // ==================== Private Helper Methods ====================

  private methodFor(target: ServiceTarget): RestartMethod {
    switch (target.servicePrimitive) {
      case ServicePrimitive.DOCKER:
        return 'docker';
      case ServicePrimitive.SYSTEMD:
        if (this.os === OperatingSystem.LINUX) return 'systemd';
        if (this.os === OperatingSystem.MACOS) return 'launchd';
        return 'manual';
      default:
        return 'manual';
    }
  }

  private restartCommand(method: Exclude<RestartMethod, 'manual'>, serviceName: string): [string, string[]] {
    switch (method) {
      case 'systemd':
        return ['systemctl', ['restart', serviceName]];
      case 'launchd':
        return ['launchctl', ['kickstart', '-k', launchdLabelFor(serviceName)]];
      case 'docker':
        return ['docker', ['restart', containerNameFor(serviceName)]];
    }
  }

  private statusCommand(method: Exclude<RestartMethod, 'manual'>, serviceName: string): [string, string[]] {
    switch (method) {
      case 'systemd':
        return ['systemctl', ['is-active', serviceName]];
      case 'launchd':
        return ['launchctl', ['print', launchdLabelFor(serviceName)]];
      case 'docker':
        return ['docker', ['inspect', '-f', '{{.State.Status}}', containerNameFor(serviceName)]];
    }
  }

  private execute([command, args]: [string, string[]]): Promise<ExecutionResult> {
    return this.runner(command, args, { timeoutMs: this.timeoutMs });
  }

  /**
   * Parse service status from command output
   */
  private parseStatus(method: RestartMethod, result: ExecutionResult): ServiceStatus {
    const trimmed = result.stdout.trim().toLowerCase();

    switch (method) {
      case 'systemd':
        // is-active exits non-zero for anything but active, the state is still on stdout
        if (trimmed === 'active') return ServiceStatus.ACTIVE;
        if (trimmed === 'inactive') return ServiceStatus.INACTIVE;
        if (trimmed === 'failed') return ServiceStatus.FAILED;
        return ServiceStatus.UNKNOWN;

      case 'launchd':
        return result.success ? ServiceStatus.ACTIVE : ServiceStatus.INACTIVE;

      case 'docker':
        if (!result.success) return ServiceStatus.UNKNOWN;
        if (trimmed === 'running') return ServiceStatus.ACTIVE;
        if (trimmed === 'exited' || trimmed === 'created' || trimmed === 'paused') return ServiceStatus.INACTIVE;
        if (trimmed === 'dead') return ServiceStatus.FAILED;
        return ServiceStatus.UNKNOWN;

      default:
        return ServiceStatus.UNKNOWN;
    }
  }

  private manual(target: ServiceTarget, reason: string): RestartOutcome {
    const message = `${reason}. Restart ${target.serviceName} manually to load the update.`;
    logger.warn('Manual service restart required', { service: target.serviceName, reason });
    return { restarted: false, method: 'manual', message };
  }
}
