import { describe, it, expect } from 'vitest';
import { ServiceManager, containerNameFor, launchdLabelFor } from '../src/service/manager.js';
import { ServiceStatus } from '../src/service/types.js';
import { ServicePrimitive } from '../src/deployment/types.js';
import { OperatingSystem } from '../src/types/common.js';
import type { ExecutionResult } from '../src/types/common.js';
import { failed, fakeRunner, ok, type RecordedCommand } from './helpers.js';

const SERVICE = 'speech-appliance.service';

describe('ServiceManager', () => {
  it('restarts through systemctl on Linux', async () => {
    const calls: RecordedCommand[] = [];
    const services = new ServiceManager({ runner: fakeRunner(() => ok(), calls), os: OperatingSystem.LINUX });

    const outcome = await services.restart({ serviceName: SERVICE, servicePrimitive: ServicePrimitive.SYSTEMD });

    expect(outcome).toEqual({ restarted: true, method: 'systemd', message: `Service ${SERVICE} restarted via systemd` });
    expect(calls).toEqual([{ command: 'systemctl', args: ['restart', SERVICE], cwd: undefined, timeoutMs: 30_000 }]);
  });

  it('kicks the launchd job on macOS', async () => {
    const calls: RecordedCommand[] = [];
    const services = new ServiceManager({ runner: fakeRunner(() => ok(), calls), os: OperatingSystem.MACOS });

    const outcome = await services.restart({ serviceName: SERVICE, servicePrimitive: ServicePrimitive.SYSTEMD });

    expect(outcome.method).toBe('launchd');
    expect(calls[0]?.args).toEqual(['kickstart', '-k', 'system/speech-appliance']);
  });

  it('restarts the container for docker deployments', async () => {
    const calls: RecordedCommand[] = [];
    const services = new ServiceManager({ runner: fakeRunner(() => ok(), calls), os: OperatingSystem.LINUX });

    await services.restart({ serviceName: SERVICE, servicePrimitive: ServicePrimitive.DOCKER });

    expect(calls[0]).toMatchObject({ command: 'docker', args: ['restart', 'speech-appliance'] });
  });

  it('falls back to a manual instruction when the restart fails', async () => {
    const services = new ServiceManager({
      runner: fakeRunner(() => failed('Access denied')),
      os: OperatingSystem.LINUX,
    });

    const outcome = await services.restart({ serviceName: SERVICE, servicePrimitive: ServicePrimitive.SYSTEMD });

    expect(outcome).toEqual({
      restarted: false,
      method: 'manual',
      message: `Automatic restart via systemd failed (Access denied). Restart ${SERVICE} manually to load the update.`,
    });
  });

  it('does not run anything without a service primitive', async () => {
    const calls: RecordedCommand[] = [];
    const services = new ServiceManager({ runner: fakeRunner(() => ok(), calls), os: OperatingSystem.LINUX });

    const outcome = await services.restart({ serviceName: SERVICE, servicePrimitive: ServicePrimitive.NONE });

    expect(outcome.restarted).toBe(false);
    expect(outcome.message).toBe(
      `No service manager available for this deployment. Restart ${SERVICE} manually to load the update.`
    );
    expect(calls).toEqual([]);
  });

  it.each<[string, ExecutionResult, ServiceStatus]>([
    ['active', ok('active\n'), ServiceStatus.ACTIVE],
    ['inactive', { ...failed(''), stdout: 'inactive\n', code: 3 }, ServiceStatus.INACTIVE],
    ['failed', { ...failed(''), stdout: 'failed\n', code: 3 }, ServiceStatus.FAILED],
    ['unrecognised', ok('activating\n'), ServiceStatus.UNKNOWN],
  ])('parses systemd state %s', async (_label, result, expected) => {
    const services = new ServiceManager({ runner: fakeRunner(() => result), os: OperatingSystem.LINUX });

    const info = await services.status({ serviceName: SERVICE, servicePrimitive: ServicePrimitive.SYSTEMD });

    expect(info.status).toBe(expected);
    expect(info.method).toBe('systemd');
  });

  it('parses docker container state', async () => {
    const services = new ServiceManager({ runner: fakeRunner(() => ok('running\n')), os: OperatingSystem.LINUX });

    const info = await services.status({ serviceName: SERVICE, servicePrimitive: ServicePrimitive.DOCKER });

    expect(info).toEqual({ status: ServiceStatus.ACTIVE, method: 'docker', detail: 'running' });
  });

  it('reports unknown without a service primitive', async () => {
    const services = new ServiceManager({ runner: fakeRunner(() => ok()), os: OperatingSystem.WINDOWS });

    expect(await services.status({ serviceName: SERVICE, servicePrimitive: ServicePrimitive.SYSTEMD })).toEqual({
      status: ServiceStatus.UNKNOWN,
      method: 'manual',
    });
  });
});

describe('service names', () => {
  it('derives container and launchd names from the unit name', () => {
    expect(containerNameFor('speech-appliance.service')).toBe('speech-appliance');
    expect(containerNameFor('transcriber')).toBe('transcriber');
    expect(launchdLabelFor('speech-appliance.service')).toBe('system/speech-appliance');
  });
});
