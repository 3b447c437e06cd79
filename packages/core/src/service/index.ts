/**
 * Service Module - Restart and status of the appliance service
 */

export { ServiceManager, containerNameFor, launchdLabelFor } from './manager.js';
export type { RestartOutcome, RestartMethod, ServiceInfo, ServiceManagerOptions, ServiceTarget } from './types.js';
export { ServiceStatus } from './types.js';
