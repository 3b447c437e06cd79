/**
 * Deployment Module - Deployment type detection
 */

export {
  DeploymentDetector,
  updateMethodFor,
  DEFAULT_INSTALL_ROOT,
  DEFAULT_SERVICE_NAME,
  DEFAULT_INSTALL_MARKER,
  DEFAULT_DEV_MARKER,
} from './detector.js';
export type { DeploymentProfile, DeploymentDetectorOptions, UpdateMethod } from './types.js';
export { DeploymentType, ServicePrimitive } from './types.js';
