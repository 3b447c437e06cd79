/**
 * OS Detection Module
 * Maps the local platform onto the operating systems the service manager knows
 */

import os from 'node:os';
import { OperatingSystem } from '../types/common.js';

/**
 * Detects the local operating system
 */
export class OSDetector {
  public static detect(): OperatingSystem {
    return this.platformToOS(os.platform());
  }

  /**
   * Convert a Node platform name to OperatingSystem
   */
  public static platformToOS(platform: NodeJS.Platform): OperatingSystem {
    switch (platform) {
      case 'linux':
        return OperatingSystem.LINUX;
      case 'darwin':
        return OperatingSystem.MACOS;
      case 'win32':
        return OperatingSystem.WINDOWS;
      default:
        return OperatingSystem.UNKNOWN;
    }
  }
}
