import os from 'node:os';
import path from 'node:path';
import { initLogger } from '../src/utils/logger.js';

// Commands re-initialise the logger; keep their log files out of the home directory
process.env.APPLIANCE_LOG_DIR = path.join(os.tmpdir(), 'appliance-updater-test-logs');

initLogger({ silent: true, logToFile: false });
