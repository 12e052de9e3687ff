// packages/core/src/config/defaults.ts

import type { ProjectConfig } from '../types/config.js';
import {
  DEFAULT_CHECK_IN_DAYS,
  DEFAULT_COMPUTER_GROUPS,
  DEFAULT_DB_PATH,
  DEFAULT_MOBILE_DEVICE_GROUPS,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: ProjectConfig = {
  server: {
    name: '',
  },
  catalog: {
    snapshot: 'catalog.json',
  },
  devices: {
    checkInDays: DEFAULT_CHECK_IN_DAYS,
    defaultGroups: {
      computer: [...DEFAULT_COMPUTER_GROUPS],
      mobileDevice: [...DEFAULT_MOBILE_DEVICE_GROUPS],
    },
  },
  nesting: {
    onCycle: 'warn',
  },
  output: {
    verbose: false,
  },
  history: {
    enabled: true,
    dbPath: DEFAULT_DB_PATH,
  },
  advanced: {
    logLevel: 'info',
  },
};
