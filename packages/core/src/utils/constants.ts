// packages/core/src/utils/constants.ts — Shared magic number constants

/** Check-in threshold used when none (or a non-numeric one) is supplied */
export const DEFAULT_CHECK_IN_DAYS = 30;

/** Number of decile buckets below the terminal 100% rank */
export const CRUFT_DECILES = 10;

/** Config file looked up in the working directory */
export const CONFIG_FILENAME = '.fleetsweep.yml';

/** Project state directory (run history database) */
export const STATE_DIR = '.fleetsweep';

/** Default run history database, relative to the working directory */
export const DEFAULT_DB_PATH = '.fleetsweep/db/fleetsweep.db';

/** Runs listed by `fleetsweep history` when no limit is given */
export const DEFAULT_HISTORY_LIMIT = 10;

/** Histogram key for devices that report no OS version or model */
export const UNKNOWN_BUCKET = 'Unknown';

/** Catch-all smart groups every managed computer belongs to */
export const DEFAULT_COMPUTER_GROUPS = ['All Managed Clients', 'All Managed Servers'];

/** Catch-all smart groups every managed mobile device belongs to */
export const DEFAULT_MOBILE_DEVICE_GROUPS = [
  'All Managed iPads',
  'All Managed iPhones',
  'All Managed iPod touches',
  'All Managed Apple TVs',
];
