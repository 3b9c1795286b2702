/**
 * Shared constants for snapshot resolution
 */

/**
 * First date for which the snapshot server holds a snapshot
 */
export const EARLIEST_SNAPSHOT_DATE = '2014-09-17';

/**
 * Snapshot host used when no base URL is configured
 */
export const DEFAULT_SNAPSHOT_HOST = 'https://mran.microsoft.com';

/**
 * Mirror name the package manager treats as its default source
 */
export const DEFAULT_MIRROR_NAME = 'CRAN';

/**
 * Path segment under which snapshots live on the host
 */
export const SNAPSHOT_PATH = 'snapshot';

/**
 * Unanchored date pattern used to pick dates out of listings
 */
export const DATE_PATTERN = /\d{4}-\d{2}-\d{2}/;

/**
 * Base URL schemes the switcher accepts
 */
export const SUPPORTED_URL_PATTERN = /^(https?|file):\/\//;

/**
 * Environment variable consulted for the base URL
 */
export const BASE_URL_ENV_VAR = 'SNAPSHOT_MIRROR_URL';
