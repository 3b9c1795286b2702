/**
 * snapshot-mirror
 *
 * Redirect a package manager's mirror configuration to a dated snapshot
 * server and list the snapshot dates a server offers.
 *
 * @module snapshot-mirror
 */

export * from './core/constants.js';
export * from './core/errors.js';
export type { MirrorEntry, MirrorConfig, SnapshotLister, Clock } from './core/types.js';
export { resolveBaseUrl, readConfigFile, findConfigFile, ConfigError, type ConfigFile } from './core/config.js';
export {
  HTTPClient,
  HTTPError,
  HTTPTimeoutError,
  HTTPNetworkError,
  createHTTPClient,
  type HTTPClientConfig,
} from './core/http-client.js';
export { logger, createLogger, type LogLevel } from './core/utils/logger.js';

export { snapshotUrl } from './snapshot/url.js';
export {
  checkSnapshotDate,
  verifySnapshotDate,
  formatLocalDate,
  SnapshotDateSchema,
  type VerifyDateOptions,
} from './snapshot/date.js';
export {
  listSnapshots,
  extractSnapshotDates,
  type ListSnapshotsOptions,
  type ExtractOptions,
} from './snapshot/listing.js';
export {
  InMemoryMirrorStore,
  getMirrorStore,
  setMirrorStore,
  mirrorConfigFromRecord,
  type MirrorStore,
} from './snapshot/mirror-store.js';
export { useSnapshot, applySnapshotMirror, type UseSnapshotOptions } from './snapshot/switcher.js';
