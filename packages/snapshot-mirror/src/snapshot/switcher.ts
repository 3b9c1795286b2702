/**
 * Mirror Switcher
 *
 * Points the default package source at a dated snapshot. Unnamed entries
 * and any existing "CRAN" entry are replaced by a single "CRAN" entry for
 * the snapshot; every other named source keeps its place in the order.
 *
 * USAGE:
 * ```typescript
 * const result = await useSnapshot('2020-01-01', { baseUrl: 'https://mran.microsoft.com' });
 * if (result.success) {
 *   console.log(result.data); // [{ name: 'CRAN', url: 'https://mran.microsoft.com/snapshot/2020-01-01' }, ...]
 * }
 * ```
 *
 * @module snapshot/switcher
 */

import { resolveBaseUrl } from '../core/config.js';
import { DEFAULT_MIRROR_NAME, SUPPORTED_URL_PATTERN } from '../core/constants.js';
import { fail, ok, type SnapshotResult } from '../core/errors.js';
import type { Clock, MirrorConfig, SnapshotLister } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { verifySnapshotDate } from './date.js';
import { getMirrorStore, type MirrorStore } from './mirror-store.js';
import { snapshotUrl } from './url.js';

const logger = createLogger({ module: 'switcher' });

/**
 * Compute the configuration that routes the default source to `url`
 */
export function applySnapshotMirror(config: MirrorConfig, url: string): MirrorConfig {
  const snapshotEntry = { name: DEFAULT_MIRROR_NAME, url };

  if (!config.some((entry) => entry.name !== '')) {
    return [snapshotEntry];
  }

  const kept = config.filter((entry) => entry.name !== '' && entry.name !== DEFAULT_MIRROR_NAME);
  return [snapshotEntry, ...kept];
}

export interface UseSnapshotOptions {
  /** Snapshot host (default: configured base URL) */
  readonly baseUrl?: string;
  /** Confirm the date exists on the host before switching */
  readonly validate?: boolean;
  /** Store to rewrite (default: process-wide store) */
  readonly store?: MirrorStore;
  readonly now?: Clock;
  readonly listSnapshots?: SnapshotLister;
}

/**
 * Switch the default package source to the snapshot for `snapshotDate`
 *
 * The store is only written once every check has passed.
 *
 * Failure kinds: InvalidFormat, TooEarly, FutureDate, NotFound,
 * UnsupportedScheme, HostUnreachable
 */
export async function useSnapshot(
  snapshotDate: string,
  options: UseSnapshotOptions = {}
): Promise<SnapshotResult<MirrorConfig>> {
  const baseUrl = resolveBaseUrl(options.baseUrl);

  const verified = await verifySnapshotDate(snapshotDate, {
    validate: options.validate,
    baseUrl,
    now: options.now,
    listSnapshots: options.listSnapshots,
  });
  if (!verified.success) {
    return verified;
  }

  if (!SUPPORTED_URL_PATTERN.test(baseUrl)) {
    return fail('UnsupportedScheme', `Not a HTTP[S] or file URL: ${baseUrl}`);
  }

  const store = options.store ?? getMirrorStore();
  const url = snapshotUrl(baseUrl, verified.data);
  store.set(applySnapshotMirror(store.get(), url));

  logger.info('Switched default mirror to snapshot', { date: verified.data, url });
  return ok(store.get());
}
