import { SNAPSHOT_PATH } from '../core/constants.js';

/**
 * Build the snapshot URL for a base URL and an optional date
 *
 * `snapshotUrl('https://host/')` → `https://host/snapshot`
 * `snapshotUrl('https://host', '2020-01-01')` → `https://host/snapshot/2020-01-01`
 */
export function snapshotUrl(baseUrl: string, snapshotDate?: string): string {
  const base = `${baseUrl.replace(/\/$/, '')}/${SNAPSHOT_PATH}`;
  return snapshotDate ? `${base}/${snapshotDate}` : base;
}
