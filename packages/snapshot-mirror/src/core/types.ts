/**
 * Core types for snapshot mirror configuration
 */

import type { SnapshotResult } from './errors.js';

export type { SnapshotErrorKind, SnapshotResult } from './errors.js';

/**
 * One package source. An empty name marks an unnamed entry.
 */
export interface MirrorEntry {
  readonly name: string;
  readonly url: string;
}

/**
 * Ordered list of package sources. Names may repeat (several unnamed
 * entries), so this is a list rather than a record.
 */
export type MirrorConfig = readonly MirrorEntry[];

/**
 * Lists snapshot dates available under a base URL
 */
export type SnapshotLister = (baseUrl?: string) => Promise<SnapshotResult<string[]>>;

/**
 * Clock used for the "not in the future" check
 */
export type Clock = () => Date;
