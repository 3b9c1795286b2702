/**
 * Mirror Store
 *
 * Holds the process-wide mirror configuration. The switcher reads and
 * writes through the `MirrorStore` interface, so tests and embedders can
 * hand it an isolated store instead of the shared one.
 *
 * Access is unsynchronized: callers must not switch mirrors while another
 * reader or writer is working on the same store.
 */

import type { MirrorConfig, MirrorEntry } from '../core/types.js';

export interface MirrorStore {
  get(): MirrorConfig;
  set(config: MirrorConfig): void;
}

function freezeConfig(config: MirrorConfig): MirrorConfig {
  return Object.freeze(config.map((entry) => Object.freeze({ name: entry.name, url: entry.url })));
}

export class InMemoryMirrorStore implements MirrorStore {
  private config: MirrorConfig;

  constructor(initial: MirrorConfig = []) {
    this.config = freezeConfig(initial);
  }

  get(): MirrorConfig {
    return this.config;
  }

  set(config: MirrorConfig): void {
    this.config = freezeConfig(config);
  }
}

/**
 * Build a configuration from a name → URL record, keeping key order
 */
export function mirrorConfigFromRecord(record: Readonly<Record<string, string>>): MirrorConfig {
  return Object.entries(record).map(([name, url]): MirrorEntry => ({ name, url }));
}

let defaultStore: MirrorStore | null = null;

/**
 * Get or create the process-wide store
 */
export function getMirrorStore(): MirrorStore {
  if (!defaultStore) {
    defaultStore = new InMemoryMirrorStore();
  }
  return defaultStore;
}

/**
 * Replace the process-wide store
 */
export function setMirrorStore(store: MirrorStore): void {
  defaultStore = store;
}
