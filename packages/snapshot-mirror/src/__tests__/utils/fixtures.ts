/**
 * Shared test helpers
 */

import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { vi } from 'vitest';

/**
 * Fixed clock: 15 June 2026, noon local time
 */
export const fixedNow = (): Date => new Date(2026, 5, 15, 12, 0, 0);

export const TODAY = '2026-06-15';
export const TOMORROW = '2026-06-16';

export const TEST_HOST = 'https://snapshots.example.test';

/**
 * Apache-style directory listing of two snapshots
 */
export const LISTING_HTML = [
  '<html><head><title>Index of /snapshot/</title></head><body>',
  '<h1>Index of /snapshot/</h1><hr><pre><a href="../">../</a>',
  '<a href="2014-09-17/">2014-09-17/</a>                                        17-Sep-2014 00:00       -',
  '<a href="2020-01-01/">2020-01-01/</a>                                        01-Jan-2020 00:00       -',
  '</pre><hr></body></html>',
  '',
].join('\n');

/**
 * Minimal fetch Response stand-in
 */
export function textResponse(body: string, status = 200, statusText = 'OK') {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: () => Promise.resolve(body),
  };
}

export function mockFetchText(body: string, status = 200, statusText = 'OK') {
  const fetchMock = vi.fn().mockResolvedValue(textResponse(body, status, statusText));
  global.fetch = fetchMock;
  return fetchMock;
}

export interface TempDir {
  readonly path: string;
  readonly url: string;
  cleanup(): Promise<void>;
}

export async function createTempDir(): Promise<TempDir> {
  const path = await mkdtemp(join(tmpdir(), 'snapshot-mirror-'));
  return {
    path,
    url: pathToFileURL(path).href,
    cleanup: () => rm(path, { recursive: true, force: true }),
  };
}

/**
 * Create `<root>/snapshot/<entry>` for each entry
 */
export async function createSnapshotDir(root: string, entries: readonly string[]): Promise<void> {
  const snapshotDir = join(root, 'snapshot');
  await mkdir(snapshotDir, { recursive: true });
  for (const entry of entries) {
    if (entry.includes('.')) {
      await writeFile(join(snapshotDir, entry), 'placeholder');
    } else {
      await mkdir(join(snapshotDir, entry));
    }
  }
}

const ENV_KEYS = [
  'SNAPSHOT_MIRROR_URL',
  'SNAPSHOT_MIRROR_CONFIG',
  'SNAPSHOT_MIRROR_TIMEOUT',
  'SNAPSHOT_MIRROR_VERBOSE',
  'SNAPSHOT_MIRROR_JSON',
] as const;

/**
 * Snapshot the SNAPSHOT_MIRROR_* variables and clear them; call the
 * returned function to restore them
 */
export function isolateEnv(): () => void {
  const saved = new Map<string, string | undefined>();
  for (const key of ENV_KEYS) {
    saved.set(key, process.env[key]);
    delete process.env[key];
  }
  return () => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  };
}
