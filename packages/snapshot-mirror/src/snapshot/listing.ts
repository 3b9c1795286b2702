/**
 * Snapshot Listing
 *
 * Reads the index of available snapshot dates from `<base>/snapshot`.
 * HTTP(S) hosts serve an HTML directory listing; `file://` bases point at a
 * local directory whose entries are the dates.
 *
 * @module snapshot/listing
 */

import { readdir } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { resolveBaseUrl } from '../core/config.js';
import { DATE_PATTERN } from '../core/constants.js';
import { fail, ok, type SnapshotResult } from '../core/errors.js';
import { getHTTPClient, type HTTPClient } from '../core/http-client.js';
import { createLogger } from '../core/utils/logger.js';
import { snapshotUrl } from './url.js';

const logger = createLogger({ module: 'listing' });

/**
 * Anchor whose text starts with a date: `<a href="2020-01-01/">2020-01-01/</a>`
 */
const ANCHOR_DATE_PATTERN = new RegExp(`<a href=.*?>(${DATE_PATTERN.source}).*?</a>`, 'i');

export interface ExtractOptions {
  /** Lines come from an HTML listing and carry markup around the date */
  readonly html?: boolean;
}

/**
 * Keep the lines that mention a date; for HTML listings reduce each line to
 * the date it links to
 */
export function extractSnapshotDates(lines: readonly string[], options: ExtractOptions = {}): string[] {
  const dated = lines.filter((line) => DATE_PATTERN.test(line));
  if (!options.html) {
    return dated;
  }

  return dated.map((line) => {
    const anchor = ANCHOR_DATE_PATTERN.exec(line);
    if (anchor?.[1]) {
      return anchor[1];
    }
    // A dated line outside an anchor still yields its first date
    const bare = DATE_PATTERN.exec(line);
    return bare ? bare[0] : line;
  });
}

export interface ListSnapshotsOptions {
  /** HTTP client for http(s) hosts (default: shared client) */
  readonly client?: HTTPClient;
  /** Per-request timeout override */
  readonly timeoutMs?: number;
}

/**
 * List the snapshot dates available under a base URL
 *
 * Order follows the server (or filesystem); it is not sorted.
 *
 * Failure kinds: HostUnreachable, UnsupportedScheme
 */
export async function listSnapshots(
  baseUrl?: string,
  options: ListSnapshotsOptions = {}
): Promise<SnapshotResult<string[]>> {
  const base = resolveBaseUrl(baseUrl);
  const indexUrl = snapshotUrl(base);

  if (/^https?:\/\//.test(base)) {
    const client = options.client ?? getHTTPClient();
    let lines: string[];
    try {
      lines = await client.fetchLines(indexUrl, { timeoutMs: options.timeoutMs });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logger.warn('Snapshot listing request failed', { url: indexUrl, error: cause.message });
      return fail('HostUnreachable', `Unable to contact snapshot host: ${indexUrl}`, cause);
    }

    const dates = extractSnapshotDates(lines, { html: true });
    logger.debug('Fetched snapshot listing', { url: indexUrl, count: dates.length });
    return ok(dates);
  }

  if (/^file:\/\//.test(base)) {
    let entries: string[];
    try {
      entries = await readdir(fileURLToPath(indexUrl));
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logger.warn('Snapshot directory unreadable', { url: indexUrl, error: cause.message });
      return fail('HostUnreachable', `Unable to read snapshot directory: ${indexUrl}`, cause);
    }

    return ok(extractSnapshotDates(entries));
  }

  return fail('UnsupportedScheme', `Invalid URL scheme: ${base}`);
}
