/**
 * Snapshot Date Validation
 *
 * A snapshot date is a `YYYY-MM-DD` calendar date between the first
 * snapshot (2014-09-17) and today, inclusive. Optionally it must also
 * appear in the host's snapshot listing.
 *
 * @module snapshot/date
 */

import { z } from 'zod';
import { EARLIEST_SNAPSHOT_DATE } from '../core/constants.js';
import { fail, ok, type SnapshotResult } from '../core/errors.js';
import type { Clock, SnapshotLister } from '../core/types.js';
import { listSnapshots } from './listing.js';

function isCalendarDate(value: string): boolean {
  const [year, month, day] = value.split('-').map(Number);
  if (year === undefined || month === undefined || day === undefined) return false;
  // setUTCFullYear keeps years 0-99 literal; Date.UTC would map them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export const SnapshotDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Invalid date, must be in the format YYYY-MM-DD')
  .refine(isCalendarDate, 'Invalid date, must be in the format YYYY-MM-DD');

/**
 * Local calendar date of `date` as `YYYY-MM-DD`
 */
export function formatLocalDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Format and range checks only; never touches the network
 *
 * Zero-padded ISO dates order lexicographically, so plain string
 * comparison decides the range.
 */
export function checkSnapshotDate(date: string, now: Clock = () => new Date()): SnapshotResult<string> {
  const parsed = SnapshotDateSchema.safeParse(date);
  if (!parsed.success) {
    return fail('InvalidFormat', parsed.error.issues[0]?.message ?? 'Invalid date');
  }

  if (date < EARLIEST_SNAPSHOT_DATE) {
    return fail('TooEarly', `Snapshots are only available after ${EARLIEST_SNAPSHOT_DATE}`);
  }

  if (date > formatLocalDate(now())) {
    return fail('FutureDate', 'Snapshot date later than current date');
  }

  return ok(date);
}

export interface VerifyDateOptions {
  /** Confirm the date against the host's snapshot listing */
  readonly validate?: boolean;
  /** Host to confirm against (default: configured base URL) */
  readonly baseUrl?: string;
  readonly now?: Clock;
  /** Listing source used for confirmation */
  readonly listSnapshots?: SnapshotLister;
}

/**
 * Validate a snapshot date, optionally confirming it exists on the host
 *
 * Failure kinds: InvalidFormat, TooEarly, FutureDate, NotFound, plus any
 * listing failure (HostUnreachable, UnsupportedScheme) when confirming.
 */
export async function verifySnapshotDate(
  date: string,
  options: VerifyDateOptions = {}
): Promise<SnapshotResult<string>> {
  const checked = checkSnapshotDate(date, options.now);
  if (!checked.success || !options.validate) {
    return checked;
  }

  const lister = options.listSnapshots ?? listSnapshots;
  const listing = await lister(options.baseUrl);
  if (!listing.success) {
    return listing;
  }

  if (!listing.data.includes(date)) {
    return fail('NotFound', `Snapshot date ${date} does not exist on the snapshot host`);
  }

  return ok(date);
}
