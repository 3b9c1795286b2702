/**
 * Snapshot Mirror Error Types
 *
 * Every failure the library reports belongs to a closed set of kinds.
 * Operations return a result union instead of throwing; `unwrap` turns a
 * failed result back into a thrown error for callers that prefer exceptions
 * (the CLI, for instance).
 */

/**
 * Failure kinds
 */
export type SnapshotErrorKind =
  | 'InvalidFormat'
  | 'TooEarly'
  | 'FutureDate'
  | 'NotFound'
  | 'UnsupportedScheme'
  | 'HostUnreachable';

export const SNAPSHOT_ERROR_KINDS: readonly SnapshotErrorKind[] = [
  'InvalidFormat',
  'TooEarly',
  'FutureDate',
  'NotFound',
  'UnsupportedScheme',
  'HostUnreachable',
];

/**
 * Error carrying a failure kind
 *
 * RECOVERY:
 * - InvalidFormat / TooEarly / FutureDate: pass a YYYY-MM-DD date between
 *   2014-09-17 and today
 * - NotFound: pick a date from the snapshot listing
 * - UnsupportedScheme: use an http://, https:// or file:// base URL
 * - HostUnreachable: check the base URL and network access
 */
export class SnapshotError extends Error {
  readonly kind: SnapshotErrorKind;
  override readonly cause?: Error;

  constructor(kind: SnapshotErrorKind, message: string, cause?: Error) {
    super(message);
    this.name = 'SnapshotError';
    this.kind = kind;
    this.cause = cause;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SnapshotError);
    }
  }
}

/**
 * Outcome of a library operation
 */
export type SnapshotResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: SnapshotError };

export function ok<T>(data: T): SnapshotResult<T> {
  return { success: true, data };
}

export function fail<T>(kind: SnapshotErrorKind, message: string, cause?: Error): SnapshotResult<T> {
  return { success: false, error: new SnapshotError(kind, message, cause) };
}

/**
 * Return the data of a successful result, throw the error of a failed one
 *
 * @throws {SnapshotError}
 */
export function unwrap<T>(result: SnapshotResult<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

export function isSnapshotError(error: unknown): error is SnapshotError {
  return error instanceof SnapshotError;
}
