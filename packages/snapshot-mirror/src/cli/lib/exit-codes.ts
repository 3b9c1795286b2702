import type { SnapshotError } from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: SnapshotError): ExitCode {
  return error.kind === 'HostUnreachable' ? EXIT_CODES.NETWORK_ERROR : EXIT_CODES.ERRORS;
}
