/**
 * Output Formatting for CLI Commands
 *
 * Plain text for interactive use, JSON when `--json` is set.
 *
 * @module cli/lib/output
 */

import type { SnapshotError } from '../../core/errors.js';
import type { MirrorConfig } from '../../core/types.js';

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * One `name<TAB>url` line per mirror entry
 */
export function formatMirrorConfig(config: MirrorConfig): string {
  return config.map((entry) => `${entry.name}\t${entry.url}`).join('\n');
}

/**
 * Print output to console
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

/**
 * Report a failed operation in the selected output mode
 */
export function reportFailure(error: SnapshotError, json: boolean): void {
  if (json) {
    printOutput(formatJson({ error: error.message, kind: error.kind }, false));
  } else {
    printError(error.message);
  }
}

/**
 * Print verbose output (only if verbose mode) to stderr, keeping stdout
 * parseable in JSON mode
 */
export function printVerbose(message: string, verbose: boolean): void {
  if (verbose) {
    console.error(`[verbose] ${message}`);
  }
}
