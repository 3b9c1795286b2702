/**
 * URL Command
 *
 * Print the snapshot URL for a date, or the snapshot index URL without one.
 * The date is not validated.
 *
 * Usage:
 *   snapshot-mirror url [date] [--url <base>]
 */

import type { Command } from 'commander';
import { snapshotUrl } from '../../snapshot/url.js';
import type { CLIConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, printOutput } from '../lib/output.js';

export interface UrlOptions {
  readonly url?: string;
}

export function runUrl(date: string | undefined, options: UrlOptions, config: CLIConfig): ExitCode {
  const url = snapshotUrl(options.url ?? config.baseUrl, date);
  printOutput(config.json ? formatJson({ url }, false) : url);
  return EXIT_CODES.SUCCESS;
}

export function registerUrlCommand(program: Command, getConfig: () => CLIConfig): void {
  program
    .command('url [date]')
    .description('Print the snapshot URL for a date')
    .option('--url <base>', 'Snapshot host base URL')
    .action((date: string | undefined, options: UrlOptions) => {
      runUrl(date, options, getConfig());
    });
}
