/**
 * List Command
 *
 * Print the snapshot dates available on the host.
 *
 * Usage:
 *   snapshot-mirror list [--url <base>]
 *
 * Options:
 *   --url <base>   Snapshot host (default: configured base URL)
 */

import type { Command } from 'commander';
import { createHTTPClient } from '../../core/http-client.js';
import { listSnapshots } from '../../snapshot/listing.js';
import type { CLIConfig } from '../lib/config.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, printOutput, printVerbose, reportFailure } from '../lib/output.js';

export interface ListOptions {
  readonly url?: string;
}

/**
 * Execute the list command
 */
export async function runList(options: ListOptions, config: CLIConfig): Promise<ExitCode> {
  const baseUrl = options.url ?? config.baseUrl;
  printVerbose(`Listing snapshots under ${baseUrl}`, config.verbose);

  const client = createHTTPClient({ timeoutMs: config.timeout });
  const result = await listSnapshots(baseUrl, { client });
  if (!result.success) {
    reportFailure(result.error, config.json);
    return exitCodeFor(result.error);
  }

  if (config.json) {
    printOutput(formatJson(result.data));
  } else if (result.data.length > 0) {
    printOutput(result.data.join('\n'));
  }
  return EXIT_CODES.SUCCESS;
}

/**
 * Register the list command
 */
export function registerListCommand(program: Command, getConfig: () => CLIConfig): void {
  program
    .command('list')
    .description('List the snapshot dates available on the host')
    .option('--url <base>', 'Snapshot host base URL')
    .action(async (options: ListOptions) => {
      const exitCode = await runList(options, getConfig());
      if (exitCode !== EXIT_CODES.SUCCESS) process.exitCode = exitCode;
    });
}
