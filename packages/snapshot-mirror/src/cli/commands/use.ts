/**
 * Use Command
 *
 * Switch a mirror configuration to a dated snapshot and print the result.
 * The starting configuration comes from `--repo` flags, or the `repos` map
 * of the config file when no flag is given.
 *
 * Usage:
 *   snapshot-mirror use <date> [options]
 *
 * Options:
 *   --url <base>        Snapshot host (default: configured base URL)
 *   --validate          Confirm the date exists on the host
 *   --repo <name=url>   Starting mirror entry (repeatable; "=url" is unnamed)
 */

import type { Command } from 'commander';
import { createHTTPClient } from '../../core/http-client.js';
import type { MirrorConfig, MirrorEntry } from '../../core/types.js';
import { listSnapshots } from '../../snapshot/listing.js';
import { InMemoryMirrorStore } from '../../snapshot/mirror-store.js';
import { useSnapshot } from '../../snapshot/switcher.js';
import type { CLIConfig } from '../lib/config.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, formatMirrorConfig, printOutput, printVerbose, reportFailure } from '../lib/output.js';

export interface UseOptions {
  readonly url?: string;
  readonly validate?: boolean;
  readonly repo?: readonly string[];
}

/**
 * Parse a `name=url` flag value; text before the first `=` is the name
 */
export function parseRepoSpec(spec: string): MirrorEntry {
  const separator = spec.indexOf('=');
  if (separator === -1) {
    return { name: '', url: spec };
  }
  return { name: spec.slice(0, separator), url: spec.slice(separator + 1) };
}

function collectRepo(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Execute the use command
 */
export async function runUse(date: string, options: UseOptions, config: CLIConfig): Promise<ExitCode> {
  const baseUrl = options.url ?? config.baseUrl;
  const initial: MirrorConfig =
    options.repo && options.repo.length > 0 ? options.repo.map(parseRepoSpec) : config.repos;
  const store = new InMemoryMirrorStore(initial);
  const client = createHTTPClient({ timeoutMs: config.timeout });

  printVerbose(`Switching ${initial.length} mirror entries to ${baseUrl} snapshot ${date}`, config.verbose);

  const result = await useSnapshot(date, {
    baseUrl,
    validate: options.validate ?? false,
    store,
    listSnapshots: (base) => listSnapshots(base, { client }),
  });
  if (!result.success) {
    reportFailure(result.error, config.json);
    return exitCodeFor(result.error);
  }

  printOutput(config.json ? formatJson(result.data) : formatMirrorConfig(result.data));
  return EXIT_CODES.SUCCESS;
}

/**
 * Register the use command
 */
export function registerUseCommand(program: Command, getConfig: () => CLIConfig): void {
  program
    .command('use <date>')
    .description('Point the default mirror at the snapshot for a date')
    .option('--url <base>', 'Snapshot host base URL')
    .option('--validate', 'Confirm the date exists on the host')
    .option('--repo <name=url>', 'Starting mirror entry (repeatable)', collectRepo)
    .action(async (date: string, options: UseOptions) => {
      const exitCode = await runUse(date, options, getConfig());
      if (exitCode !== EXIT_CODES.SUCCESS) process.exitCode = exitCode;
    });
}
