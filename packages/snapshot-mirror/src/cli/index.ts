/**
 * snapshot-mirror CLI
 *
 * Builds the commander program. The entry point in bin/ only parses argv.
 *
 * @module cli
 */

import { Command } from 'commander';
import { ConfigError } from '../core/config.js';
import { createLogger } from '../core/utils/logger.js';
import { registerCommands } from './commands/index.js';
import { loadConfig, type CLIConfig } from './lib/config.js';
import { EXIT_CODES } from './lib/exit-codes.js';

export const CLI_NAME = 'snapshot-mirror';
export const CLI_VERSION = '1.0.0';

type GlobalOptions = {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly timeout?: number;
};

function parseTimeout(value: string): number {
  return parseInt(value, 10);
}

export function createProgram(): Command {
  let config: CLIConfig | null = null;
  const getConfig = (): CLIConfig => {
    if (!config) {
      throw new Error('Configuration not loaded. Commands run after the preAction hook.');
    }
    return config;
  };

  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Point package mirrors at dated snapshots')
    .version(CLI_VERSION, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .snapshot-mirrorrc)')
    .option('--timeout <ms>', 'HTTP timeout in milliseconds', parseTimeout)
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      let loaded: CLIConfig;
      try {
        loaded = loadConfig({
          configPath: options.config,
          overrides: {
            verbose: options.verbose,
            json: options.json,
            timeout: options.timeout,
          },
        });
      } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        console.error(`Configuration error: ${error.message}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }

      config = loaded;
      // Library logs would interleave with command output; keep them quiet unless asked
      if (!process.env.LOG_LEVEL) {
        process.env.LOG_LEVEL = loaded.verbose ? 'debug' : 'warn';
      }
      const logger = createLogger({ module: 'cli' });
      logger.debug('Loaded configuration', {
        configPath: loaded.configPath,
        baseUrl: loaded.baseUrl,
      });
    });

  registerCommands(program, getConfig);
  return program;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  await createProgram().parseAsync([...argv]);
}

export { loadConfig, type CLIConfig } from './lib/config.js';
export { EXIT_CODES, type ExitCode } from './lib/exit-codes.js';
export * from './commands/index.js';
