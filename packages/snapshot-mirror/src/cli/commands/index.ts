/**
 * Command registration for the snapshot-mirror CLI
 *
 * Subcommands:
 *   list   List snapshot dates on the host
 *   url    Print a snapshot URL
 *   use    Switch a mirror configuration to a snapshot
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import type { CLIConfig } from '../lib/config.js';
import { registerListCommand } from './list.js';
import { registerUrlCommand } from './url.js';
import { registerUseCommand } from './use.js';

export function registerCommands(program: Command, getConfig: () => CLIConfig): void {
  registerListCommand(program, getConfig);
  registerUrlCommand(program, getConfig);
  registerUseCommand(program, getConfig);
}

export { runList, type ListOptions } from './list.js';
export { runUrl, type UrlOptions } from './url.js';
export { runUse, parseRepoSpec, type UseOptions } from './use.js';
