/**
 * snapshot-mirror CLI Configuration Management
 *
 * Loads configuration from .snapshot-mirrorrc (YAML or JSON) with
 * environment variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (SNAPSHOT_MIRROR_*)
 * 3. Config file (.snapshot-mirrorrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigError, locateConfigFile, readConfigFile, type ConfigFile } from '../../core/config.js';
import { BASE_URL_ENV_VAR, DEFAULT_SNAPSHOT_HOST } from '../../core/constants.js';
import type { MirrorConfig } from '../../core/types.js';
import { mirrorConfigFromRecord } from '../../snapshot/mirror-store.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface CLIConfig {
  /** Snapshot host base URL */
  readonly baseUrl: string;
  /** HTTP timeout in milliseconds */
  readonly timeout: number;
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Initial mirror configuration for `use` */
  readonly repos: MirrorConfig;
  /** Resolved config file path */
  readonly configPath: string | null;
}

export const DEFAULT_CONFIG: Omit<CLIConfig, 'configPath'> = {
  baseUrl: DEFAULT_SNAPSHOT_HOST,
  timeout: 30000,
  verbose: false,
  json: false,
  repos: [],
};

// ============================================================================
// Environment Helpers
// ============================================================================

function getEnvVar(name: string): string | undefined {
  return process.env[`SNAPSHOT_MIRROR_${name}`];
}

function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

// ============================================================================
// Configuration Loading
// ============================================================================

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory the config file search starts from (default: cwd) */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    baseUrl?: string;
    timeout?: number;
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigError} If the config file is missing (when given explicitly) or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const cwd = options.cwd ?? process.cwd();
  let configPath: string | null;

  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
  } else {
    configPath = locateConfigFile(cwd);
  }

  const fileConfig: ConfigFile = configPath ? readConfigFile(configPath) : {};

  const config: CLIConfig = {
    baseUrl:
      options.overrides?.baseUrl ??
      (process.env[BASE_URL_ENV_VAR] || undefined) ??
      fileConfig.snapshotUrl ??
      DEFAULT_CONFIG.baseUrl,
    timeout:
      options.overrides?.timeout ??
      getEnvNumber('TIMEOUT') ??
      fileConfig.timeout ??
      DEFAULT_CONFIG.timeout,
    verbose:
      options.overrides?.verbose ?? getEnvBool('VERBOSE') ?? fileConfig.verbose ?? DEFAULT_CONFIG.verbose,
    json: options.overrides?.json ?? getEnvBool('JSON') ?? fileConfig.json ?? DEFAULT_CONFIG.json,
    repos: fileConfig.repos ? mirrorConfigFromRecord(fileConfig.repos) : DEFAULT_CONFIG.repos,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Validate merged configuration
 *
 * @throws {ConfigError}
 */
export function validateConfig(config: CLIConfig): void {
  if (!Number.isFinite(config.timeout) || config.timeout <= 0) {
    throw new ConfigError('Timeout must be a positive number', config.configPath ?? '');
  }
  if (config.baseUrl.trim() === '') {
    throw new ConfigError('Base URL must not be empty', config.configPath ?? '');
  }
}
