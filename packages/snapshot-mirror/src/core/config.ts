/**
 * snapshot-mirror configuration
 *
 * The snapshot host is read at call time, so changing the environment or
 * the rc file between calls takes effect without a restart.
 *
 * Base URL precedence (highest to lowest):
 * 1. Explicit argument
 * 2. SNAPSHOT_MIRROR_URL environment variable
 * 3. `snapshotUrl` in the rc file (.snapshot-mirrorrc, or SNAPSHOT_MIRROR_CONFIG)
 * 4. DEFAULT_SNAPSHOT_HOST
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { BASE_URL_ENV_VAR, DEFAULT_SNAPSHOT_HOST } from './constants.js';

// ============================================================================
// Config File Schema
// ============================================================================

export const ConfigFileSchema = z.object({
  version: z.literal(1).optional(),
  snapshotUrl: z.string().min(1, 'snapshotUrl must not be empty').optional(),
  timeout: z.number().int().positive('timeout must be a positive number').optional(),
  verbose: z.boolean().optional(),
  json: z.boolean().optional(),
  /** Mirror entries seeding the mirror store, in file order */
  repos: z.record(z.string()).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Raised when the rc file cannot be read or fails validation
 */
export class ConfigError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'ConfigError';
    this.path = path;
  }
}

// ============================================================================
// Config File Discovery
// ============================================================================

export const CONFIG_FILE_NAMES = [
  '.snapshot-mirrorrc',
  '.snapshot-mirrorrc.yaml',
  '.snapshot-mirrorrc.yml',
  '.snapshot-mirrorrc.json',
] as const;

export const CONFIG_PATH_ENV_VAR = 'SNAPSHOT_MIRROR_CONFIG';

/**
 * Find config file in the given directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate a config file
 *
 * YAML is a superset of JSON, so one parser covers every file name.
 *
 * @throws {ConfigError} If the file is unreadable or invalid
 */
export function readConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  // An empty file parses to null
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${filePath}: ${issues}`, filePath);
  }

  return parsed.data;
}

/**
 * Locate the rc file: SNAPSHOT_MIRROR_CONFIG first, then a search upward
 * from the working directory
 */
export function locateConfigFile(cwd: string = process.cwd()): string | null {
  const envPath = process.env[CONFIG_PATH_ENV_VAR];
  if (envPath) {
    const filePath = resolve(cwd, envPath);
    return existsSync(filePath) ? filePath : null;
  }
  return findConfigFile(cwd);
}

// ============================================================================
// Base URL Resolution
// ============================================================================

/**
 * Resolve the snapshot host base URL
 *
 * @throws {ConfigError} If an rc file is found but invalid
 */
export function resolveBaseUrl(explicit?: string): string {
  if (explicit) {
    return explicit;
  }

  const fromEnv = process.env[BASE_URL_ENV_VAR];
  if (fromEnv) {
    return fromEnv;
  }

  const configPath = locateConfigFile();
  if (configPath) {
    const fileConfig = readConfigFile(configPath);
    if (fileConfig.snapshotUrl) {
      return fileConfig.snapshotUrl;
    }
  }

  return DEFAULT_SNAPSHOT_HOST;
}
