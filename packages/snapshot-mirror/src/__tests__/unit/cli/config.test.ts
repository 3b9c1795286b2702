/**
 * CLI configuration loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { loadConfig } from '../../../cli/lib/config.js';
import { ConfigError } from '../../../core/config.js';
import { DEFAULT_SNAPSHOT_HOST } from '../../../core/constants.js';
import { createTempDir, isolateEnv, type TempDir } from '../../utils/fixtures.js';

describe('loadConfig', () => {
  let dir: TempDir;
  let restoreEnv: () => void;

  beforeEach(async () => {
    dir = await createTempDir();
    restoreEnv = isolateEnv();
  });

  afterEach(async () => {
    restoreEnv();
    await dir.cleanup();
  });

  it('uses defaults without a config file', () => {
    expect(loadConfig({ cwd: dir.path })).toEqual({
      baseUrl: DEFAULT_SNAPSHOT_HOST,
      timeout: 30000,
      verbose: false,
      json: false,
      repos: [],
      configPath: null,
    });
  });

  it('reads the rc file from the working directory', async () => {
    const path = join(dir.path, '.snapshot-mirrorrc');
    await writeFile(
      path,
      [
        'snapshotUrl: https://rc.example.test',
        'timeout: 1500',
        'json: true',
        'repos:',
        '  CRAN: https://cran.example.test',
        '  internal: https://pkgs.example.test',
        '',
      ].join('\n')
    );

    expect(loadConfig({ cwd: dir.path })).toEqual({
      baseUrl: 'https://rc.example.test',
      timeout: 1500,
      verbose: false,
      json: true,
      repos: [
        { name: 'CRAN', url: 'https://cran.example.test' },
        { name: 'internal', url: 'https://pkgs.example.test' },
      ],
      configPath: path,
    });
  });

  it('lets environment variables override the file', async () => {
    await writeFile(join(dir.path, '.snapshot-mirrorrc'), 'snapshotUrl: https://rc.example.test\ntimeout: 1500\n');
    process.env.SNAPSHOT_MIRROR_URL = 'https://env.example.test';
    process.env.SNAPSHOT_MIRROR_TIMEOUT = '2500';
    process.env.SNAPSHOT_MIRROR_VERBOSE = '1';

    const config = loadConfig({ cwd: dir.path });

    expect(config.baseUrl).toBe('https://env.example.test');
    expect(config.timeout).toBe(2500);
    expect(config.verbose).toBe(true);
  });

  it('lets flags override everything', async () => {
    await writeFile(join(dir.path, '.snapshot-mirrorrc'), 'timeout: 1500\njson: true\n');
    process.env.SNAPSHOT_MIRROR_TIMEOUT = '2500';

    const config = loadConfig({
      cwd: dir.path,
      overrides: { timeout: 100, json: false, baseUrl: 'file:///srv/mirror' },
    });

    expect(config.timeout).toBe(100);
    expect(config.json).toBe(false);
    expect(config.baseUrl).toBe('file:///srv/mirror');
  });

  it('loads an explicit config path', async () => {
    await writeFile(join(dir.path, 'custom.yaml'), 'verbose: true\n');

    const config = loadConfig({ cwd: dir.path, configPath: 'custom.yaml' });

    expect(config.verbose).toBe(true);
    expect(config.configPath).toBe(join(dir.path, 'custom.yaml'));
  });

  it('fails when an explicit config path is missing', () => {
    expect(() => loadConfig({ cwd: dir.path, configPath: 'missing.yaml' })).toThrow(ConfigError);
  });

  it('treats an empty SNAPSHOT_MIRROR_URL as unset', () => {
    process.env.SNAPSHOT_MIRROR_URL = '';
    expect(loadConfig({ cwd: dir.path }).baseUrl).toBe(DEFAULT_SNAPSHOT_HOST);
  });

  it('rejects a non-positive timeout', () => {
    expect(() => loadConfig({ cwd: dir.path, overrides: { timeout: 0 } })).toThrow('Timeout must be a positive number');
  });
});
