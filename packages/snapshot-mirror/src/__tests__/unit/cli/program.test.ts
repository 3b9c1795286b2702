/**
 * Commander program wiring tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createProgram } from '../../../cli/index.js';
import { isolateEnv } from '../../utils/fixtures.js';

describe('createProgram', () => {
  let restoreEnv: () => void;
  const originalLogLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    restoreEnv = isolateEnv();
    process.env.SNAPSHOT_MIRROR_CONFIG = '/nonexistent/.snapshot-mirrorrc';
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    restoreEnv();
    if (originalLogLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLogLevel;
    }
    vi.restoreAllMocks();
  });

  it('runs the url command with the command-line base URL', async () => {
    await createProgram().parseAsync(['node', 'snapshot-mirror', 'url', '2020-01-01', '--url', 'https://cli.example.test']);

    expect(console.log).toHaveBeenCalledWith('https://cli.example.test/snapshot/2020-01-01');
  });

  it('applies global flags before the command', async () => {
    process.env.SNAPSHOT_MIRROR_URL = 'https://env.example.test';

    await createProgram().parseAsync(['node', 'snapshot-mirror', '--json', 'url']);

    expect(console.log).toHaveBeenCalledWith('{"url":"https://env.example.test/snapshot"}');
  });

  it('quiets library logging unless LOG_LEVEL is set', async () => {
    delete process.env.LOG_LEVEL;

    await createProgram().parseAsync(['node', 'snapshot-mirror', 'url']);

    expect(process.env.LOG_LEVEL).toBe('warn');
  });
});
