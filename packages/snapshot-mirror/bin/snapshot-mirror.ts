#!/usr/bin/env tsx
/**
 * snapshot-mirror CLI Entry Point
 *
 * @module snapshot-mirror-cli
 */

import { main } from '../src/cli/index.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';

main().catch((error: unknown) => {
  console.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(EXIT_CODES.ERRORS);
});
