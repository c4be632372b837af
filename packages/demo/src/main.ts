/**
 * @fileoverview Demo Entry Point
 *
 * @module @scopelab/demo
 * @license Apache-2.0
 */

import { createLogger } from '@scopelab/core';

import { runDemo } from './app';
import { loadConfig } from './config';
import { ConfigError } from './errors';

const logger = createLogger({}, 'main');

async function main(): Promise<void> {
  const config = loadConfig();
  const { frames, records } = await runDemo({ config });

  frames.forEach((frame, index) => {
    process.stdout.write(`--- Frame ${index + 1} ---\n${frame.join('\n')}\n\n`);
  });
  process.stdout.write(`--- Log (${records.length} records) ---\n`);
  for (const record of records) {
    process.stdout.write(`${record.msg ?? ''}\n`);
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.fatal({ issues: error.issues }, error.message);
  } else {
    logger.fatal({ err: error }, 'Demo failed');
  }
  process.exitCode = 1;
});
