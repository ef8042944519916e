#!/usr/bin/env node
/**
 * resonance-loop - turn-by-turn conversational quality controller
 *
 * Entry point: loads config, runs one scripted session through the
 * regulation pipeline and prints the report.
 */

import 'dotenv/config';

import { createConfigLoader } from './config/config-loader.js';
import { createLogger } from './core/logger.js';
import { createSessionRunner } from './core/session-runner.js';
import { loadDialog } from './simulation/dialog.js';

async function main(): Promise<void> {
  const dataPath = process.env['DATA_PATH'];
  const loader = createConfigLoader(dataPath ? `${dataPath}/config` : undefined);
  const config = await loader.load();

  const logger = createLogger({
    logDir: config.logging.logDir,
    maxFiles: config.logging.maxFiles,
    level: config.logging.level,
    pretty: config.logging.pretty,
  });

  for (const warning of loader.getWarnings()) {
    logger.warn({ warning }, 'Config value ignored');
  }

  const turns = await loadDialog(config.session, logger);
  const runner = createSessionRunner({ logger, config });
  const summary = await runner.run(turns);

  // Non-zero only for a strict run with baseline breaches
  process.exitCode = summary.exitCode;
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start:', error);
  process.exitCode = 1;
});
