#!/usr/bin/env node
import { logger } from '../infra/logger';
import { runLogFile } from '../cli/logFile';

// Pipes stdin into a log file, one record per line:
//   some-command | log-file --file ./logs/app.log --mode append --timestamp

async function main(): Promise<void> {
  logger.installShutdownHooks();
  process.exitCode = await runLogFile({ argv: process.argv.slice(2), input: process.stdin, logger });
}

main().catch((err) => {
  logger.setDisplay(true);
  logger.error('[log-file] fatal:', err);
  process.exitCode = 1;
});
