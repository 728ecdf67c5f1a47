import readline from 'node:readline';
import type { Readable } from 'node:stream';
import type { Logger, MessageCallback } from '../infra/logger';
import { appendNewline, timestampPrefix } from '../infra/logCallbacks';
import { FileSink } from '../observability/logger/FileSink';
import { LOG_FILE_USAGE, parseLogFileArgs } from './logFileArgs';

export interface LogFileRunOptions {
  argv: string[];
  input: Readable;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
}

const SINK_NAME = 'file';

/**
 * Logs every line of `input` into one FileSink. Resolves to the exit code.
 */
export async function runLogFile(options: LogFileRunOptions): Promise<number> {
  const { logger } = options;
  const args = parseLogFileArgs(options.argv, options.env ?? process.env);
  if (!args) {
    logger.ui(LOG_FILE_USAGE);
    return 1;
  }

  logger.setLevel(args.level);

  const callbacks: MessageCallback[] = args.timestamp ? [timestampPrefix(options.now), appendNewline] : [appendNewline];
  let sink: FileSink;
  try {
    sink = new FileSink(args.sink);
  } catch (err) {
    logger.error('[log-file] cannot open log file:', err);
    return 1;
  }
  logger.addSink(sink, { name: SINK_NAME, minLevel: args.level, callbacks });

  const rl = readline.createInterface({ input: options.input, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      logger.logTo(SINK_NAME, args.level, line);
    }
  } finally {
    rl.close();
    await logger.close();
  }
  return 0;
}
