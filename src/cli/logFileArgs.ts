import { isLogLevel, type LogLevel } from '../infra/logger';
import { fileSinkOptionsFromEnv, parseFlag, type FileSinkOptions } from '../observability/logger/fileSinkConfig';

export interface LogFileArgs {
  sink: FileSinkOptions;
  level: LogLevel;
  timestamp: boolean;
}

export const LOG_FILE_USAGE =
  'Usage: log-file --file <path> [--mode write|append] [--close-after-write] [--no-autoflush] [--level debug|info|warn|error] [--timestamp]';

/**
 * `--key value` pairs; a flag followed by another flag (or nothing) reads as 'true'.
 * Returns undefined when no file is given by --file or LOG_FILE.
 */
export function parseLogFileArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): LogFileArgs | undefined {
  const lookup = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('--')) {
      const key = arg.replace(/^--/, '');
      const next = argv[i + 1];
      const val = next !== undefined && !next.startsWith('--') ? next : 'true';
      lookup.set(key, val);
      if (val === next) i += 1;
    }
  }

  const fromEnv = fileSinkOptionsFromEnv(env);
  const filename = lookup.get('file') ?? fromEnv?.filename;
  if (!filename) return undefined;

  const rawLevel = (lookup.get('level') ?? 'info').toLowerCase();

  return {
    sink: {
      filename,
      mode: lookup.get('mode') ?? fromEnv?.mode,
      autoflush: lookup.has('no-autoflush') ? !parseFlag(lookup.get('no-autoflush'), true) : fromEnv?.autoflush ?? true,
      closeAfterWrite: parseFlag(lookup.get('close-after-write'), fromEnv?.closeAfterWrite ?? false),
    },
    level: isLogLevel(rawLevel) ? rawLevel : 'info',
    timestamp: parseFlag(lookup.get('timestamp'), false),
  };
}
