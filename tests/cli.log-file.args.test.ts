import { describe, it, expect } from 'vitest';
import { parseLogFileArgs } from '../src/cli/logFileArgs';

describe('log-file CLI arguments', () => {
  it('needs a file from --file or LOG_FILE', () => {
    expect(parseLogFileArgs([], {})).toBeUndefined();
    expect(parseLogFileArgs(['--mode', 'append'], {})).toBeUndefined();
  });

  it('uses defaults for a bare --file', () => {
    expect(parseLogFileArgs(['--file', '/tmp/app.log'], {})).toEqual({
      sink: { filename: '/tmp/app.log', mode: undefined, autoflush: true, closeAfterWrite: false },
      level: 'info',
      timestamp: false,
    });
  });

  it('reads every flag', () => {
    const args = parseLogFileArgs(
      ['--file', 'a.log', '--mode', 'append', '--close-after-write', '--no-autoflush', '--level', 'DEBUG', '--timestamp'],
      {}
    );
    expect(args).toEqual({
      sink: { filename: 'a.log', mode: 'append', autoflush: false, closeAfterWrite: true },
      level: 'debug',
      timestamp: true,
    });
  });

  it('falls back to LOG_FILE_* variables', () => {
    const args = parseLogFileArgs([], {
      LOG_FILE: '/var/tmp/x.log',
      LOG_FILE_MODE: '>>',
      LOG_FILE_CLOSE_AFTER_WRITE: 'on',
    });
    expect(args?.sink).toEqual({ filename: '/var/tmp/x.log', mode: '>>', autoflush: true, closeAfterWrite: true });
  });

  it('lets flags override the environment', () => {
    const args = parseLogFileArgs(['--file', 'cli.log', '--close-after-write', 'false'], {
      LOG_FILE: 'env.log',
      LOG_FILE_CLOSE_AFTER_WRITE: '1',
    });
    expect(args?.sink.filename).toBe('cli.log');
    expect(args?.sink.closeAfterWrite).toBe(false);
  });

  it('ignores an unknown level', () => {
    expect(parseLogFileArgs(['--file', 'a.log', '--level', 'loud'], {})?.level).toBe('info');
  });
});
