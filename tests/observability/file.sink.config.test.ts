import { describe, it, expect } from 'vitest';
import { fileSinkOptionsFromEnv, parseFileSinkOptions, parseFlag } from '../../src/observability/logger/fileSinkConfig';
import { FileSinkConfigError } from '../../src/observability/logger/errors';

describe('parseFileSinkOptions', () => {
  it('fills defaults and freezes the result', () => {
    const config = parseFileSinkOptions({ filename: 'app.log' });
    expect(config).toEqual({
      path: 'app.log',
      mode: 'truncate',
      autoflush: true,
      closeAfterWrite: false,
      bufferSize: 8192,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('resolves the mode, with closeAfterWrite winning', () => {
    expect(parseFileSinkOptions({ filename: 'a.log', mode: 'append' }).mode).toBe('append');
    expect(parseFileSinkOptions({ filename: 'a.log', mode: 'write', closeAfterWrite: true }).mode).toBe('append');
    expect(parseFileSinkOptions({ filename: 'a.log', mode: 'garbled' }).mode).toBe('truncate');
  });

  it('ignores unknown keys', () => {
    const config = parseFileSinkOptions({ filename: 'a.log', name: 'file1', min_level: 'info' });
    expect(Object.keys(config).sort()).toEqual(['autoflush', 'bufferSize', 'closeAfterWrite', 'mode', 'path']);
  });

  it('requires a filename', () => {
    let caught: unknown;
    try {
      parseFileSinkOptions({ mode: 'append' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(FileSinkConfigError);
    if (caught instanceof FileSinkConfigError) {
      expect(caught.issues[0].path).toEqual(['filename']);
      expect(caught.message.startsWith('Invalid file sink options: filename:')).toBe(true);
    }
  });

  it('rejects an empty filename', () => {
    expect(() => parseFileSinkOptions({ filename: '' })).toThrow(FileSinkConfigError);
  });

  it('rejects non-boolean flags', () => {
    let caught: unknown;
    try {
      parseFileSinkOptions({ filename: 'a.log', autoflush: 'yes' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(FileSinkConfigError);
    if (caught instanceof FileSinkConfigError) {
      expect(caught.issues.map((issue) => issue.path)).toEqual([['autoflush']]);
    }
  });

  it('rejects a non-positive buffer size', () => {
    expect(() => parseFileSinkOptions({ filename: 'a.log', bufferSize: 0 })).toThrow(FileSinkConfigError);
  });
});

describe('parseFlag', () => {
  it('reads common on/off spellings and falls back otherwise', () => {
    expect(parseFlag('1', false)).toBe(true);
    expect(parseFlag(' TRUE ', false)).toBe(true);
    expect(parseFlag('on', false)).toBe(true);
    expect(parseFlag('0', true)).toBe(false);
    expect(parseFlag('off', true)).toBe(false);
    expect(parseFlag('maybe', true)).toBe(true);
    expect(parseFlag(undefined, false)).toBe(false);
  });
});

describe('fileSinkOptionsFromEnv', () => {
  it('returns undefined without LOG_FILE', () => {
    expect(fileSinkOptionsFromEnv({})).toBeUndefined();
    expect(fileSinkOptionsFromEnv({ LOG_FILE: '   ' })).toBeUndefined();
  });

  it('reads every option', () => {
    expect(
      fileSinkOptionsFromEnv({
        LOG_FILE: ' /tmp/app.log ',
        LOG_FILE_MODE: 'append',
        LOG_FILE_AUTOFLUSH: 'false',
        LOG_FILE_CLOSE_AFTER_WRITE: '1',
      })
    ).toEqual({
      filename: '/tmp/app.log',
      mode: 'append',
      autoflush: false,
      closeAfterWrite: true,
    });
  });

  it('keeps defaults for unset or unreadable flags', () => {
    expect(fileSinkOptionsFromEnv({ LOG_FILE: 'a.log', LOG_FILE_AUTOFLUSH: 'maybe' })).toEqual({
      filename: 'a.log',
      mode: undefined,
      autoflush: true,
      closeAfterWrite: false,
    });
  });
});
