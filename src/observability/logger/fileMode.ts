import { constants } from 'node:fs';

export type FileMode = 'truncate' | 'append';

/**
 * Raw mode as callers pass it: 'write' | '>' | 'append' | '>>',
 * or the numeric O_APPEND flag (as a number or a digit string).
 */
export type RawFileMode = string | number | undefined;

const APPEND_KEYWORDS = new Set(['append', '>>']);

export interface ResolveFileModeInput {
  closeAfterWrite: boolean;
  mode?: RawFileMode;
}

/**
 * Resolves the open mode of a file sink.
 *
 * Never throws: anything that is not an explicit append request falls back
 * to truncate, including unknown strings.
 */
export function resolveFileMode(input: ResolveFileModeInput): FileMode {
  // reopening per message must never wipe earlier messages
  if (input.closeAfterWrite) return 'append';

  const mode = input.mode;
  if (mode === undefined) return 'truncate';

  if (typeof mode === 'number') {
    return mode === constants.O_APPEND ? 'append' : 'truncate';
  }

  if (APPEND_KEYWORDS.has(mode)) return 'append';
  if (/^\d+$/.test(mode) && Number(mode) === constants.O_APPEND) return 'append';

  return 'truncate';
}

export function openFlagsFor(mode: FileMode): 'w' | 'a' {
  return mode === 'append' ? 'a' : 'w';
}
