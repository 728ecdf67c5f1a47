import { z } from 'zod';
import { FileSinkConfigError } from './errors';
import { DEFAULT_BUFFER_SIZE } from './FileHandleManager';
import { resolveFileMode, type FileMode } from './fileMode';

// Unknown keys are stripped, not rejected.
const fileSinkOptionsSchema = z.object({
  filename: z.string().min(1),
  mode: z.union([z.string(), z.number()]).optional(),
  autoflush: z.boolean().default(true),
  closeAfterWrite: z.boolean().default(false),
  bufferSize: z.number().int().positive().default(DEFAULT_BUFFER_SIZE),
});

export type FileSinkOptions = z.input<typeof fileSinkOptionsSchema>;

export interface SinkConfig {
  readonly path: string;
  readonly mode: FileMode;
  readonly autoflush: boolean;
  readonly closeAfterWrite: boolean;
  readonly bufferSize: number;
}

export function parseFileSinkOptions(options: unknown): SinkConfig {
  const parsed = fileSinkOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new FileSinkConfigError(
      parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message }))
    );
  }

  const { filename, mode, autoflush, closeAfterWrite, bufferSize } = parsed.data;
  return Object.freeze({
    path: filename,
    mode: resolveFileMode({ closeAfterWrite, mode }),
    autoflush,
    closeAfterWrite,
    bufferSize,
  });
}

const TRUE_FLAGS = ['1', 'on', 'true', 'yes'];
const FALSE_FLAGS = ['0', 'off', 'false', 'no'];

export function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const value = raw.trim().toLowerCase();
  if (TRUE_FLAGS.includes(value)) return true;
  if (FALSE_FLAGS.includes(value)) return false;
  return fallback;
}

/**
 * LOG_FILE, LOG_FILE_MODE, LOG_FILE_AUTOFLUSH, LOG_FILE_CLOSE_AFTER_WRITE.
 * Returns undefined when LOG_FILE is unset or blank.
 */
export function fileSinkOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): FileSinkOptions | undefined {
  const filename = env.LOG_FILE?.trim();
  if (!filename) return undefined;
  return {
    filename,
    mode: env.LOG_FILE_MODE,
    autoflush: parseFlag(env.LOG_FILE_AUTOFLUSH, true),
    closeAfterWrite: parseFlag(env.LOG_FILE_CLOSE_AFTER_WRITE, false),
  };
}
