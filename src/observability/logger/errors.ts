import type { FileMode } from './fileMode';

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class FileSinkOpenError extends Error {
  readonly filePath: string;
  readonly mode: FileMode;
  readonly code?: string;
  readonly originalError?: unknown;

  constructor(filePath: string, mode: FileMode, originalError?: unknown) {
    super(`Can't write to '${filePath}': ${describe(originalError)}`, { cause: originalError });
    this.name = 'FileSinkOpenError';
    this.filePath = filePath;
    this.mode = mode;
    this.code = errnoCode(originalError);
    this.originalError = originalError;
  }
}

export class FileSinkClosedError extends Error {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`File sink for '${filePath}' is closed`);
    this.name = 'FileSinkClosedError';
    this.filePath = filePath;
  }
}

export interface ConfigIssue {
  path: Array<string | number>;
  message: string;
}

export class FileSinkConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    const summary = issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`).join('; ');
    super(`Invalid file sink options: ${summary}`);
    this.name = 'FileSinkConfigError';
    this.issues = issues;
  }
}
