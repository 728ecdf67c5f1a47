import type { LogEntry, LogSink } from '../../infra/logger';
import { FileHandleManager } from './FileHandleManager';
import { parseFileSinkOptions, type FileSinkOptions, type SinkConfig } from './fileSinkConfig';
import type { FileMode } from './fileMode';

/**
 * Writes already formatted messages to a file.
 *
 * Level thresholds and message callbacks belong to the logger; the sink
 * writes `entry.message` byte for byte.
 */
export class FileSink implements LogSink {
  readonly kind = 'file' as const;
  private readonly config: SinkConfig;
  private readonly handle: FileHandleManager;

  constructor(options: FileSinkOptions) {
    this.config = parseFileSinkOptions(options);
    this.handle = new FileHandleManager(this.config.path, {
      mode: this.config.mode,
      autoflush: this.config.autoflush,
      closeAfterWrite: this.config.closeAfterWrite,
      bufferSize: this.config.bufferSize,
    });
  }

  get path(): string {
    return this.config.path;
  }

  get mode(): FileMode {
    return this.config.mode;
  }

  get autoflush(): boolean {
    return this.config.autoflush;
  }

  get closeAfterWrite(): boolean {
    return this.config.closeAfterWrite;
  }

  isOpen(): boolean {
    return this.handle.isOpen();
  }

  logMessage(message: string): void {
    this.handle.write(message);
  }

  write(entry: LogEntry, _formatted?: string): void {
    this.logMessage(entry.message);
  }

  flush(): void {
    this.handle.flush();
  }

  close(): void {
    this.handle.close();
  }
}

/**
 * Runs `fn` with a fresh sink and closes it on every exit path.
 */
export async function withFileSink<T>(
  options: FileSinkOptions,
  fn: (sink: FileSink) => T | Promise<T>
): Promise<T> {
  const sink = new FileSink(options);
  try {
    return await fn(sink);
  } finally {
    sink.close();
  }
}
