import fs from 'node:fs';
import { FileSinkClosedError, FileSinkOpenError } from './errors';
import { openFlagsFor, type FileMode } from './fileMode';

export interface FileHandleManagerOptions {
  mode: FileMode;
  autoflush: boolean;
  closeAfterWrite: boolean;
  bufferSize?: number;
}

export const DEFAULT_BUFFER_SIZE = 8192;

// managers currently holding a descriptor
const openManagers = new Set<FileHandleManager>();
let exitHookInstalled = false;

function installExitHook(): void {
  if (exitHookInstalled) return;
  exitHookInstalled = true;
  process.on('exit', () => {
    try {
      closeAllFileHandles();
    } catch (err) {
      process.stderr.write(`log file close on exit failed: ${err instanceof Error ? err.message : String(err)}\n`);
    }
  });
}

/**
 * Closes every descriptor still held by a manager. Throws the first flush
 * failure after all of them are closed.
 */
export function closeAllFileHandles(): void {
  let firstError: unknown;
  for (const manager of [...openManagers]) {
    try {
      manager.close();
    } catch (err) {
      firstError ??= err;
    }
  }
  if (firstError !== undefined) throw firstError;
}

export function openFileHandleCount(): number {
  return openManagers.size;
}

export function openFile(filePath: string, mode: FileMode): number {
  try {
    return fs.openSync(filePath, openFlagsFor(mode));
  } catch (err) {
    throw new FileSinkOpenError(filePath, mode, err);
  }
}

export function closeFile(fd: number): void {
  try {
    fs.closeSync(fd);
  } catch {
    // a failed close must not mask the write that preceded it
  }
}

function writeFully(fd: number, bytes: Uint8Array): void {
  let offset = 0;
  while (offset < bytes.length) {
    offset += fs.writeSync(fd, bytes, offset, bytes.length - offset);
  }
}

/**
 * Owns the descriptor behind a file sink.
 *
 * Persistent (closeAfterWrite = false): the file is opened in the
 * constructor and closed once by close().
 * Ephemeral (closeAfterWrite = true): every write opens, writes and closes;
 * nothing is held between writes.
 */
export class FileHandleManager {
  private readonly filePath: string;
  private readonly mode: FileMode;
  private readonly autoflush: boolean;
  private readonly closeAfterWrite: boolean;
  private readonly bufferSize: number;
  private fd?: number;
  private pending: Uint8Array[] = [];
  private pendingBytes = 0;
  private closed = false;

  constructor(filePath: string, options: FileHandleManagerOptions) {
    this.filePath = filePath;
    this.mode = options.mode;
    this.autoflush = options.autoflush;
    this.closeAfterWrite = options.closeAfterWrite;
    this.bufferSize = Math.max(1, Math.floor(options.bufferSize ?? DEFAULT_BUFFER_SIZE));

    if (!this.closeAfterWrite) {
      this.attach(openFile(this.filePath, this.mode));
    }
  }

  get path(): string {
    return this.filePath;
  }

  isOpen(): boolean {
    return this.fd !== undefined;
  }

  isClosed(): boolean {
    return this.closed;
  }

  write(data: string | Uint8Array): void {
    if (this.closed) throw new FileSinkClosedError(this.filePath);
    const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;

    if (this.closeAfterWrite) {
      this.writeOnce(bytes);
      return;
    }

    if (this.autoflush) {
      writeFully(this.requireFd(), bytes);
      return;
    }

    this.buffer(bytes);
  }

  flush(): void {
    if (this.pendingBytes === 0 || this.fd === undefined) return;
    const chunk = Buffer.concat(this.pending, this.pendingBytes);
    this.pending = [];
    this.pendingBytes = 0;
    writeFully(this.fd, chunk);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const fd = this.fd;
    if (fd === undefined) return;
    try {
      this.flush();
    } finally {
      this.detach();
      closeFile(fd);
    }
  }

  private writeOnce(bytes: Uint8Array): void {
    const fd = openFile(this.filePath, this.mode);
    this.attach(fd);
    try {
      writeFully(fd, bytes);
    } finally {
      this.detach();
      closeFile(fd);
    }
  }

  private buffer(bytes: Uint8Array): void {
    if (this.pendingBytes + bytes.length > this.bufferSize) this.flush();
    if (bytes.length >= this.bufferSize) {
      writeFully(this.requireFd(), bytes);
      return;
    }
    // callers may reuse their array once write() returns
    this.pending.push(Buffer.from(bytes));
    this.pendingBytes += bytes.length;
  }

  private requireFd(): number {
    if (this.fd === undefined) throw new FileSinkClosedError(this.filePath);
    return this.fd;
  }

  private attach(fd: number): void {
    this.fd = fd;
    openManagers.add(this);
    installExitHook();
  }

  private detach(): void {
    this.fd = undefined;
    openManagers.delete(this);
  }
}
