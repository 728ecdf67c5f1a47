export {
  Logger,
  logger,
  LOG_LEVELS,
  isLogLevel,
  formatLine,
  describeError,
  type ConsoleMode,
  type ConsoleWriter,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerEventMap,
  type LoggerOptions,
  type MessageCallback,
  type MessageCallbackInput,
  type SinkErrorPolicy,
  type SinkRouteOptions,
} from './infra/logger';
export { appendNewline, contextPrefix, escapeNewlines, levelPrefix, timestampPrefix } from './infra/logCallbacks';
export { FileSink, withFileSink } from './observability/logger/FileSink';
export {
  FileHandleManager,
  closeAllFileHandles,
  openFileHandleCount,
  type FileHandleManagerOptions,
} from './observability/logger/FileHandleManager';
export { resolveFileMode, openFlagsFor, type FileMode, type RawFileMode } from './observability/logger/fileMode';
export {
  parseFileSinkOptions,
  fileSinkOptionsFromEnv,
  type FileSinkOptions,
  type SinkConfig,
} from './observability/logger/fileSinkConfig';
export { FileSinkClosedError, FileSinkConfigError, FileSinkOpenError } from './observability/logger/errors';
