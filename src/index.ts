export { SinkBackend } from "./backend.js";
export type {
  BackendErrorHandler,
  BackendState,
  LoggingBackend,
  SinkBackendOptions,
} from "./backend.js";
export * from "./config/index.js";
export { formatErrorMessage } from "./diagnostics.js";
export type { DiagnosticsLogger } from "./diagnostics.js";
export { Logging } from "./dispatcher.js";
export type { LoggingOptions } from "./dispatcher.js";
export * from "./formatters/index.js";
export {
  BUILTIN_LEVELS,
  cloneLevels,
  defineLogLevel,
  hasLevel,
  levelsUpTo,
  LogLevels,
  normalizeLogLevel,
  sameLevel,
  sameLevelSet,
  subtractLevels,
  unionLevels,
} from "./levels.js";
export type { BuiltinLevelName, LevelSet, LogLevel } from "./levels.js";
export { createMailbox } from "./mailbox.js";
export type { Mailbox, MailboxErrorHandler, MailboxOptions } from "./mailbox.js";
export { createFileSink, createStreamSink } from "./sinks.js";
export type { FileSinkDeps, LogSink } from "./sinks.js";
export { SourceFilter } from "./source-filter.js";
export type { SourceFilterMode } from "./source-filter.js";
export {
  defineLogSource,
  defineSourceKind,
  isNoSource,
  NoSource,
  sameSource,
  sourceName,
} from "./sources.js";
export type { LogSource } from "./sources.js";
