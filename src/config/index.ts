export {
  buildLogging,
  createFormatterFromConfig,
  createSinkFromConfig,
  type BuildLoggingDeps,
} from "./build.js";
export {
  defaultLoggingConfig,
  loadLogging,
  parseLoggingConfigJson5,
  readLoggingConfigFile,
  type LoggingConfigIoDeps,
  type ParseConfigJson5Result,
} from "./io.js";
export type {
  BackendConfig,
  ConfigRegistry,
  ConfigValidationIssue,
  FormatterConfig,
  LoggingConfig,
  LoggingConfigSnapshot,
  ResolvedBackendConfig,
  ResolvedLoggingConfig,
  SinkConfig,
} from "./types.js";
export { NO_SOURCE_NAME, validateLoggingConfig } from "./validation.js";
export { LoggingConfigSchema } from "./zod-schema.js";
