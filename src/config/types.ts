import type { z } from "zod";

import type { LogLevel } from "../levels.js";
import type { SourceFilter } from "../source-filter.js";
import type { LogSource } from "../sources.js";
import type {
  BackendConfigSchema,
  FormatterConfigSchema,
  LoggingConfigSchema,
} from "./zod-schema.js";

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type FormatterConfig = z.infer<typeof FormatterConfigSchema>;

export type SinkConfig =
  | { type: "console"; stream: "stdout" | "stderr" }
  | { type: "file"; path: string };

/** A backend entry with every level and source name resolved to its tag. */
export type ResolvedBackendConfig = {
  sink: SinkConfig;
  levels?: LogLevel[];
  sourceFilter?: SourceFilter;
  formatter?: FormatterConfig;
  styled?: boolean;
};

export type ResolvedLoggingConfig = {
  backends: ResolvedBackendConfig[];
};

export type ConfigValidationIssue = {
  path: string;
  message: string;
};

/**
 * Tags that configuration may refer to by name. Tags compare by identity, so
 * a name in a config file can only pick out a tag the application defined.
 * Built-in levels are always known.
 */
export type ConfigRegistry = {
  levels?: Iterable<LogLevel>;
  sources?: Iterable<LogSource>;
};

export type LoggingConfigSnapshot = {
  path: string;
  exists: boolean;
  raw: string | null;
  valid: boolean;
  config: ResolvedLoggingConfig;
  issues: ConfigValidationIssue[];
};
