import { SinkBackend } from "../backend.js";
import type { DiagnosticsLogger } from "../diagnostics.js";
import { Logging } from "../dispatcher.js";
import { ansiFormatter } from "../formatters/ansi.js";
import { basicFormatter } from "../formatters/basic.js";
import {
  createPatternTimeFormatter,
  createRelativeTimeFormatter,
  createTimeFormatter,
  type Clock,
} from "../formatters/time.js";
import type { Formatter } from "../formatters/types.js";
import { createFileSink, createStreamSink, type LogSink } from "../sinks.js";
import type { FormatterConfig, ResolvedLoggingConfig, SinkConfig } from "./types.js";

export type BuildLoggingDeps = {
  createSink?: (config: SinkConfig) => LogSink;
  clock?: Clock;
  logger?: DiagnosticsLogger;
};

export function createSinkFromConfig(config: SinkConfig): LogSink {
  if (config.type === "file") return createFileSink(config.path);
  return createStreamSink(config.stream === "stdout" ? process.stdout : process.stderr);
}

export function createFormatterFromConfig(config: FormatterConfig, clock?: Clock): Formatter {
  switch (config.type) {
    case "basic":
      return basicFormatter;
    case "ansi":
      return ansiFormatter;
    case "time":
      return createTimeFormatter({ subsecond: config.subsecond, clock });
    case "relative-time":
      return createRelativeTimeFormatter({ subsecond: config.subsecond, clock });
    case "pattern-time":
      return createPatternTimeFormatter(config.pattern, { clock });
  }
}

export function buildLogging(config: ResolvedLoggingConfig, deps: BuildLoggingDeps = {}): Logging {
  const createSink = deps.createSink ?? createSinkFromConfig;
  const backends = config.backends.map(
    (entry) =>
      new SinkBackend(createSink(entry.sink), {
        levels: entry.levels,
        sourceFilter: entry.sourceFilter,
        formatter: entry.formatter ? createFormatterFromConfig(entry.formatter, deps.clock) : undefined,
        stylePreference: entry.styled,
        logger: deps.logger,
      }),
  );
  return new Logging({ backends, logger: deps.logger });
}
