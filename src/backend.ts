import { formatErrorMessage, type DiagnosticsLogger } from "./diagnostics.js";
import { basicFormatter } from "./formatters/basic.js";
import type { Formatter } from "./formatters/types.js";
import {
  BUILTIN_LEVELS,
  cloneLevels,
  hasLevel,
  subtractLevels,
  unionLevels,
  type LevelSet,
  type LogLevel,
} from "./levels.js";
import { createMailbox, type Mailbox } from "./mailbox.js";
import type { LogSink } from "./sinks.js";
import { SourceFilter } from "./source-filter.js";
import { NoSource, type LogSource } from "./sources.js";

/**
 * Everything a dispatcher can ask of a backend.
 *
 * Calls return immediately; the backend applies them later, one at a time and
 * in the order it received them. `flush` is the only way to wait: it resolves
 * once every call made before it has been applied.
 */
export interface LoggingBackend {
  /** Replace the enabled levels with exactly `levels`. */
  setLevels(levels: Iterable<LogLevel>): void;
  enableLevels(levels: Iterable<LogLevel>): void;
  disableLevels(levels: Iterable<LogLevel>): void;
  setSourceFilter(filter: SourceFilter): void;
  includeSource(source: LogSource): void;
  excludeSource(source: LogSource): void;
  setFormatter(formatter: Formatter): void;
  /** Ask for styled output. Only honoured where the sink can show it. */
  setFormattingPreference(styled: boolean): void;
  log(level: LogLevel, message: string, source?: LogSource): void;
  flush(): Promise<void>;
}

export type BackendState = {
  levels: LevelSet;
  sourceFilter: SourceFilter;
  formatter: Formatter;
  stylePreference: boolean;
  /** Bumped on every configuration change that actually changed something. */
  revision: number;
};

export type BackendErrorHandler = (err: unknown, info: { text?: string }) => void;

export type SinkBackendOptions = {
  /** Enabled levels; all built-in levels when omitted. */
  levels?: Iterable<LogLevel>;
  sourceFilter?: SourceFilter;
  formatter?: Formatter;
  stylePreference?: boolean;
  onError?: BackendErrorHandler;
  logger?: DiagnosticsLogger;
};

/** A backend that renders admitted events and hands them to a {@link LogSink}. */
export class SinkBackend implements LoggingBackend {
  private levels: LevelSet;
  private sourceFilter: SourceFilter;
  private formatter: Formatter;
  private stylePreference: boolean;
  private revision = 0;
  private readonly mailbox: Mailbox;
  private readonly onError: BackendErrorHandler;

  constructor(
    private readonly sink: LogSink,
    options: SinkBackendOptions = {},
  ) {
    this.levels = cloneLevels(options.levels ?? BUILTIN_LEVELS);
    this.sourceFilter = options.sourceFilter?.clone() ?? SourceFilter.blacklist();
    this.formatter = options.formatter ?? basicFormatter;
    this.stylePreference = options.stylePreference ?? false;
    const logger = options.logger ?? console;
    this.onError =
      options.onError ??
      ((err, info) => {
        const what = info.text === undefined ? "backend task failed" : "sink write failed";
        logger.error(`logfan: ${what}: ${formatErrorMessage(err)}`);
      });
    this.mailbox = createMailbox({ onError: (err) => this.onError(err, {}), logger });
  }

  setLevels(levels: Iterable<LogLevel>): void {
    const next = cloneLevels(levels);
    this.mailbox.post(() => {
      this.levels = next;
      this.revision += 1;
    });
  }

  enableLevels(levels: Iterable<LogLevel>): void {
    const add = cloneLevels(levels);
    this.mailbox.post(() => {
      this.applyLevels(unionLevels(this.levels, add));
    });
  }

  disableLevels(levels: Iterable<LogLevel>): void {
    const remove = cloneLevels(levels);
    this.mailbox.post(() => {
      this.applyLevels(subtractLevels(this.levels, remove));
    });
  }

  setSourceFilter(filter: SourceFilter): void {
    const next = filter.clone();
    this.mailbox.post(() => {
      this.sourceFilter = next;
      this.revision += 1;
    });
  }

  includeSource(source: LogSource): void {
    this.mailbox.post(() => {
      this.applyFilterChange((filter) => filter.includeSource(source));
    });
  }

  excludeSource(source: LogSource): void {
    this.mailbox.post(() => {
      this.applyFilterChange((filter) => filter.excludeSource(source));
    });
  }

  setFormatter(formatter: Formatter): void {
    this.mailbox.post(() => {
      this.formatter = formatter;
      this.revision += 1;
    });
  }

  setFormattingPreference(styled: boolean): void {
    this.mailbox.post(() => {
      if (this.stylePreference === styled) return;
      this.stylePreference = styled;
      this.revision += 1;
    });
  }

  log(level: LogLevel, message: string, source: LogSource = NoSource): void {
    this.mailbox.post(async () => {
      if (!hasLevel(this.levels, level)) return;
      if (this.sourceFilter.isFiltered(source)) return;
      const styled = this.stylePreference && this.sink.styled;
      const text = this.formatter.render(level, message, source, styled);
      try {
        await this.sink.write(text);
      } catch (err) {
        this.onError(err, { text });
      }
    });
  }

  flush(): Promise<void> {
    return this.mailbox.idle();
  }

  /** Queued like any other call, so it observes every change made before it. */
  inspect(): Promise<BackendState> {
    return new Promise((resolve) => {
      this.mailbox.post(() => {
        resolve({
          levels: [...this.levels],
          sourceFilter: this.sourceFilter.clone(),
          formatter: this.formatter,
          stylePreference: this.stylePreference,
          revision: this.revision,
        });
      });
    });
  }

  private applyLevels(next: LevelSet): void {
    if (next === this.levels) return;
    this.levels = next;
    this.revision += 1;
  }

  private applyFilterChange(mutate: (filter: SourceFilter) => void): void {
    const before = this.sourceFilter.clone();
    mutate(this.sourceFilter);
    if (!this.sourceFilter.equals(before)) this.revision += 1;
  }
}
