import type { LoggingBackend } from "./backend.js";
import { formatErrorMessage, type DiagnosticsLogger } from "./diagnostics.js";
import type { Formatter } from "./formatters/types.js";
import { cloneLevels, LogLevels, type LogLevel } from "./levels.js";
import { createMailbox, type Mailbox } from "./mailbox.js";
import type { SourceFilter } from "./source-filter.js";
import { NoSource, type LogSource } from "./sources.js";

export type LoggingOptions = {
  backends?: Iterable<LoggingBackend>;
  logger?: DiagnosticsLogger;
};

/**
 * Front end for log calls. Every call, configuration included, is forwarded
 * to each registered backend in registration order. The dispatcher only sends;
 * it never waits for a backend and never looks at what a backend decided to do
 * with a message.
 *
 * Construct one and pass it to whatever needs to log.
 */
export class Logging implements LoggingBackend {
  private backends: LoggingBackend[];
  private readonly mailbox: Mailbox;
  private readonly logger: DiagnosticsLogger;

  constructor(options: LoggingOptions = {}) {
    this.backends = [...(options.backends ?? [])];
    const logger = options.logger ?? console;
    this.logger = logger;
    this.mailbox = createMailbox({
      onError: (err) => logger.error(`logfan: dispatch failed: ${formatErrorMessage(err)}`),
      logger,
    });
  }

  appendBackend(backend: LoggingBackend): void {
    this.mailbox.post(() => {
      this.backends.push(backend);
    });
  }

  /** Replace the registered backends. Dropped backends are not notified. */
  setBackends(backends: Iterable<LoggingBackend>): void {
    const next = [...backends];
    this.mailbox.post(() => {
      this.backends = next;
    });
  }

  setLevels(levels: Iterable<LogLevel>): void {
    const snapshot = cloneLevels(levels);
    this.broadcast((backend) => backend.setLevels(snapshot));
  }

  enableLevels(levels: Iterable<LogLevel>): void {
    const snapshot = cloneLevels(levels);
    this.broadcast((backend) => backend.enableLevels(snapshot));
  }

  disableLevels(levels: Iterable<LogLevel>): void {
    const snapshot = cloneLevels(levels);
    this.broadcast((backend) => backend.disableLevels(snapshot));
  }

  setSourceFilter(filter: SourceFilter): void {
    const snapshot = filter.clone();
    this.broadcast((backend) => backend.setSourceFilter(snapshot));
  }

  includeSource(source: LogSource): void {
    this.broadcast((backend) => backend.includeSource(source));
  }

  excludeSource(source: LogSource): void {
    this.broadcast((backend) => backend.excludeSource(source));
  }

  setFormatter(formatter: Formatter): void {
    this.broadcast((backend) => backend.setFormatter(formatter));
  }

  setFormattingPreference(styled: boolean): void {
    this.broadcast((backend) => backend.setFormattingPreference(styled));
  }

  log(level: LogLevel, message: string, source: LogSource = NoSource): void {
    this.broadcast((backend) => backend.log(level, message, source));
  }

  err(message: string, source?: LogSource): void {
    this.log(LogLevels.Error, message, source);
  }

  warn(message: string, source?: LogSource): void {
    this.log(LogLevels.Warn, message, source);
  }

  info(message: string, source?: LogSource): void {
    this.log(LogLevels.Info, message, source);
  }

  debug(message: string, source?: LogSource): void {
    this.log(LogLevels.Debug, message, source);
  }

  trace(message: string, source?: LogSource): void {
    this.log(LogLevels.Trace, message, source);
  }

  /**
   * Waits for the dispatcher's own queue, then for every backend registered
   * at that point to drain. Backends removed earlier are not waited on.
   */
  async flush(): Promise<void> {
    await this.mailbox.idle();
    await Promise.all(this.backends.map((backend) => backend.flush()));
  }

  private broadcast(send: (backend: LoggingBackend) => void): void {
    this.mailbox.post(() => {
      for (const backend of this.backends) {
        // a throwing backend does not end the loop
        try {
          send(backend);
        } catch (err) {
          this.logger.error(`logfan: backend rejected a call: ${formatErrorMessage(err)}`);
        }
      }
    });
  }
}
