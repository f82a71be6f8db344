import { sameSource, type LogSource } from "./sources.js";

export type SourceFilterMode = "blacklist" | "whitelist";

/**
 * Decides which sources a backend suppresses.
 *
 * - blacklist: a source is filtered iff it is listed.
 * - whitelist: a source is filtered iff it is not listed.
 *
 * `includeSource` / `excludeSource` speak in terms of the outcome, so they
 * add or remove entries depending on the mode. Both are idempotent.
 * {@link NoSource} is an ordinary entry here: a whitelist that should let
 * source-less messages through has to list it.
 */
export class SourceFilter {
  private entries: LogSource[] = [];

  constructor(readonly mode: SourceFilterMode = "blacklist") {}

  static blacklist(sources: Iterable<LogSource> = []): SourceFilter {
    return SourceFilter.withEntries("blacklist", sources);
  }

  static whitelist(sources: Iterable<LogSource> = []): SourceFilter {
    return SourceFilter.withEntries("whitelist", sources);
  }

  private static withEntries(mode: SourceFilterMode, sources: Iterable<LogSource>): SourceFilter {
    const filter = new SourceFilter(mode);
    for (const source of sources) filter.add(source);
    return filter;
  }

  get sources(): readonly LogSource[] {
    return [...this.entries];
  }

  includeSource(source: LogSource): void {
    if (this.mode === "blacklist") {
      this.remove(source);
    } else {
      this.add(source);
    }
  }

  excludeSource(source: LogSource): void {
    if (this.mode === "blacklist") {
      this.add(source);
    } else {
      this.remove(source);
    }
  }

  isFiltered(source: LogSource): boolean {
    const listed = this.has(source);
    return this.mode === "blacklist" ? listed : !listed;
  }

  clone(): SourceFilter {
    return SourceFilter.withEntries(this.mode, this.entries);
  }

  equals(other: SourceFilter): boolean {
    if (this.mode !== other.mode) return false;
    if (this.entries.length !== other.entries.length) return false;
    return this.entries.every((source) => other.has(source));
  }

  private has(source: LogSource): boolean {
    return this.entries.some((entry) => sameSource(entry, source));
  }

  private add(source: LogSource): void {
    if (!this.has(source)) this.entries.push(source);
  }

  private remove(source: LogSource): void {
    const index = this.entries.findIndex((entry) => sameSource(entry, source));
    if (index >= 0) this.entries.splice(index, 1);
  }
}
