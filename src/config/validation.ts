import { levelsUpTo, normalizeLogLevel, type LogLevel } from "../levels.js";
import { SourceFilter } from "../source-filter.js";
import { NoSource, type LogSource } from "../sources.js";
import type {
  BackendConfig,
  ConfigRegistry,
  ConfigValidationIssue,
  ResolvedBackendConfig,
  ResolvedLoggingConfig,
} from "./types.js";
import { LoggingConfigSchema } from "./zod-schema.js";

/** Reserved source name for source-less messages. */
export const NO_SOURCE_NAME = "NoSource";

type Lookup = {
  level: (name: string) => LogLevel | undefined;
  source: (name: string) => LogSource | undefined;
};

function buildLookup(registry: ConfigRegistry): Lookup {
  const customLevels = [...(registry.levels ?? [])];
  const sources = [...(registry.sources ?? [])];
  return {
    // registered levels win over a built-in of the same name
    level: (name) =>
      customLevels.find((level) => level.name.toLowerCase() === name.trim().toLowerCase()) ??
      normalizeLogLevel(name),
    source: (name) =>
      name === NO_SOURCE_NAME ? NoSource : sources.find((source) => source.name === name),
  };
}

function resolveBackend(
  entry: BackendConfig,
  at: string,
  lookup: Lookup,
  issues: ConfigValidationIssue[],
): ResolvedBackendConfig {
  const resolved: ResolvedBackendConfig = {
    sink:
      entry.type === "file"
        ? { type: "file", path: entry.path }
        : { type: "console", stream: entry.stream ?? "stderr" },
    formatter: entry.formatter,
    styled: entry.styled,
  };

  if (Array.isArray(entry.levels)) {
    const levels: LogLevel[] = [];
    entry.levels.forEach((name, index) => {
      const level = lookup.level(name);
      if (level) {
        levels.push(level);
      } else {
        issues.push({ path: `${at}.levels.${index}`, message: `Unknown log level "${name}"` });
      }
    });
    resolved.levels = levels;
  } else if (entry.levels) {
    const threshold = lookup.level(entry.levels.upTo);
    if (threshold) {
      resolved.levels = levelsUpTo(threshold);
    } else {
      issues.push({
        path: `${at}.levels.upTo`,
        message: `Unknown log level "${entry.levels.upTo}"`,
      });
    }
  }

  if (entry.sourceFilter) {
    const filter = new SourceFilter(entry.sourceFilter.mode);
    (entry.sourceFilter.sources ?? []).forEach((name, index) => {
      const source = lookup.source(name);
      if (!source) {
        issues.push({
          path: `${at}.sourceFilter.sources.${index}`,
          message: `Unknown log source "${name}"`,
        });
        return;
      }
      // Listing a source means "this one is named in the filter" in either mode.
      if (filter.mode === "blacklist") {
        filter.excludeSource(source);
      } else {
        filter.includeSource(source);
      }
    });
    resolved.sourceFilter = filter;
  }

  return resolved;
}

export function validateLoggingConfig(
  raw: unknown,
  registry: ConfigRegistry = {},
): { ok: true; config: ResolvedLoggingConfig } | { ok: false; issues: ConfigValidationIssue[] } {
  const validated = LoggingConfigSchema.safeParse(raw);
  if (!validated.success) {
    return {
      ok: false,
      issues: validated.error.issues.map((iss) => ({
        path: iss.path.join("."),
        message: iss.message,
      })),
    };
  }
  const lookup = buildLookup(registry);
  const issues: ConfigValidationIssue[] = [];
  const backends = (validated.data.backends ?? []).map((entry, index) =>
    resolveBackend(entry, `backends.${index}`, lookup, issues),
  );
  if (issues.length > 0) return { ok: false, issues };
  return { ok: true, config: { backends } };
}
