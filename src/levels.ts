/**
 * Severity tags.
 *
 * Levels compare by identity of their `kind`, never by name: two levels
 * defined separately with the same name are different levels. The five
 * built-ins cover the usual cases; applications add their own with
 * {@link defineLogLevel}.
 */
export interface LogLevel {
  readonly kind: symbol;
  readonly name: string;
}

export type BuiltinLevelName = "Error" | "Warn" | "Info" | "Debug" | "Trace";

function builtin(name: BuiltinLevelName): LogLevel {
  return Object.freeze({ kind: Symbol(name), name });
}

export const LogLevels = Object.freeze({
  Error: builtin("Error"),
  Warn: builtin("Warn"),
  Info: builtin("Info"),
  Debug: builtin("Debug"),
  Trace: builtin("Trace"),
} satisfies Record<BuiltinLevelName, LogLevel>);

// Most severe first.
export const BUILTIN_LEVELS: readonly LogLevel[] = [
  LogLevels.Error,
  LogLevels.Warn,
  LogLevels.Info,
  LogLevels.Debug,
  LogLevels.Trace,
];

export function defineLogLevel(name: string): LogLevel {
  return Object.freeze({ kind: Symbol(name), name });
}

export function sameLevel(a: LogLevel, b: LogLevel): boolean {
  return a.kind === b.kind;
}

/** Case-insensitive lookup of a built-in level by name. */
export function normalizeLogLevel(raw?: string | null): LogLevel | undefined {
  const needle = typeof raw === "string" ? raw.trim().toLowerCase() : "";
  if (!needle) return undefined;
  // aliases: the dispatcher's err() shorthand, and the common spelling of warn
  if (needle === "err") return LogLevels.Error;
  if (needle === "warning") return LogLevels.Warn;
  return BUILTIN_LEVELS.find((level) => level.name.toLowerCase() === needle);
}

/** The built-in levels from Error down to and including `level`. */
export function levelsUpTo(level: LogLevel): LogLevel[] {
  const index = BUILTIN_LEVELS.findIndex((entry) => sameLevel(entry, level));
  if (index < 0) return [level];
  return BUILTIN_LEVELS.slice(0, index + 1);
}

// ── Level sets ──
// Small unordered collections; membership uses nominal equality, so linear
// scans are fine at the sizes involved.

export type LevelSet = readonly LogLevel[];

export function hasLevel(set: LevelSet, level: LogLevel): boolean {
  return set.some((entry) => sameLevel(entry, level));
}

export function cloneLevels(levels: Iterable<LogLevel>): LogLevel[] {
  const out: LogLevel[] = [];
  for (const level of levels) {
    if (!hasLevel(out, level)) out.push(level);
  }
  return out;
}

/** Returns the same array instance when nothing was added. */
export function unionLevels(set: LevelSet, add: Iterable<LogLevel>): LevelSet {
  let next: LogLevel[] | null = null;
  for (const level of add) {
    if (hasLevel(next ?? set, level)) continue;
    next ??= [...set];
    next.push(level);
  }
  return next ?? set;
}

/** Returns the same array instance when nothing was removed. */
export function subtractLevels(set: LevelSet, remove: Iterable<LogLevel>): LevelSet {
  const removal = cloneLevels(remove);
  if (!set.some((level) => hasLevel(removal, level))) return set;
  return set.filter((level) => !hasLevel(removal, level));
}

export function sameLevelSet(a: LevelSet, b: LevelSet): boolean {
  const left = cloneLevels(a);
  const right = cloneLevels(b);
  return left.length === right.length && left.every((level) => hasLevel(right, level));
}
