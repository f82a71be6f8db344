/**
 * Origin tags.
 *
 * Like levels, sources compare by the identity of their `kind`. A source
 * kind built with {@link defineSourceKind} can render a different name per
 * instance (`db(1)` vs `db(2)`), but every instance of that kind is the same
 * source as far as filtering is concerned: excluding `db(1)` also silences
 * `db(2)`.
 */
export interface LogSource {
  readonly kind: symbol;
  /** Absent only for {@link NoSource}. */
  readonly name?: string;
}

export const NoSource: LogSource = Object.freeze({ kind: Symbol("NoSource") });

export function isNoSource(source: LogSource): boolean {
  return source.kind === NoSource.kind;
}

export function defineLogSource(name: string): LogSource {
  return Object.freeze({ kind: Symbol(name), name });
}

export function defineSourceKind<A extends unknown[]>(
  label: string,
  render: (...args: A) => string,
): (...args: A) => LogSource {
  const kind = Symbol(label);
  return (...args) => Object.freeze({ kind, name: render(...args) });
}

export function sameSource(a: LogSource, b: LogSource): boolean {
  return a.kind === b.kind;
}

export function sourceName(source: LogSource): string | undefined {
  return isNoSource(source) ? undefined : source.name;
}
