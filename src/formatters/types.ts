import type { LogLevel } from "../levels.js";
import type { LogSource } from "../sources.js";

/**
 * Turns an admitted log event into one line of text.
 *
 * Implementations must be pure and total: no I/O, no shared mutation, and no
 * throwing. A part that cannot be rendered is replaced by
 * {@link FORMATTING_ERROR} so the rest of the line still goes out.
 *
 * `styled` is advisory; formatters that have no styled form ignore it.
 */
export interface Formatter {
  render(level: LogLevel, message: string, source: LogSource, styled: boolean): string;
}

export const FORMATTING_ERROR = "FORMATTING ERROR";
