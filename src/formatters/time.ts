import { format } from "date-fns";

import type { LogLevel } from "../levels.js";
import { sourceName, type LogSource } from "../sources.js";
import { FORMATTING_ERROR, type Formatter } from "./types.js";

/*
 * Time-prefixed formatters: `[time] [Level] source: message`.
 *
 * All of them read the wall clock (Date.now by default). None is monotonic,
 * so adjusting the system clock shows up as a jump in the output, and the
 * relative formatter can report negative elapsed time.
 */

/** Milliseconds since the Unix epoch. */
export type Clock = () => number;

export type TimeFormatterOptions = {
  /** Append a three-digit millisecond fraction. */
  subsecond?: boolean;
  clock?: Clock;
};

export type Instant = { seconds: number; nanos: number };

const NANOS_PER_SECOND = 1_000_000_000;
const NANOS_PER_MILLI = 1_000_000;

export function toInstant(epochMs: number): Instant {
  const seconds = Math.floor(epochMs / 1000);
  const nanos = Math.round((epochMs - seconds * 1000) * NANOS_PER_MILLI);
  return { seconds, nanos };
}

/** Component-wise subtraction with a single borrow; negative when `to` precedes `from`. */
export function elapsedBetween(from: Instant, to: Instant): Instant {
  let seconds = to.seconds - from.seconds;
  let nanos = to.nanos - from.nanos;
  if (nanos < 0) {
    seconds -= 1;
    nanos += NANOS_PER_SECOND;
  }
  return { seconds, nanos };
}

function renderSeconds(instant: Instant, subsecond: boolean): string {
  if (!subsecond) return String(instant.seconds);
  const millis = Math.floor(instant.nanos / NANOS_PER_MILLI);
  return `${instant.seconds}.${String(millis).padStart(3, "0")}`;
}

function renderTimestamped(time: string, level: LogLevel, message: string, source: LogSource) {
  const name = sourceName(source);
  const origin = name === undefined ? "" : `${name}: `;
  return `[${time}] [${level.name}] ${origin}${message}`;
}

/** Absolute wall-clock seconds since the epoch. */
export function createTimeFormatter(options: TimeFormatterOptions = {}): Formatter {
  const clock = options.clock ?? Date.now;
  const subsecond = options.subsecond ?? false;
  return {
    render(level, message, source) {
      const time = renderSeconds(toInstant(clock()), subsecond);
      return renderTimestamped(time, level, message, source);
    },
  };
}

/** Seconds elapsed since this formatter was created. */
export function createRelativeTimeFormatter(options: TimeFormatterOptions = {}): Formatter {
  const clock = options.clock ?? Date.now;
  const subsecond = options.subsecond ?? false;
  const createdAt = toInstant(clock());
  return {
    render(level, message, source) {
      const time = renderSeconds(elapsedBetween(createdAt, toInstant(clock())), subsecond);
      return renderTimestamped(time, level, message, source);
    },
  };
}

export type PatternTimeFormatterOptions = {
  clock?: Clock;
};

/**
 * Local time rendered through a date-fns pattern, e.g. `"yyyy-MM-dd HH:mm:ss"`.
 * An invalid pattern replaces the timestamp with {@link FORMATTING_ERROR};
 * the rest of the line is unaffected.
 */
export function createPatternTimeFormatter(
  pattern: string,
  options: PatternTimeFormatterOptions = {},
): Formatter {
  const clock = options.clock ?? Date.now;
  return {
    render(level, message, source) {
      let time: string;
      try {
        time = format(new Date(clock()), pattern);
      } catch {
        time = FORMATTING_ERROR;
      }
      return renderTimestamped(time, level, message, source);
    },
  };
}
