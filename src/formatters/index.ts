export { ansiFormatter, levelColor } from "./ansi.js";
export { basicFormatter } from "./basic.js";
export {
  createPatternTimeFormatter,
  createRelativeTimeFormatter,
  createTimeFormatter,
  elapsedBetween,
  toInstant,
} from "./time.js";
export type {
  Clock,
  Instant,
  PatternTimeFormatterOptions,
  TimeFormatterOptions,
} from "./time.js";
export { FORMATTING_ERROR } from "./types.js";
export type { Formatter } from "./types.js";
