import { Chalk, type ChalkInstance } from "chalk";

import { LogLevels, sameLevel, type LogLevel } from "../levels.js";
import { sourceName } from "../sources.js";
import type { Formatter } from "./types.js";

// Pinned to basic 16-colour output. Whether colour is wanted is decided by the
// style hint, not by chalk's own terminal detection.
const ansi = new Chalk({ level: 1 });

const LEVEL_COLORS: ReadonlyArray<[LogLevel, ChalkInstance]> = [
  [LogLevels.Error, ansi.redBright],
  [LogLevels.Warn, ansi.yellow],
  [LogLevels.Info, ansi.greenBright],
  [LogLevels.Debug, ansi.blueBright],
  [LogLevels.Trace, ansi.cyanBright],
];

const OTHER_LEVEL_COLOR = ansi.yellowBright;

export function levelColor(level: LogLevel): ChalkInstance {
  return LEVEL_COLORS.find(([entry]) => sameLevel(entry, level))?.[1] ?? OTHER_LEVEL_COLOR;
}

/**
 * `[Level] source: message`, or `[Level] message` without a source.
 * When styled, the level name is coloured and the source is bold; each styled
 * segment closes its own escape before the next one starts.
 */
export const ansiFormatter: Formatter = {
  render(level, message, source, styled) {
    const levelText = styled ? levelColor(level)(level.name) : level.name;
    const name = sourceName(source);
    if (name === undefined) return `[${levelText}] ${message}`;
    const sourceText = styled ? ansi.bold(name) : name;
    return `[${levelText}] ${sourceText}: ${message}`;
  },
};
