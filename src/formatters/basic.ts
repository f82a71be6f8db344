import { sourceName } from "../sources.js";
import type { Formatter } from "./types.js";

/** `[source] Level: message`, or `Level: message` without a source. */
export const basicFormatter: Formatter = {
  render(level, message, source) {
    const name = sourceName(source);
    const body = `${level.name}: ${message}`;
    return name === undefined ? body : `[${name}] ${body}`;
  },
};
