import type { LogSink } from "../sinks.js";

export type MemorySink = LogSink & { lines: string[] };

export function createMemorySink(options: { styled?: boolean } = {}): MemorySink {
  const lines: string[] = [];
  return {
    styled: options.styled ?? false,
    lines,
    write: (text) => {
      lines.push(text);
    },
  };
}
