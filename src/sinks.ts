import fs from "node:fs/promises";
import path from "node:path";

/**
 * Destination for rendered lines. Each `write` receives exactly one line,
 * without a trailing newline.
 *
 * `styled` says whether the destination can show terminal styling at all;
 * backends only pass a styled hint to their formatter when it is true.
 */
export type LogSink = {
  readonly styled: boolean;
  write: (text: string) => void | Promise<void>;
};

type LineStream = Pick<NodeJS.WritableStream, "write"> & { isTTY?: boolean };

export function createStreamSink(stream: LineStream = process.stderr): LogSink {
  return {
    styled: stream.isTTY === true,
    write: (text) =>
      new Promise<void>((resolve, reject) => {
        stream.write(`${text}\n`, (err) => {
          if (err) {
            reject(err);
            return;
          }
          resolve();
        });
      }),
  };
}

export type FileSinkDeps = {
  fs?: {
    mkdir: (dir: string, options: { recursive: true }) => Promise<unknown>;
    appendFile: (file: string, data: string, encoding: "utf-8") => Promise<void>;
  };
};

/** Appends lines to `filePath`, creating its directory on first write. Never styled. */
export function createFileSink(filePath: string, deps: FileSinkDeps = {}): LogSink {
  const io: NonNullable<FileSinkDeps["fs"]> = deps.fs ?? fs;
  let dirReady: Promise<unknown> | null = null;
  return {
    styled: false,
    write: async (text) => {
      dirReady ??= io.mkdir(path.dirname(filePath), { recursive: true }).catch((err: unknown) => {
        dirReady = null;
        throw err;
      });
      await dirReady;
      await io.appendFile(filePath, `${text}\n`, "utf-8");
    },
  };
}
