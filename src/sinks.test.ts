import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";

import { afterEach, describe, expect, it, vi } from "vitest";

import { createFileSink, createStreamSink } from "./sinks.js";

describe("createStreamSink", () => {
  it("writes one newline-terminated line per call", async () => {
    const stream = new PassThrough();
    stream.setEncoding("utf-8");
    const sink = createStreamSink(stream);
    await sink.write("first");
    await sink.write("second");
    expect(stream.read()).toBe("first\nsecond\n");
  });

  it("is styled only on a TTY", () => {
    expect(createStreamSink(new PassThrough()).styled).toBe(false);
    expect(createStreamSink(Object.assign(new PassThrough(), { isTTY: true })).styled).toBe(true);
  });
});

describe("createFileSink", () => {
  let tmpDir: string | null = null;

  afterEach(async () => {
    if (tmpDir) await fs.rm(tmpDir, { recursive: true, force: true });
    tmpDir = null;
  });

  it("appends lines and creates the directory", async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "logfan-sink-"));
    const file = path.join(tmpDir, "nested", "app.log");
    const sink = createFileSink(file);
    expect(sink.styled).toBe(false);
    await sink.write("one");
    await sink.write("two");
    expect(await fs.readFile(file, "utf-8")).toBe("one\ntwo\n");
  });

  it("retries directory creation after a failure", async () => {
    const mkdir = vi
      .fn<(dir: string, options: { recursive: true }) => Promise<unknown>>()
      .mockRejectedValueOnce(new Error("EACCES"))
      .mockResolvedValue(undefined);
    const appendFile = vi.fn<(file: string, data: string, encoding: "utf-8") => Promise<void>>(
      async () => {},
    );
    const sink = createFileSink("/var/log/app/app.log", { fs: { mkdir, appendFile } });
    await expect(sink.write("lost")).rejects.toThrow("EACCES");
    await sink.write("kept");
    expect(mkdir).toHaveBeenCalledTimes(2);
    expect(mkdir).toHaveBeenCalledWith("/var/log/app", { recursive: true });
    expect(appendFile).toHaveBeenCalledTimes(1);
    expect(appendFile).toHaveBeenCalledWith("/var/log/app/app.log", "kept\n", "utf-8");
  });
});
