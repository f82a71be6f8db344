import { describe, expect, it } from "vitest";

import { defineLogLevel, levelsUpTo, LogLevels, sameLevelSet } from "../levels.js";
import { defineLogSource, NoSource } from "../sources.js";
import { validateLoggingConfig } from "./validation.js";

const db = defineLogSource("db");
const http = defineLogSource("http");
const audit = defineLogLevel("Audit");

describe("validateLoggingConfig", () => {
  it("resolves names to the application's tags", () => {
    const res = validateLoggingConfig(
      {
        backends: [
          {
            type: "console",
            levels: { upTo: "info" },
            sourceFilter: { mode: "whitelist", sources: ["db", "NoSource"] },
            formatter: { type: "ansi" },
            styled: true,
          },
          {
            type: "file",
            path: "logs/audit.log",
            levels: ["audit", "ERROR"],
            sourceFilter: { mode: "blacklist", sources: ["http"] },
            formatter: { type: "pattern-time", pattern: "yyyy-MM-dd" },
          },
        ],
      },
      { levels: [audit], sources: [db, http] },
    );
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    const [consoleEntry, fileEntry] = res.config.backends;

    expect(consoleEntry?.sink).toEqual({ type: "console", stream: "stderr" });
    expect(sameLevelSet(consoleEntry?.levels ?? [], levelsUpTo(LogLevels.Info))).toBe(true);
    expect(consoleEntry?.sourceFilter?.isFiltered(db)).toBe(false);
    expect(consoleEntry?.sourceFilter?.isFiltered(NoSource)).toBe(false);
    expect(consoleEntry?.sourceFilter?.isFiltered(http)).toBe(true);
    expect(consoleEntry?.formatter).toEqual({ type: "ansi" });
    expect(consoleEntry?.styled).toBe(true);

    expect(fileEntry?.sink).toEqual({ type: "file", path: "logs/audit.log" });
    expect(sameLevelSet(fileEntry?.levels ?? [], [audit, LogLevels.Error])).toBe(true);
    expect(fileEntry?.sourceFilter?.isFiltered(http)).toBe(true);
    expect(fileEntry?.sourceFilter?.isFiltered(db)).toBe(false);
  });

  it("prefers a registered level over the built-in of the same name", () => {
    const customInfo = defineLogLevel("Info");
    const res = validateLoggingConfig(
      { backends: [{ type: "console", levels: ["info", "warn"] }] },
      { levels: [customInfo] },
    );
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.config.backends[0]?.levels).toEqual([customInfo, LogLevels.Warn]);
    expect(res.config.backends[0]?.levels?.[0]).toBe(customInfo);
  });

  it("accepts an empty config", () => {
    expect(validateLoggingConfig({})).toEqual({ ok: true, config: { backends: [] } });
  });

  it("reports unknown level and source names by path", () => {
    const res = validateLoggingConfig(
      {
        backends: [
          { type: "console", levels: ["error", "loud"] },
          { type: "console", levels: { upTo: "chatty" }, sourceFilter: { mode: "blacklist", sources: ["cache"] } },
        ],
      },
      { sources: [db] },
    );
    expect(res).toEqual({
      ok: false,
      issues: [
        { path: "backends.0.levels.1", message: 'Unknown log level "loud"' },
        { path: "backends.1.levels.upTo", message: 'Unknown log level "chatty"' },
        { path: "backends.1.sourceFilter.sources.0", message: 'Unknown log source "cache"' },
      ],
    });
  });

  it("rejects malformed entries through the schema", () => {
    const res = validateLoggingConfig({ backends: [{ type: "pipe" }] });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.issues[0]?.path).toBe("backends.0.type");
  });

  it("requires a path for file backends", () => {
    const res = validateLoggingConfig({ backends: [{ type: "file" }] });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.issues[0]?.path).toBe("backends.0.path");
  });
});
