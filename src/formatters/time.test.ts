import { describe, expect, it } from "vitest";

import { LogLevels } from "../levels.js";
import { defineLogSource, NoSource } from "../sources.js";
import {
  createPatternTimeFormatter,
  createRelativeTimeFormatter,
  createTimeFormatter,
  elapsedBetween,
  toInstant,
} from "./time.js";
import { FORMATTING_ERROR } from "./types.js";

const db = defineLogSource("db");

function manualClock(start: number) {
  let now = start;
  return {
    clock: () => now,
    set: (value: number) => {
      now = value;
    },
  };
}

describe("toInstant / elapsedBetween", () => {
  it("splits epoch milliseconds into seconds and nanoseconds", () => {
    expect(toInstant(1_700_000_000_123)).toEqual({ seconds: 1_700_000_000, nanos: 123_000_000 });
  });

  it("borrows a second when the nanosecond part underflows", () => {
    expect(
      elapsedBetween({ seconds: 12, nanos: 500_000_000 }, { seconds: 15, nanos: 250_000_000 }),
    ).toEqual({ seconds: 2, nanos: 750_000_000 });
  });
});

describe("createTimeFormatter", () => {
  it("prefixes whole epoch seconds", () => {
    const formatter = createTimeFormatter({ clock: () => 1_700_000_000_123 });
    expect(formatter.render(LogLevels.Info, "hi", NoSource, false)).toBe(
      "[1700000000] [Info] hi",
    );
    expect(formatter.render(LogLevels.Info, "hi", db, true)).toBe("[1700000000] [Info] db: hi");
  });

  it("adds a zero-padded millisecond fraction on request", () => {
    const formatter = createTimeFormatter({ subsecond: true, clock: () => 1_700_000_000_005 });
    expect(formatter.render(LogLevels.Warn, "w", NoSource, false)).toBe(
      "[1700000000.005] [Warn] w",
    );
  });

  it("reads the clock on every render", () => {
    const time = manualClock(1_000);
    const formatter = createTimeFormatter({ clock: time.clock });
    time.set(61_000);
    expect(formatter.render(LogLevels.Info, "later", NoSource, false)).toBe("[61] [Info] later");
  });
});

describe("createRelativeTimeFormatter", () => {
  it("reports time since the formatter was created", () => {
    const time = manualClock(12_500);
    const formatter = createRelativeTimeFormatter({ subsecond: true, clock: time.clock });
    expect(formatter.render(LogLevels.Debug, "start", NoSource, false)).toBe(
      "[0.000] [Debug] start",
    );
    time.set(15_750);
    expect(formatter.render(LogLevels.Debug, "tick", db, false)).toBe("[3.250] [Debug] db: tick");
  });

  it("goes negative when the wall clock moves backwards", () => {
    const time = manualClock(12_500);
    const formatter = createRelativeTimeFormatter({ subsecond: true, clock: time.clock });
    time.set(10_200);
    expect(formatter.render(LogLevels.Info, "skew", NoSource, false)).toBe("[-3.700] [Info] skew");

    const seconds = manualClock(12_500);
    const coarse = createRelativeTimeFormatter({ clock: seconds.clock });
    seconds.set(10_200);
    expect(coarse.render(LogLevels.Info, "skew", NoSource, false)).toBe("[-3] [Info] skew");
  });
});

describe("createPatternTimeFormatter", () => {
  const at = new Date(2024, 0, 2, 3, 4, 5).getTime();

  it("renders local time through the pattern", () => {
    const formatter = createPatternTimeFormatter("yyyy-MM-dd HH:mm:ss", { clock: () => at });
    expect(formatter.render(LogLevels.Warn, "slow", db, false)).toBe(
      "[2024-01-02 03:04:05] [Warn] db: slow",
    );
  });

  it("substitutes the sentinel for an invalid pattern and keeps the rest", () => {
    const formatter = createPatternTimeFormatter("yyyy jj", { clock: () => at });
    expect(formatter.render(LogLevels.Warn, "slow", db, false)).toBe(
      `[${FORMATTING_ERROR}] [Warn] db: slow`,
    );
    expect(FORMATTING_ERROR).toBe("FORMATTING ERROR");
  });
});
