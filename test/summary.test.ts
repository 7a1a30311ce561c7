import { describe, it, expect } from "vitest";
import {
  averageElapsed,
  elapsedSeconds,
  percentageOfRealTime,
  roundHalfAwayFromZero,
  summarize,
} from "../src/summary.js";
import type { RunResult } from "../src/types.js";

const T0 = new Date("2024-03-01T10:00:00.000Z");

function at(seconds: number): Date {
  return new Date(T0.getTime() + seconds * 1000);
}

function result(startSec: number, endSec: number): RunResult {
  return {
    command: "transcode",
    startTime: at(startSec),
    endTime: at(endSec),
    succeeded: true,
  };
}

describe("roundHalfAwayFromZero", () => {
  it("rounds halves up for positive values", () => {
    expect(roundHalfAwayFromZero(2.5)).toBe(3);
    expect(roundHalfAwayFromZero(0.5)).toBe(1);
  });

  it("rounds halves down for negative values", () => {
    expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
  });

  it("rounds to nearest otherwise", () => {
    expect(roundHalfAwayFromZero(2.49)).toBe(2);
    expect(roundHalfAwayFromZero(7.51)).toBe(8);
  });
});

describe("elapsedSeconds", () => {
  it("rounds to whole seconds", () => {
    expect(elapsedSeconds(at(0), at(1.4))).toBe(1);
    expect(elapsedSeconds(at(0), at(1.5))).toBe(2);
  });

  it("is 0 for the same instant", () => {
    expect(elapsedSeconds(T0, T0)).toBe(0);
  });
});

describe("averageElapsed", () => {
  it("is 0 for an empty result set", () => {
    expect(averageElapsed([])).toBe(0);
  });

  it("truncates the mean of per-run elapsed seconds", () => {
    // 3 + 4 = 7, 7 / 2 = 3.5 → 3
    expect(averageElapsed([result(0, 3), result(0, 4)])).toBe(3);
  });

  it("uses rounded per-run values", () => {
    // 2.6 → 3 and 4.4 → 4, mean 3.5 → 3
    expect(averageElapsed([result(0, 2.6), result(1, 5.4)])).toBe(3);
  });
});

describe("percentageOfRealTime", () => {
  it("is undefined without a reference duration", () => {
    expect(percentageOfRealTime(12, undefined)).toBeUndefined();
  });

  it("is undefined for a zero reference duration", () => {
    expect(percentageOfRealTime(12, 0)).toBeUndefined();
  });

  it("rounds total / duration * 100", () => {
    expect(percentageOfRealTime(5, 10)).toBe(50);
    expect(percentageOfRealTime(1, 3)).toBe(33);
    expect(percentageOfRealTime(2, 3)).toBe(67);
    expect(percentageOfRealTime(30, 20)).toBe(150);
  });
});

describe("summarize", () => {
  it("total is the batch span, not the sum of runs", () => {
    const summary = summarize(
      "clip.mov",
      [result(0, 2), result(0, 2), result(0, 2)],
      at(0),
      at(3),
      10,
    );
    expect(summary.total).toBe(3);
    expect(summary.average).toBe(2);
    expect(summary.percentage).toBe(30);
  });

  it("a slow outlier extends total for the whole batch", () => {
    const summary = summarize(
      "clip.mov",
      [result(0, 1), result(0, 1), result(0, 9)],
      at(0),
      at(9),
      20,
    );
    // (1 + 1 + 9) / 3 = 3.67 → 3
    expect(summary.average).toBe(3);
    expect(summary.total).toBe(9);
    expect(summary.percentage).toBe(45);
  });

  it("still summarizes an empty result set", () => {
    const summary = summarize("clip.mov", [], at(0), at(4), 8);
    expect(summary).toEqual({
      status: "ok",
      assetName: "clip.mov",
      results: [],
      batchStart: at(0),
      batchEnd: at(4),
      referenceDuration: 8,
      total: 4,
      average: 0,
      percentage: 50,
    });
  });

  it("leaves percentage undefined when the duration is unknown", () => {
    const summary = summarize("clip.mov", [result(0, 1)], at(0), at(1));
    expect(summary.referenceDuration).toBeUndefined();
    expect(summary.percentage).toBeUndefined();
  });
});
