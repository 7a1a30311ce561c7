import type { AssetSummary, RunResultSet } from "./types.js";

/** Round to the nearest integer, halves away from zero (2.5 → 3, -2.5 → -3). */
export function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

/** Whole seconds between two instants. */
export function elapsedSeconds(start: Date, end: Date): number {
  return roundHalfAwayFromZero((end.getTime() - start.getTime()) / 1000);
}

export function averageElapsed(results: RunResultSet): number {
  if (results.length === 0) return 0;
  let sum = 0;
  for (const result of results) {
    sum += elapsedSeconds(result.startTime, result.endTime);
  }
  return Math.trunc(sum / results.length);
}

/** `undefined` when there is no usable reference duration. */
export function percentageOfRealTime(
  total: number,
  referenceDuration: number | undefined,
): number | undefined {
  if (!referenceDuration) return undefined;
  return roundHalfAwayFromZero((total / referenceDuration) * 100);
}

export function summarize(
  assetName: string,
  results: RunResultSet,
  batchStart: Date,
  batchEnd: Date,
  referenceDuration?: number,
): AssetSummary {
  const total = elapsedSeconds(batchStart, batchEnd);
  return {
    status: "ok",
    assetName,
    results,
    batchStart,
    batchEnd,
    referenceDuration,
    total,
    average: averageElapsed(results),
    percentage: percentageOfRealTime(total, referenceDuration),
  };
}
