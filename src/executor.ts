import { runInvocation, type RunnerOptions } from "./runner.js";
import type {
  BatchOutcome,
  CommandInvocation,
  ProcessOutcome,
  RunResult,
} from "./types.js";

export type InvocationRunner = (
  invocation: CommandInvocation,
  options: RunnerOptions,
) => Promise<ProcessOutcome>;

/**
 * Launch every invocation at once and wait for all of them to settle.
 *
 * Each invocation is its own child process, so the external tool runs in
 * parallel; this call only waits. Results are collected per unit and merged
 * after the join, so no unit writes to shared state. Only successful runs
 * are kept.
 *
 * There is no timeout: a child that never exits keeps the batch waiting.
 * Start times are wall-clock; end times add a monotonic span to them, so
 * `end - start` is never negative even if the system clock is stepped.
 */
export async function executeBatch(
  invocations: readonly CommandInvocation[],
  options: RunnerOptions,
  run: InvocationRunner = runInvocation,
): Promise<BatchOutcome> {
  const batchStart = new Date();
  const started = performance.now();

  // allSettled: a unit that throws must not release the barrier early
  const settled = await Promise.allSettled(
    invocations.map((invocation) => run(invocation, options)),
  );

  const batchEnd = new Date(batchStart.getTime() + (performance.now() - started));

  const results: RunResult[] = [];
  settled.forEach((entry, index) => {
    if (entry.status === "rejected") {
      options.logger.error(
        `Could not run '${invocations[index].command}': ${errorMessage(entry.reason)}`,
        entry.reason,
      );
      return;
    }
    const outcome = entry.value;
    if (outcome.succeeded) {
      results.push({
        command: outcome.command,
        startTime: outcome.startTime,
        endTime: outcome.endTime,
        succeeded: true,
      });
    }
  });

  return {
    results,
    batchStart,
    batchEnd,
    failed: invocations.length - results.length,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
