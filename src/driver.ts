import * as os from "node:os";
import * as path from "node:path";
import { executeBatch } from "./executor.js";
import { createMediaInfoCache, inspectMedia, type MediaInspector } from "./mediainfo.js";
import { replicateInput } from "./storage.js";
import { summarize } from "./summary.js";
import {
  assetKey,
  assetName,
  buildSubstitutions,
  outputFilename,
  resolveCommand,
} from "./template.js";
import type { Logger } from "./log.js";
import type { RunnerOptions } from "./runner.js";
import type {
  BatchOutcome,
  CommandInvocation,
  HarnessOptions,
  MediaInfo,
  Report,
  ReportCell,
  ReportSection,
  TestDefinition,
} from "./types.js";

export type Replicator = (
  file: string,
  outputDir: string,
  count: number,
  logger: Logger,
  stem: string,
) => Promise<string[]>;

export type BatchExecutor = (
  invocations: readonly CommandInvocation[],
  options: RunnerOptions,
) => Promise<BatchOutcome>;

/** One input of a batch and the stem its output and log are named after. */
export interface BatchInput {
  file: string;
  stem: string;
}

export interface DriverContext {
  outputDir: string;
  /** Clips are named relative to this; defaults to their base names. */
  assetsDir?: string;
  options: HarnessOptions;
  logger: Logger;
  host?: string;
  /** Where per-run logs go. Defaults to the OS temp dir. */
  logDir?: string;
  /** Overrides for testing; wrapped in a per-run cache. */
  inspect?: MediaInspector;
  replicate?: Replicator;
  execute?: BatchExecutor;
}

const NO_METADATA: MediaInfo = { interlaced: false, needsScaling: false };

/**
 * Run every test at every parallelism level against every asset and collect
 * one report section per (test, level). Levels run in the order declared,
 * duplicates included; assets run in sorted order.
 */
export async function runTests(
  tests: readonly TestDefinition[],
  assets: readonly string[],
  ctx: DriverContext,
): Promise<Report> {
  const { logger, outputDir } = ctx;
  const sortedAssets = [...assets].sort();
  const inspect = createMediaInfoCache(
    ctx.inspect ?? ((file) => inspectMedia(file, { logger })),
  );
  const replicate = ctx.replicate ?? replicateInput;
  const execute = ctx.execute ?? executeBatch;
  const runnerOptions: RunnerOptions = {
    logDir: ctx.logDir ?? os.tmpdir(),
    keepOutputs: ctx.options.keepOutputs,
    logger,
  };

  const sections: ReportSection[] = [];

  for (const test of tests) {
    for (const parallelism of test.processes) {
      logger.info(`Running '${test.name}' with ${parallelism} process(es)`);
      const cells: ReportCell[] = [];

      for (const asset of sortedAssets) {
        const name = assetName(asset, ctx.assetsDir);
        const key = assetKey(asset, ctx.assetsDir);
        const media = await inspectSafely(inspect, asset, logger);

        let invocations: CommandInvocation[];
        try {
          const copies = await replicate(asset, outputDir, parallelism - 1, logger, key);
          const inputs: BatchInput[] = [
            ...copies.map((file) => ({
              file,
              stem: path.basename(file, path.extname(file)),
            })),
            { file: asset, stem: key },
          ];
          invocations = buildInvocations(inputs, test, parallelism, media, outputDir);
        } catch (err: unknown) {
          const reason = (err as Error).message;
          logger.error(`Skipping ${name} for '${test.name}': ${reason}`, err);
          cells.push({ status: "missing", assetName: name, reason });
          continue;
        }

        for (const invocation of invocations) {
          logger.info(`  Transcoding ${invocation.label}`);
        }

        const batch = await execute(invocations, runnerOptions);
        cells.push(
          summarize(
            name,
            batch.results,
            batch.batchStart,
            batch.batchEnd,
            media.durationSeconds,
          ),
        );
      }

      sections.push({ test: test.name, parallelism, cells });
    }
  }

  return {
    host: ctx.host ?? os.hostname(),
    assets: sortedAssets.map((asset) => assetName(asset, ctx.assetsDir)),
    sections,
  };
}

export function buildInvocations(
  inputs: readonly BatchInput[],
  test: TestDefinition,
  parallelism: number,
  media: MediaInfo,
  outputDir: string,
): CommandInvocation[] {
  return inputs.map((input) => {
    const label = outputFilename(input.stem, test, parallelism);
    const substitutions = buildSubstitutions(
      test,
      media,
      input.file,
      path.join(outputDir, label),
    );
    return { command: resolveCommand(test.command, substitutions), label };
  });
}

async function inspectSafely(
  inspect: MediaInspector,
  asset: string,
  logger: Logger,
): Promise<MediaInfo> {
  try {
    return await inspect(asset);
  } catch (err: unknown) {
    logger.error(
      `Could not inspect ${asset}, clip duration unavailable: ${(err as Error).message}`,
      err,
    );
    return NO_METADATA;
  }
}
