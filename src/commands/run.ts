import * as fs from "node:fs/promises";
import { hostname } from "node:os";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import { ConfigError, loadTests } from "../config.js";
import { runTests } from "../driver.js";
import { inspectMedia } from "../mediainfo.js";
import { renderCsv } from "../render.js";
import { assetKey } from "../template.js";
import {
  cleanOutputDir,
  exists,
  findSourceAssets,
  isDirectory,
  reportFilename,
} from "../storage.js";
import { createLogger, type Logger } from "../log.js";
import type { HarnessOptions, TestDefinition } from "../types.js";

export interface RunArgs {
  assets: string;
  output: string;
  tests: string;
}

export interface RunCommandOptions extends HarnessOptions {
  reportDir?: string;
  mediainfo?: string;
  logDir?: string;
  host?: string;
  now?: Date;
  stderr?: NodeJS.WritableStream;
}

/**
 * Benchmark every test in the tests file against the clips under `assets`,
 * writing transcodes to `output` and the CSV report to `reportDir`.
 * Resolves to the report path, or undefined when nothing was written.
 */
export async function runCommand(
  cwd: string,
  args: RunArgs,
  options: RunCommandOptions,
): Promise<string | undefined> {
  const logger = createLogger(options.stderr ?? process.stderr, options.debug);

  const assetsDir = resolve(cwd, args.assets);
  const outputDir = resolve(cwd, args.output);
  const testsPath = resolve(cwd, args.tests);
  const host = options.host ?? hostname();

  const prepared = await prepareRun(
    { assetsDir, outputDir, testsPath },
    reportPathFor(cwd, options, testsPath, host),
  ).catch((err: unknown) => {
    fail(logger, err);
    return undefined;
  });
  if (!prepared) return undefined;
  const { tests, assets, reportPath } = prepared;

  try {
    // Leftovers from a previous run
    await cleanOutputDir(outputDir, logger);

    const report = await runTests(tests, assets, {
      outputDir,
      assetsDir,
      options,
      logger,
      host,
      logDir: options.logDir,
      inspect: (file) =>
        inspectMedia(file, { logger, binary: options.mediainfo }),
    });

    await fs.writeFile(reportPath, renderCsv(report), { flag: "wx" });
    logger.info(`Results written to ${reportPath}`);
    return reportPath;
  } catch (err: unknown) {
    fail(logger, err);
    return undefined;
  } finally {
    if (!options.keepOutputs) {
      await cleanOutputDir(outputDir, logger);
    }
  }
}

interface PreparedRun {
  tests: TestDefinition[];
  assets: string[];
  reportPath: string;
}

function reportPathFor(
  cwd: string,
  options: RunCommandOptions,
  testsPath: string,
  host: string,
): string {
  return resolve(
    cwd,
    options.reportDir ?? ".",
    reportFilename(testsPath, host, options.now ?? new Date()),
  );
}

function isWithin(dir: string, parent: string): boolean {
  const rel = relative(parent, dir);
  return rel === "" || (rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

/** Everything that can make the run fatal is checked before any work starts. */
async function prepareRun(
  paths: { assetsDir: string; outputDir: string; testsPath: string },
  reportPath: string,
): Promise<PreparedRun> {
  const { assetsDir, outputDir, testsPath } = paths;
  if (!(await isDirectory(assetsDir))) {
    throw new ConfigError(`${assetsDir} is not a directory or is not readable!`);
  }
  if (!(await isDirectory(outputDir))) {
    throw new ConfigError(`${outputDir} is not a directory or is not readable!`);
  }

  // The output directory's files are deleted before and after the run
  if (isWithin(outputDir, assetsDir)) {
    throw new ConfigError(
      `Output directory ${outputDir} must not be inside the assets directory ${assetsDir}`,
    );
  }
  if (outputDir === dirname(testsPath)) {
    throw new ConfigError(
      `Output directory ${outputDir} must not contain the tests file ${testsPath}`,
    );
  }
  if (outputDir === dirname(reportPath)) {
    throw new ConfigError(`Output directory ${outputDir} must not be the report directory`);
  }

  const tests = await loadTests(testsPath);

  if (await exists(reportPath)) {
    throw new ConfigError(`${reportPath} exists, please remove or rename!`);
  }

  const assets = await findSourceAssets(assetsDir);
  if (assets.length === 0) {
    throw new ConfigError(`No .mov files found under ${assetsDir}`);
  }

  const seen = new Map<string, string>();
  for (const asset of assets) {
    const key = assetKey(asset, assetsDir);
    const other = seen.get(key);
    if (other !== undefined) {
      throw new ConfigError(`${other} and ${asset} would share output names (${key})`);
    }
    seen.set(key, asset);
  }

  return { tests, assets, reportPath };
}

function fail(logger: Logger, err: unknown): void {
  logger.error(err instanceof Error ? err.message : String(err), err);
  process.exitCode = 1;
}
