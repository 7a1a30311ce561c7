import { spawn } from "node:child_process";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CommandInvocation, ProcessOutcome } from "./types.js";
import type { Logger } from "./log.js";

export interface RunnerOptions {
  logDir: string;
  keepOutputs: boolean;
  logger: Logger;
  cwd?: string;
}

export function logPath(logDir: string, label: string): string {
  return path.join(logDir, `${label}.txt`);
}

/**
 * Run one invocation through `sh -c`, with stdout and stderr going to a log
 * file named after the invocation's label. Failures are encoded in the
 * outcome, never thrown.
 */
export async function runInvocation(
  invocation: CommandInvocation,
  options: RunnerOptions,
): Promise<ProcessOutcome> {
  const { logger } = options;
  const file = logPath(options.logDir, invocation.label);

  logger.debug(`Executing: ${invocation.command} &> ${file}`);

  const handle = await fs.open(file, "w");
  const startTime = new Date();
  const started = performance.now();
  const { exitCode, signal, spawnError } = await waitForExit(
    invocation.command,
    handle.fd,
    options.cwd,
  ).finally(() => handle.close());
  // span measured on the monotonic clock
  const endTime = new Date(startTime.getTime() + (performance.now() - started));

  const succeeded = exitCode === 0 && spawnError === undefined;
  if (succeeded) {
    if (!options.keepOutputs) {
      await fs.rm(file, { force: true });
    }
  } else {
    logger.error(describeFailure(invocation.command, exitCode, signal, spawnError));
    logger.error(`Results written to ${file}`);
  }

  return {
    command: invocation.command,
    startTime,
    endTime,
    succeeded,
    exitCode,
    signal,
    logPath: file,
  };
}

function describeFailure(
  command: string,
  exitCode: number | null,
  signal: NodeJS.Signals | null,
  spawnError: Error | undefined,
): string {
  if (spawnError) {
    return `Could not start command '${command}': ${spawnError.message}`;
  }
  if (signal) {
    return `Command '${command}' was killed by signal ${signal}`;
  }
  return `Got back error code ${exitCode} from command '${command}'`;
}

interface ExitStatus {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  spawnError?: Error;
}

function waitForExit(
  command: string,
  fd: number,
  cwd: string | undefined,
): Promise<ExitStatus> {
  return new Promise((resolve) => {
    const child = spawn("sh", ["-c", command], {
      cwd,
      stdio: ["ignore", fd, fd],
    });
    // "error" can be followed by "close"; first one wins
    child.on("error", (err) =>
      resolve({ exitCode: null, signal: null, spawnError: err }),
    );
    child.on("close", (code, signal) => resolve({ exitCode: code, signal }));
  });
}
