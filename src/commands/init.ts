import { existsSync, writeFileSync } from "node:fs";
import { findTestsPath, DEFAULT_TESTS } from "../config.js";
import { createLogger } from "../log.js";

export function initCommand(
  cwd: string,
  force: boolean,
  stderr: NodeJS.WritableStream = process.stderr,
): void {
  const logger = createLogger(stderr);
  const testsPath = findTestsPath(cwd);

  if (existsSync(testsPath) && !force) {
    logger.error(`${testsPath} already exists. Use --force to overwrite.`);
    process.exitCode = 1;
    return;
  }

  writeFileSync(testsPath, DEFAULT_TESTS);
  logger.info(`Created ${testsPath}`);
}
