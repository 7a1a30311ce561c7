export { runInvocation, logPath, type RunnerOptions } from "./runner.js";
export { executeBatch, type InvocationRunner } from "./executor.js";
export {
  summarize,
  elapsedSeconds,
  averageElapsed,
  percentageOfRealTime,
  roundHalfAwayFromZero,
} from "./summary.js";
export {
  runTests,
  buildInvocations,
  type DriverContext,
  type Replicator,
  type BatchExecutor,
  type BatchInput,
} from "./driver.js";
export {
  inspectMedia,
  parseMediaInfo,
  createMediaInfoCache,
  type MediaInspector,
} from "./mediainfo.js";
export {
  resolveCommand,
  buildSubstitutions,
  cleanFilename,
  assetName,
  assetKey,
  outputFilename,
  type Substitutions,
} from "./template.js";
export {
  findSourceAssets,
  replicateInput,
  cleanOutputDir,
  reportFilename,
} from "./storage.js";
export { renderCsv, renderCsvRows, escapeCsvField } from "./render.js";
export { loadTests, validateTests, ConfigError } from "./config.js";
export { createLogger, silentLogger, type Logger } from "./log.js";
export type * from "./types.js";
