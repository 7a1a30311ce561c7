export interface TestDefinition {
  name: string;
  command: string;
  ext: string;
  processes: number[];
  interlacedOption: string;
  scalingOption: string;
}

export interface HarnessOptions {
  keepOutputs: boolean;
  debug: boolean;
}

export interface MediaInfo {
  /** Clip length in whole seconds, when mediainfo reported one. */
  durationSeconds?: number;
  interlaced: boolean;
  needsScaling: boolean;
}

export interface CommandInvocation {
  readonly command: string;
  readonly label: string;
}

export interface ProcessOutcome {
  command: string;
  startTime: Date;
  endTime: Date;
  succeeded: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  logPath: string;
}

export interface RunResult {
  readonly command: string;
  readonly startTime: Date;
  readonly endTime: Date;
  readonly succeeded: true;
}

export type RunResultSet = readonly RunResult[];

export interface BatchOutcome {
  results: RunResultSet;
  batchStart: Date;
  batchEnd: Date;
  failed: number;
}

export interface AssetSummary {
  status: "ok";
  assetName: string;
  results: RunResultSet;
  batchStart: Date;
  batchEnd: Date;
  referenceDuration?: number;
  total: number;
  average: number;
  percentage?: number;
}

export interface MissingAsset {
  status: "missing";
  assetName: string;
  reason: string;
}

export type ReportCell = AssetSummary | MissingAsset;

export interface ReportSection {
  test: string;
  parallelism: number;
  cells: ReportCell[];
}

export interface Report {
  host: string;
  assets: string[];
  sections: ReportSection[];
}
