import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { TestDefinition } from "./types.js";

export const DEFAULT_TESTS_FILE = "transcode-tests.yaml";

export const DEFAULT_TESTS = `# Each test runs its command once per source clip, at every parallelism
# level listed under "processes". Placeholders substituted per run:
#   INPUT_FILE, OUTPUT_FILE, INTERLACED_OPTION, SCALING_OPTION
- name: h264 baseline
  command: ffmbc -y -i INPUT_FILE INTERLACED_OPTION SCALING_OPTION -vcodec libx264 OUTPUT_FILE
  ext: .mp4
  processes: [1, 2, 4]
  interlaced_option: -deinterlace
  scaling_option: -s 1920x1080
`;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function findTestsPath(cwd: string): string {
  return path.resolve(cwd, DEFAULT_TESTS_FILE);
}

export async function loadTests(filePath: string): Promise<TestDefinition[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigError(
        `Tests file not found: ${filePath}. Run "transcode-bench init" to create one.`,
      );
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (err: unknown) {
    throw new ConfigError(
      `Invalid YAML in ${filePath}: ${(err as Error).message}`,
    );
  }

  return validateTests(raw);
}

export function validateTests(raw: unknown): TestDefinition[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new ConfigError("Tests file must be a non-empty YAML list of tests");
  }

  return raw.map((entry: unknown, index) => validateTest(entry, index + 1));
}

function validateTest(raw: unknown, position: number): TestDefinition {
  const where = `test ${position}`;
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${where}: must be a YAML object`);
  }

  const obj = raw as Record<string, unknown>;

  if (typeof obj.name !== "string" || obj.name.length === 0) {
    throw new ConfigError(`${where}: "name" is required`);
  }

  if (typeof obj.command !== "string" || obj.command.length === 0) {
    throw new ConfigError(`${where}: "command" is required`);
  }

  // ext (optional, defaults to no extension)
  let ext = "";
  if (obj.ext !== undefined && obj.ext !== null) {
    if (typeof obj.ext !== "string") {
      throw new ConfigError(`${where}: "ext" must be a string`);
    }
    ext = obj.ext;
  }

  // processes: a single level is shorthand for a one-element list
  const rawProcesses = typeof obj.processes === "number"
    ? [obj.processes]
    : obj.processes;
  if (
    !Array.isArray(rawProcesses) ||
    rawProcesses.length === 0 ||
    !rawProcesses.every(isPositiveInteger)
  ) {
    throw new ConfigError(
      `${where}: "processes" must be a non-empty array of positive integers`,
    );
  }

  return {
    name: obj.name,
    command: obj.command,
    ext,
    processes: rawProcesses,
    interlacedOption: optionalString(obj.interlaced_option, where, "interlaced_option"),
    scalingOption: optionalString(obj.scaling_option, where, "scaling_option"),
  };
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function optionalString(value: unknown, where: string, field: string): string {
  if (value === undefined || value === null) return "";
  if (typeof value !== "string") {
    throw new ConfigError(`${where}: "${field}" must be a string`);
  }
  return value;
}
