import * as path from "node:path";
import type { MediaInfo, TestDefinition } from "./types.js";

export const INPUT_FILE = "INPUT_FILE";
export const OUTPUT_FILE = "OUTPUT_FILE";
export const INTERLACED_OPTION = "INTERLACED_OPTION";
export const SCALING_OPTION = "SCALING_OPTION";

export type Substitutions = ReadonlyMap<string, string>;

/**
 * Replace every literal occurrence of each placeholder in `template`.
 * Placeholders without a substitution are left as they are.
 */
export function resolveCommand(
  template: string,
  substitutions: Substitutions,
): string {
  let command = template;
  for (const [placeholder, value] of substitutions) {
    command = command.split(placeholder).join(value);
  }
  return command;
}

/** Pick the per-clip options a test asks for, based on the clip's metadata. */
export function buildSubstitutions(
  test: TestDefinition,
  media: MediaInfo,
  inputFile: string,
  outputFile: string,
): Substitutions {
  return new Map([
    [INPUT_FILE, inputFile],
    [OUTPUT_FILE, outputFile],
    [INTERLACED_OPTION, media.interlaced ? test.interlacedOption : ""],
    [SCALING_OPTION, media.needsScaling ? test.scalingOption : ""],
  ]);
}

/** Drop any directory prefix and make the rest safe for a file name. */
export function cleanFilename(name: string): string {
  const base = name.replace(/^.*(\\|\/)/, "");
  return base.replace(/[^0-9A-Za-z.\-/]/g, "_");
}

/**
 * Name of a clip relative to the assets directory, with forward slashes.
 * Without an assets directory this is the clip's base name.
 */
export function assetName(file: string, assetsDir?: string): string {
  const relative = assetsDir ? path.relative(assetsDir, file) : path.basename(file);
  return relative.split(path.sep).join("/");
}

/**
 * File-name stem that identifies a clip within a run: `d1/clip.mov`
 * becomes `d1_clip`, a top-level `clip.mov` stays `clip`.
 */
export function assetKey(file: string, assetsDir?: string): string {
  const name = assetName(file, assetsDir);
  const stem = name.slice(0, name.length - path.extname(name).length);
  return cleanFilename(stem.replace(/[\\/]/g, "_"));
}

/**
 * Output file name for one run: `<stem>-<test>_<parallelism><ext>`.
 * Copies made for fan-out carry their own `_<n>` suffix in the stem,
 * so names are unique within a batch.
 */
export function outputFilename(
  stem: string,
  test: TestDefinition,
  parallelism: number,
): string {
  return `${cleanFilename(stem)}-${cleanFilename(test.name)}_${parallelism}${test.ext}`;
}
