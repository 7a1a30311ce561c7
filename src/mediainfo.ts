import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { MediaInfo } from "./types.js";
import type { Logger } from "./log.js";

const execFileAsync = promisify(execFile);

const DURATION = /duration\s+:\s+(\d+)/i;
const INTERLACED = /scan type\s+:\s+interlaced/i;
const NEEDS_SCALING = /width\s+:\s+1440/i;

export type MediaInspector = (file: string) => Promise<MediaInfo>;

export interface InspectOptions {
  logger: Logger;
  /** Defaults to `mediainfo` on the PATH. */
  binary?: string;
}

/**
 * Parse `mediainfo --full` output. The first duration line wins and is
 * reported in milliseconds; 1440-wide clips are flagged for scaling.
 */
export function parseMediaInfo(output: string): MediaInfo {
  const info: MediaInfo = { interlaced: false, needsScaling: false };

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0) continue;

    const duration = DURATION.exec(line);
    if (duration && info.durationSeconds === undefined) {
      info.durationSeconds = Math.floor(parseInt(duration[1], 10) / 1000);
    }
    if (INTERLACED.test(line)) {
      info.interlaced = true;
    }
    if (NEEDS_SCALING.test(line)) {
      info.needsScaling = true;
    }
  }

  return info;
}

export async function inspectMedia(
  file: string,
  options: InspectOptions,
): Promise<MediaInfo> {
  const binary = options.binary ?? "mediainfo";
  options.logger.debug(`Running ${binary} on ${file}`);

  try {
    const { stdout } = await execFileAsync(binary, ["--full", file], {
      encoding: "utf-8",
      maxBuffer: 16 * 1024 * 1024,
    });
    return parseMediaInfo(stdout);
  } catch (err: unknown) {
    options.logger.error(
      `${binary} failed for ${file}, clip duration and options unavailable: ${(err as Error).message}`,
      err,
    );
    return { interlaced: false, needsScaling: false };
  }
}

/** Inspect each file at most once per run. */
export function createMediaInfoCache(inspect: MediaInspector): MediaInspector {
  const cache = new Map<string, Promise<MediaInfo>>();
  return (file) => {
    let entry = cache.get(file);
    if (!entry) {
      entry = inspect(file);
      cache.set(file, entry);
    }
    return entry;
  };
}
