import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "./log.js";

const SOURCE_PATTERN = /.+\.mov$/;

/** Every `.mov` under `dir`, recursively, sorted by full path. */
export async function findSourceAssets(dir: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(current: string): Promise<void> {
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (SOURCE_PATTERN.test(full)) {
        files.push(full);
      }
    }
  }

  await walk(dir);
  return files.sort();
}

/**
 * Make `count` copies of `file` in `outputDir` as `<stem>_<n><ext>`, the
 * stem defaulting to the file's base name. Copies that already exist are
 * reused, so the stem must be unique per source clip.
 */
export async function replicateInput(
  file: string,
  outputDir: string,
  count: number,
  logger: Logger,
  stem?: string,
): Promise<string[]> {
  const copies: string[] = [];
  if (count <= 0) return copies;

  logger.debug(`Making ${count} copies of '${file}'`);
  const ext = path.extname(file);
  const name = stem ?? path.basename(file, ext);

  for (let i = 1; i <= count; i++) {
    const dest = path.join(outputDir, `${name}_${i}${ext}`);
    if (await exists(dest)) {
      logger.debug(`Skipping copying '${file}' as '${dest}' exists`);
    } else {
      logger.debug(`Copying '${file}' to '${dest}'`);
      await fs.copyFile(file, dest);
    }
    copies.push(dest);
  }

  return copies;
}

/** Delete the regular files directly inside `dir`; subdirectories stay. */
export async function cleanOutputDir(dir: string, logger: Logger): Promise<void> {
  logger.debug(`Cleaning output folder '${dir}'`);
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (!entry.isDirectory()) {
      await fs.rm(path.join(dir, entry.name), { force: true });
    }
  }
}

export async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `<tests base>-<host>-<YYYY-MM-DD-HH.MM>.csv`, local time. */
export function reportFilename(testsPath: string, host: string, at: Date): string {
  const base = path.basename(testsPath, path.extname(testsPath));
  const stamp =
    `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())}` +
    `-${pad(at.getHours())}.${pad(at.getMinutes())}`;
  return `${base}-${host}-${stamp}.csv`;
}
