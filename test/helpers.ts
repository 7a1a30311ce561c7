import { Writable } from "node:stream";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import type { TestDefinition } from "../src/types.js";

/** A writable that keeps everything written to it. */
export function captureStream(): { stream: Writable; output: () => string } {
  let buffer = "";
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      buffer += chunk.toString();
      callback();
    },
  });
  return { stream, output: () => buffer };
}

export function makeTest(overrides: Partial<TestDefinition> = {}): TestDefinition {
  return {
    name: "copy",
    command: "cp INPUT_FILE OUTPUT_FILE",
    ext: ".mov",
    processes: [1],
    interlacedOption: "",
    scalingOption: "",
    ...overrides,
  };
}

export async function makeTmpDir(prefix: string): Promise<string> {
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

/**
 * Writes an executable that prints canned `mediainfo --full` output, so the
 * inspector can be exercised without the real tool.
 */
export async function writeFakeMediainfo(
  dir: string,
  output: string,
): Promise<string> {
  const script = path.join(dir, "fake-mediainfo");
  const body = output.replace(/'/g, "'\\''");
  await fs.writeFile(script, `#!/bin/sh\nprintf '%s\\n' '${body}'\n`);
  await fs.chmod(script, 0o755);
  return script;
}
