import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { createMediaInfoCache, inspectMedia, parseMediaInfo } from "../src/mediainfo.js";
import { createLogger } from "../src/log.js";
import { captureStream, makeTmpDir, writeFakeMediainfo } from "./helpers.js";

const SAMPLE = `General
Complete name                            : /media/intro.mov
Duration                                 : 10010
Duration                                 : 10 s 10 ms

Video
Duration                                 : 9000
Width                                    : 1440
Width                                    : 1 440 pixels
Scan type                                : Interlaced
`;

describe("parseMediaInfo", () => {
  it("takes the first duration in milliseconds as whole seconds", () => {
    expect(parseMediaInfo(SAMPLE).durationSeconds).toBe(10);
  });

  it("detects interlaced scan and 1440-wide video", () => {
    const info = parseMediaInfo(SAMPLE);
    expect(info.interlaced).toBe(true);
    expect(info.needsScaling).toBe(true);
  });

  it("reports progressive 1920-wide video as needing nothing", () => {
    const info = parseMediaInfo(
      "Duration : 20000\nWidth : 1920\nScan type : Progressive\n",
    );
    expect(info).toEqual({
      durationSeconds: 20,
      interlaced: false,
      needsScaling: false,
    });
  });

  it("leaves duration unset when none is reported", () => {
    expect(parseMediaInfo("General\nFormat : QuickTime\n")).toEqual({
      interlaced: false,
      needsScaling: false,
    });
  });
});

describe("inspectMedia", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await makeTmpDir("tb-mediainfo-");
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("parses the output of the configured binary", async () => {
    const binary = await writeFakeMediainfo(
      tmpDir,
      "Duration : 20000\nScan type : Interlaced",
    );
    const { stream } = captureStream();

    const info = await inspectMedia("clip.mov", {
      binary,
      logger: createLogger(stream),
    });

    expect(info).toEqual({ durationSeconds: 20, interlaced: true, needsScaling: false });
  });

  it("treats a failing inspector as metadata unavailable", async () => {
    const { stream, output } = captureStream();

    const info = await inspectMedia("clip.mov", {
      binary: path.join(tmpDir, "no-such-mediainfo"),
      logger: createLogger(stream),
    });

    expect(info).toEqual({ interlaced: false, needsScaling: false });
    expect(output()).toContain("clip duration and options unavailable");
  });
});

describe("createMediaInfoCache", () => {
  it("inspects each file once", async () => {
    const inspect = vi.fn(async (file: string) => ({
      durationSeconds: file === "a.mov" ? 10 : 20,
      interlaced: false,
      needsScaling: false,
    }));
    const cached = createMediaInfoCache(inspect);

    await cached("a.mov");
    await cached("b.mov");
    const again = await cached("a.mov");

    expect(again.durationSeconds).toBe(10);
    expect(inspect).toHaveBeenCalledTimes(2);
  });
});
