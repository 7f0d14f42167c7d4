import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigurationError, MediaProcessError } from "@reelsmith/core";
import { ProcessExitError } from "../utils/exec-safe.js";
import { FfmpegCommand } from "./command.js";
import { MediaProcessGateway, parseFrameRate, type ProcessRunner } from "./gateway.js";

interface SpawnCall {
  cmd: string;
  args: string[];
  expectedDuration?: number;
}

/** Runner that answers ffprobe with canned JSON and records ffmpeg calls */
class FakeRunner implements ProcessRunner {
  probes = new Map<string, unknown>();
  spawns: SpawnCall[] = [];
  installed = new Set(["ffmpeg", "ffprobe"]);
  failSpawn?: Error;

  async resolve(cmd: string): Promise<string | null> {
    return this.installed.has(cmd) ? `/usr/bin/${cmd}` : null;
  }

  async exec(cmd: string, args: string[]): Promise<{ stdout: string; stderr: string }> {
    if (cmd === "/usr/bin/ffmpeg" && args[0] === "-version") {
      return { stdout: "ffmpeg version 6.1.1 Copyright (c) 2000-2023\nbuilt with gcc\n", stderr: "" };
    }
    const target = args[args.length - 1];
    const probe = this.probes.get(target);
    if (probe === undefined) {
      throw new ProcessExitError(`${target}: Invalid data found when processing input`, 1, "moov atom not found");
    }
    return { stdout: typeof probe === "string" ? probe : JSON.stringify(probe), stderr: "" };
  }

  async spawn(cmd: string, args: string[], _onProgress?: (p: number) => void, expectedDuration?: number): Promise<void> {
    this.spawns.push({ cmd, args, expectedDuration });
    if (this.failSpawn) throw this.failSpawn;
  }
}

describe("MediaProcessGateway", () => {
  let dir: string;
  let runner: FakeRunner;
  let gateway: MediaProcessGateway;
  let clip: string;
  let audio: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "reelsmith-gateway-"));
    clip = join(dir, "scene_01.mp4");
    audio = join(dir, "scene_01.mp3");
    await writeFile(clip, "video");
    await writeFile(audio, "audio");
    runner = new FakeRunner();
    gateway = await MediaProcessGateway.create(runner);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("create", () => {
    it("should fail with install instructions when ffprobe is missing", async () => {
      runner.installed.delete("ffprobe");
      const error = await MediaProcessGateway.create(runner).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toHaveProperty("message", "ffprobe not found on PATH");
      expect(error).toHaveProperty("hint", expect.stringContaining("brew install ffmpeg"));
    });

    it("should name both tools when neither is installed", async () => {
      runner.installed.clear();
      await expect(MediaProcessGateway.create(runner)).rejects.toThrow("ffmpeg and ffprobe not found on PATH");
    });
  });

  it("should report the ffmpeg version line", async () => {
    expect(await gateway.version()).toBe("ffmpeg version 6.1.1 Copyright (c) 2000-2023");
  });

  describe("getMetadata", () => {
    it("should read the video stream", async () => {
      runner.probes.set(clip, {
        streams: [
          { codec_type: "video", codec_name: "h264", width: 1024, height: 576, r_frame_rate: "30000/1001", duration: "4.170833" },
          { codec_type: "audio", codec_name: "aac", duration: "4.2" },
        ],
        format: { duration: "4.2" },
      });

      expect(await gateway.getMetadata(clip)).toEqual({
        width: 1024,
        height: 576,
        codec: "h264",
        fps: 29.97,
        duration: 4.170833,
      });
    });

    it("should fall back to the container duration", async () => {
      runner.probes.set(clip, {
        streams: [{ codec_type: "video", codec_name: "vp9", width: 640, height: 360, r_frame_rate: "24/1" }],
        format: { duration: "3.5" },
      });
      const metadata = await gateway.getMetadata(clip);
      expect(metadata.duration).toBe(3.5);
      expect(metadata.fps).toBe(24);
    });

    it("should fail when no duration is available", async () => {
      runner.probes.set(clip, { streams: [{ codec_type: "video", duration: "N/A" }], format: {} });
      await expect(gateway.getMetadata(clip)).rejects.toMatchObject({ failure: "invalid-duration" });
    });
  });

  describe("probeDuration", () => {
    it("should prefer the container duration", async () => {
      runner.probes.set(audio, { streams: [{ codec_type: "audio", duration: "9.1" }], format: { duration: "9.144" } });
      expect(await gateway.probeDuration(audio)).toBe(9.144);
    });

    it("should use the longest stream without a container duration", async () => {
      runner.probes.set(clip, {
        streams: [
          { codec_type: "video", duration: "4" },
          { codec_type: "audio", duration: "4.25" },
        ],
      });
      expect(await gateway.probeDuration(clip)).toBe(4.25);
    });

    it("should raise missing-input for absent files", async () => {
      const error = await gateway.probeDuration(join(dir, "nope.mp4")).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(MediaProcessError);
      expect(error).toHaveProperty("failure", "missing-input");
    });

    it("should raise probe-failed with stderr when ffprobe fails", async () => {
      const error = await gateway.probeDuration(clip).catch((e: unknown) => e);
      expect(error).toMatchObject({ failure: "probe-failed", stderr: "moov atom not found" });
    });

    it("should raise probe-failed on output that is not JSON", async () => {
      runner.probes.set(clip, "not json");
      await expect(gateway.probeDuration(clip)).rejects.toMatchObject({ failure: "probe-failed" });
    });
  });

  it("should report which streams a file has", async () => {
    runner.probes.set(clip, { streams: [{ codec_type: "video" }], format: { duration: "2" } });
    expect(await gateway.probeStreams(clip)).toEqual({ hasVideo: true, hasAudio: false });
    expect(await gateway.hasAudioStream(clip)).toBe(false);
    expect(await gateway.hasVideoStream(clip)).toBe(true);
  });

  it("should mux without re-encoding the video", async () => {
    const out = join(dir, "out.mp4");
    await gateway.mergeVideoAudio(clip, audio, out);

    expect(runner.spawns[0].cmd).toBe("/usr/bin/ffmpeg");
    expect(runner.spawns[0].args).toEqual([
      "-hide_banner", "-y",
      "-i", clip,
      "-i", audio,
      "-map", "0:v:0",
      "-map", "1:a:0",
      "-c:v", "copy",
      "-c:a", "aac",
      "-b:a", "192k",
      "-shortest",
      out,
    ]);
  });

  it("should extract audio as mp3", async () => {
    const out = join(dir, "track.mp3");
    await gateway.extractAudio(clip, out);
    expect(runner.spawns[0].args).toEqual([
      "-hide_banner", "-y", "-i", clip, "-vn", "-c:a", "libmp3lame", "-b:a", "192k", out,
    ]);
  });

  it("should render a test pattern with a sine tone", async () => {
    const out = join(dir, "test.mp4");
    await gateway.generateSyntheticTestClip({ outputPath: out, duration: 2, width: 320, height: 240 });
    expect(runner.spawns[0].args).toEqual([
      "-hide_banner", "-y",
      "-f", "lavfi", "-i", "testsrc=duration=2:size=320x240:rate=24",
      "-f", "lavfi", "-i", "sine=frequency=1000:duration=2",
      "-c:a", "aac", "-b:a", "192k", "-shortest",
      "-c:v", "libx264", "-pix_fmt", "yuv420p",
      out,
    ]);
  });

  it("should leave out the tone when audio is disabled", async () => {
    await gateway.generateSyntheticTestClip({ outputPath: join(dir, "silent.mp4"), withAudio: false });
    expect(runner.spawns[0].args).not.toContain("sine=frequency=1000:duration=5");
    expect(runner.spawns[0].args.slice(2, 6)).toEqual(["-f", "lavfi", "-i", "testsrc=duration=5:size=640x360:rate=24"]);
  });

  it("should pass the duration hint and wrap failures", async () => {
    runner.failSpawn = new ProcessExitError("Error opening output file", 1, "Permission denied");
    const command = new FfmpegCommand().input(clip).duration(3).output(join(dir, "x.mp4"));

    const error = await gateway.run(command).catch((e: unknown) => e);
    expect(runner.spawns[0].expectedDuration).toBe(3);
    expect(error).toBeInstanceOf(MediaProcessError);
    expect(error).toMatchObject({
      message: "ffmpeg failed: Error opening output file",
      failure: "process-failed",
      stderr: "Permission denied",
    });
  });
});

describe("parseFrameRate", () => {
  it("should evaluate fractions and plain numbers", () => {
    expect(parseFrameRate("24000/1001")).toBe(23.98);
    expect(parseFrameRate("25")).toBe(25);
  });

  it("should return 0 for missing or degenerate rates", () => {
    expect(parseFrameRate(undefined)).toBe(0);
    expect(parseFrameRate("0/0")).toBe(0);
  });
});
