/**
 * @module media/gateway
 * @description The only place that runs ffmpeg and ffprobe.
 *
 * Every invocation goes through {@link FfmpegCommand}; subprocesses are
 * started through a {@link ProcessRunner} so tests can replace them.
 */

import { access } from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError, MediaProcessError, errorMessage } from "@reelsmith/core";
import { execSafe, resolveCommand, runWithProgress } from "../utils/exec-safe.js";
import { FfmpegCommand, formatSeconds, validateMediaPath, validateNumber } from "./command.js";

export interface ProcessRunner {
  resolve(cmd: string): Promise<string | null>;
  exec(cmd: string, args: string[]): Promise<{ stdout: string; stderr: string }>;
  spawn(cmd: string, args: string[], onProgress?: (percent: number) => void, expectedDuration?: number): Promise<void>;
}

export const systemRunner: ProcessRunner = {
  resolve: resolveCommand,
  exec: (cmd, args) => execSafe(cmd, args),
  spawn: runWithProgress,
};

export interface MediaMetadata {
  width: number;
  height: number;
  codec: string;
  /** Frames per second, rounded to 2 decimals */
  fps: number;
  /** Seconds */
  duration: number;
}

export interface StreamInfo {
  hasVideo: boolean;
  hasAudio: boolean;
}

export interface SyntheticClipOptions {
  outputPath: string;
  /** Seconds, default 5 */
  duration?: number;
  width?: number;
  height?: number;
  rate?: number;
  /** Sine tone frequency in Hz, default 1000 */
  frequency?: number;
  withAudio?: boolean;
}

export interface RunOptions {
  onProgress?: (percent: number) => void;
}

export interface MediaGateway {
  getMetadata(path: string): Promise<MediaMetadata>;
  probeDuration(path: string): Promise<number>;
  probeStreams(path: string): Promise<StreamInfo>;
  hasAudioStream(path: string): Promise<boolean>;
  hasVideoStream(path: string): Promise<boolean>;
  extractAudio(videoPath: string, outputPath: string): Promise<string>;
  mergeVideoAudio(videoPath: string, audioPath: string, outputPath: string): Promise<string>;
  generateSyntheticTestClip(options: SyntheticClipOptions): Promise<string>;
  run(command: FfmpegCommand, options?: RunOptions): Promise<void>;
}

export const FFMPEG_INSTALL_HINT =
  "Install FFmpeg (includes ffprobe): macOS `brew install ffmpeg`, Ubuntu `sudo apt install ffmpeg`, Windows `winget install ffmpeg`.";

const probeSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        codec_name: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
        r_frame_rate: z.string().optional(),
        duration: z.string().optional(),
      })
    )
    .default([]),
  format: z.object({ duration: z.string().optional() }).default({}),
});

type ProbeData = z.infer<typeof probeSchema>;

/** `"30000/1001"` → 29.97 */
export function parseFrameRate(rate: string | undefined): number {
  if (!rate) return 0;
  const [num, den] = rate.split("/").map(Number);
  const value = den === undefined ? num : den === 0 ? 0 : num / den;
  return Number.isFinite(value) ? Math.round(value * 100) / 100 : 0;
}

function stderrOf(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  const stderr: unknown = Reflect.get(error, "stderr");
  return typeof stderr === "string" ? stderr : undefined;
}

function positiveSeconds(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number.parseFloat(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}

export class MediaProcessGateway implements MediaGateway {
  private constructor(
    readonly ffmpegPath: string,
    readonly ffprobePath: string,
    private readonly runner: ProcessRunner
  ) {}

  /**
   * Locate ffmpeg and ffprobe on PATH.
   * @throws ConfigurationError when either is missing
   */
  static async create(runner: ProcessRunner = systemRunner): Promise<MediaProcessGateway> {
    const ffmpeg = await runner.resolve("ffmpeg");
    const ffprobe = await runner.resolve("ffprobe");
    if (!ffmpeg || !ffprobe) {
      const missing = [!ffmpeg && "ffmpeg", !ffprobe && "ffprobe"].filter(Boolean).join(" and ");
      throw new ConfigurationError(`${missing} not found on PATH`, FFMPEG_INSTALL_HINT);
    }
    return new MediaProcessGateway(ffmpeg, ffprobe, runner);
  }

  /** First line of `ffmpeg -version` */
  async version(): Promise<string> {
    const { stdout } = await this.runner.exec(this.ffmpegPath, ["-version"]);
    return stdout.split("\n")[0].trim();
  }

  async getMetadata(path: string): Promise<MediaMetadata> {
    const { input, data } = await this.probe(path);
    const video = data.streams.find((s) => s.codec_type === "video");
    if (!video) {
      throw new MediaProcessError(`No video stream in ${input}`, "probe-failed");
    }

    const duration = positiveSeconds(video.duration) ?? positiveSeconds(data.format.duration);
    if (duration === undefined) {
      throw new MediaProcessError(`Could not determine duration of ${input}`, "invalid-duration");
    }

    return {
      width: video.width ?? 0,
      height: video.height ?? 0,
      codec: video.codec_name ?? "unknown",
      fps: parseFrameRate(video.r_frame_rate),
      duration,
    };
  }

  async probeDuration(path: string): Promise<number> {
    const { input, data } = await this.probe(path);
    const streamDurations = data.streams
      .map((s) => positiveSeconds(s.duration))
      .filter((d): d is number => d !== undefined);
    const duration =
      positiveSeconds(data.format.duration) ?? (streamDurations.length > 0 ? Math.max(...streamDurations) : undefined);
    if (duration === undefined) {
      throw new MediaProcessError(`Could not determine duration of ${input}`, "invalid-duration");
    }
    return duration;
  }

  async probeStreams(path: string): Promise<StreamInfo> {
    const { data } = await this.probe(path);
    return {
      hasVideo: data.streams.some((s) => s.codec_type === "video"),
      hasAudio: data.streams.some((s) => s.codec_type === "audio"),
    };
  }

  async hasAudioStream(path: string): Promise<boolean> {
    return (await this.probeStreams(path)).hasAudio;
  }

  async hasVideoStream(path: string): Promise<boolean> {
    return (await this.probeStreams(path)).hasVideo;
  }

  /** MP3 soundtrack of a video */
  async extractAudio(videoPath: string, outputPath: string): Promise<string> {
    await this.assertExists(videoPath);
    const command = new FfmpegCommand()
      .input(videoPath)
      .noVideo()
      .audioCodec("libmp3lame")
      .audioBitrate("192k")
      .output(outputPath);
    await this.run(command);
    return outputPath;
  }

  /** Mux without re-encoding the video; stops at the shorter stream */
  async mergeVideoAudio(videoPath: string, audioPath: string, outputPath: string): Promise<string> {
    await this.assertExists(videoPath);
    await this.assertExists(audioPath);
    const command = new FfmpegCommand()
      .input(videoPath)
      .input(audioPath)
      .map("0:v:0")
      .map("1:a:0")
      .videoCodec("copy")
      .audioCodec("aac")
      .audioBitrate("192k")
      .shortest()
      .output(outputPath);
    await this.run(command);
    return outputPath;
  }

  /** Test pattern with an optional sine tone */
  async generateSyntheticTestClip(options: SyntheticClipOptions): Promise<string> {
    const duration = formatSeconds(validateNumber(options.duration ?? 5, "duration", { min: 0.1 }));
    const width = validateNumber(options.width ?? 640, "width", { min: 2, integer: true });
    const height = validateNumber(options.height ?? 360, "height", { min: 2, integer: true });
    const rate = validateNumber(options.rate ?? 24, "rate", { min: 1 });
    const frequency = validateNumber(options.frequency ?? 1000, "frequency", { min: 1 });

    const command = new FfmpegCommand().lavfi(`testsrc=duration=${duration}:size=${width}x${height}:rate=${rate}`);
    if (options.withAudio ?? true) {
      command.lavfi(`sine=frequency=${frequency}:duration=${duration}`).audioCodec("aac").audioBitrate("192k").shortest();
    }
    command.videoCodec("libx264").pixelFormat("yuv420p").output(options.outputPath);

    await this.run(command);
    return options.outputPath;
  }

  async run(command: FfmpegCommand, options: RunOptions = {}): Promise<void> {
    const args = command.build();
    try {
      await this.runner.spawn(this.ffmpegPath, args, options.onProgress, command.durationHint);
    } catch (error) {
      throw new MediaProcessError(`ffmpeg failed: ${errorMessage(error)}`, "process-failed", stderrOf(error));
    }
  }

  private async assertExists(path: string): Promise<string> {
    const input = validateMediaPath(path, "input");
    try {
      await access(input);
    } catch {
      throw new MediaProcessError(`Input file not found: ${input}`, "missing-input");
    }
    return input;
  }

  private async probe(path: string): Promise<{ input: string; data: ProbeData }> {
    const input = await this.assertExists(path);

    let stdout: string;
    try {
      ({ stdout } = await this.runner.exec(this.ffprobePath, [
        "-v",
        "error",
        "-print_format",
        "json",
        "-show_format",
        "-show_streams",
        input,
      ]));
    } catch (error) {
      throw new MediaProcessError(`ffprobe failed for ${input}: ${errorMessage(error)}`, "probe-failed", stderrOf(error));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch {
      throw new MediaProcessError(`ffprobe returned invalid JSON for ${input}`, "probe-failed");
    }

    const parsed = probeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MediaProcessError(`Unexpected ffprobe output for ${input}`, "probe-failed");
    }
    return { input, data: parsed.data };
  }
}
