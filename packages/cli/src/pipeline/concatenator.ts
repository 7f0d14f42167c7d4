import {
  ConcatenationError,
  MediaProcessError,
  MissingPrerequisiteError,
  type Logger,
} from "@reelsmith/core";
import type { EncodingPresetName } from "../config/schema.js";
import { FfmpegCommand } from "../media/command.js";
import { buildConcatFilter } from "../media/filters.js";
import type { MediaGateway } from "../media/gateway.js";
import { getPresetSettings } from "../media/presets.js";
import type { StoreFactory } from "./stage.js";

export interface ConcatResult {
  outputPath: string;
  /** Seconds */
  totalDuration: number;
  clipCount: number;
}

export interface ConcatOptions {
  /** Fade in at the start and out at the end, seconds (default 1) */
  fadeDuration?: number;
  onProgress?: (percent: number) => void;
}

export interface SceneConcatenatorDeps {
  gateway: MediaGateway;
  storeFor: StoreFactory;
  logger: Logger;
}

/**
 * Joins merged scene clips into the final video with a fade at each end.
 * No transitions between scenes.
 */
export class SceneConcatenator {
  constructor(
    private readonly deps: SceneConcatenatorDeps,
    private readonly settings: { preset: EncodingPresetName }
  ) {}

  async concatenate(clips: readonly string[], outputPath: string, options: ConcatOptions = {}): Promise<ConcatResult> {
    const { gateway, logger } = this.deps;
    if (clips.length === 0) {
      throw new ConcatenationError("No clips to concatenate");
    }

    const offenders: string[] = [];
    let totalDuration = 0;
    for (const clip of clips) {
      try {
        const streams = await gateway.probeStreams(clip);
        const missing = [!streams.hasVideo && "video", !streams.hasAudio && "audio"].filter(Boolean);
        if (missing.length > 0) {
          offenders.push(`${clip}: no ${missing.join(" or ")} stream`);
          continue;
        }
        totalDuration += await gateway.probeDuration(clip);
      } catch (error) {
        if (!(error instanceof MediaProcessError)) throw error;
        offenders.push(`${clip}: ${error.message}`);
      }
    }

    if (offenders.length > 0) {
      throw new ConcatenationError(
        `${offenders.length} of ${clips.length} clips cannot be concatenated`,
        offenders,
        "Re-run `reel merge --no-skip` to rebuild the listed scenes."
      );
    }

    const encoding = getPresetSettings(this.settings.preset);
    const command = new FfmpegCommand();
    for (const clip of clips) command.input(clip);
    command
      .filterComplex(buildConcatFilter(clips.length, totalDuration, options.fadeDuration ?? 1))
      .map("[vout]")
      .map("[aout]")
      .x264(encoding.preset, encoding.crf)
      .audioCodec("aac")
      .audioBitrate(encoding.audioBitrate)
      .faststart()
      .expectDuration(totalDuration)
      .output(outputPath);

    logger.debug(`Concatenating ${clips.length} clips, ${totalDuration.toFixed(2)}s total`);
    await gateway.run(command, { onProgress: options.onProgress });
    return { outputPath, totalDuration, clipCount: clips.length };
  }

  /** Join a topic's merged scenes in scene order */
  async concatenateTopic(topic: string, options: ConcatOptions = {}): Promise<ConcatResult> {
    const store = this.deps.storeFor(topic);
    const merged = await store.listSceneFiles("merged", [".mp4"]);
    const clips = merged ? [...merged.values()].map((files) => files[0]) : [];
    if (clips.length === 0) {
      throw new MissingPrerequisiteError(`No merged scenes in ${store.dir("merged")}`, "reel merge");
    }

    const target = store.finalPath();
    const result = await store.commitFrom(target, (partial) => this.concatenate(clips, partial, options));
    return { ...result, outputPath: target };
  }
}
