/**
 * @module pipeline/audio-sync
 * @description Fits each silent clip to its narration.
 *
 * Narration is the master track: the clip is looped (never slowed) until it
 * covers the narration and the output is cut to the narration's length.
 */

import {
  MissingPrerequisiteError,
  emptyStats,
  errorMessage,
  planLoop,
  type Logger,
  type WorkStats,
} from "@reelsmith/core";
import type { EncodingPresetName } from "../config/schema.js";
import { FfmpegCommand } from "../media/command.js";
import type { MediaGateway } from "../media/gateway.js";
import { getPresetSettings } from "../media/presets.js";
import { throwIfInterrupted } from "../signals.js";
import { AUDIO_EXTENSIONS, VIDEO_EXTENSIONS, type BatchOptions, type StoreFactory } from "./stage.js";

export interface AudioSynchronizerDeps {
  gateway: MediaGateway;
  storeFor: StoreFactory;
  logger: Logger;
  isInterrupted?: () => boolean;
}

export interface AudioSyncSettings {
  preset: EncodingPresetName;
}

export class AudioSynchronizer {
  constructor(
    private readonly deps: AudioSynchronizerDeps,
    private readonly settings: AudioSyncSettings
  ) {}

  /** Merge command for a clip and narration of known lengths */
  buildMergeCommand(
    videoPath: string,
    audioPath: string,
    outputPath: string,
    videoDuration: number,
    audioDuration: number
  ): FfmpegCommand {
    const plan = planLoop(videoDuration, audioDuration);
    const encoding = getPresetSettings(this.settings.preset);
    return new FfmpegCommand()
      .input(videoPath, { streamLoop: plan.extraLoops })
      .input(audioPath)
      .map("0:v:0")
      .map("1:a:0")
      .duration(plan.targetDuration)
      .x264(encoding.preset, encoding.crf)
      .pixelFormat("yuv420p")
      .audioCodec("aac")
      .audioBitrate("192k")
      .faststart()
      .shortest()
      .output(outputPath);
  }

  /**
   * @throws MediaProcessError when an input is missing or has no readable duration
   */
  async merge(
    videoPath: string,
    audioPath: string,
    outputPath: string,
    onProgress?: (percent: number) => void
  ): Promise<string> {
    const { gateway, logger } = this.deps;
    const videoDuration = await gateway.probeDuration(videoPath);
    const audioDuration = await gateway.probeDuration(audioPath);

    const command = this.buildMergeCommand(videoPath, audioPath, outputPath, videoDuration, audioDuration);
    const { loops } = planLoop(videoDuration, audioDuration);
    logger.debug(
      `Merging ${videoDuration.toFixed(2)}s clip (x${loops}) with ${audioDuration.toFixed(2)}s narration`
    );

    await gateway.run(command, { onProgress });
    return outputPath;
  }

  /** Merge every narrated scene of a topic */
  async mergeTopic(topic: string, options: BatchOptions = {}): Promise<WorkStats> {
    const { storeFor, logger } = this.deps;
    const skipExisting = options.skipExisting ?? true;
    const store = storeFor(topic);

    const narration = await store.listSceneFiles("audio", AUDIO_EXTENSIONS);
    if (!narration || narration.size === 0) {
      throw new MissingPrerequisiteError(`No narration in ${store.dir("audio")}`, "reel narrate");
    }
    const clips = await store.listSceneFiles("clips", VIDEO_EXTENSIONS);
    if (!clips) {
      throw new MissingPrerequisiteError(`No clips directory at ${store.dir("clips")}`, "reel videos");
    }

    const stats: WorkStats = { ...emptyStats(), total: narration.size };
    for (const [sceneId, audioFiles] of narration) {
      throwIfInterrupted(this.deps.isInterrupted);

      const target = store.mergedPath(sceneId);
      if (skipExisting && (await store.exists(target))) {
        logger.debug(`Scene ${sceneId}: merged clip exists, skipping`);
        stats.skipped++;
        continue;
      }

      const clip = clips.get(sceneId)?.[0];
      if (!clip) {
        logger.error(`Scene ${sceneId}: no clip to merge with narration`);
        stats.failed++;
        continue;
      }

      try {
        await store.commitFrom(target, (partial) => this.merge(clip, audioFiles[0], partial));
        logger.info(`Scene ${sceneId}: merged`);
        stats.successful++;
      } catch (error) {
        logger.error(`Scene ${sceneId}: ${errorMessage(error)}`);
        stats.failed++;
      }
    }

    return stats;
  }
}
