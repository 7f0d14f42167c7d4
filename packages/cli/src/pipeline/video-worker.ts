/**
 * @module pipeline/video-worker
 * @description Animates one still per scene into a silent clip.
 */

import { readFile } from "node:fs/promises";
import { MissingPrerequisiteError, emptyStats, errorMessage, type Logger, type WorkStats } from "@reelsmith/core";
import type { ImageToVideoProvider } from "@reelsmith/ai-providers";
import type { ResourceLifecycleManager } from "../resources/lifecycle.js";
import { throwIfInterrupted } from "../signals.js";
import { resultBytes } from "./media-result.js";
import { IMAGE_EXTENSIONS, type BatchOptions, type StoreFactory } from "./stage.js";

export interface VideoSettings {
  fps: number;
  /** Motion strength, 1-255 */
  motion: number;
  frameCount: number;
  baseSeed: number;
  /** Accelerator memory the video model needs */
  footprintGb: number;
}

/** Picks the image to animate from a scene's sorted candidates */
export type ImageSelector = (sceneId: number, candidates: readonly string[]) => string;

export const firstImage: ImageSelector = (_sceneId, candidates) => candidates[0];

export interface VideoWorkerDeps {
  provider: ImageToVideoProvider;
  storeFor: StoreFactory;
  resources: ResourceLifecycleManager;
  logger: Logger;
  selectImage?: ImageSelector;
  isInterrupted?: () => boolean;
}

export class VideoGenerationWorker {
  private readonly selectImage: ImageSelector;

  constructor(
    private readonly deps: VideoWorkerDeps,
    private readonly settings: VideoSettings
  ) {
    this.selectImage = deps.selectImage ?? firstImage;
  }

  async generateForTopic(topic: string, options: BatchOptions = {}): Promise<WorkStats> {
    const { provider, storeFor, resources, logger } = this.deps;
    const skipExisting = options.skipExisting ?? true;
    const store = storeFor(topic);

    const groups = await store.listSceneFiles("images", IMAGE_EXTENSIONS);
    if (!groups || groups.size === 0) {
      throw new MissingPrerequisiteError(`No scene images in ${store.dir("images")}`, "reel images");
    }

    const pending: Array<[number, string[]]> = [];
    const stats: WorkStats = { ...emptyStats(), total: groups.size };
    for (const [sceneId, images] of groups) {
      if (skipExisting && (await store.exists(store.clipPath(sceneId)))) {
        logger.debug(`Scene ${sceneId}: clip exists, skipping`);
        stats.skipped++;
      } else {
        pending.push([sceneId, images]);
      }
    }
    // Nothing to animate: the model is never loaded
    if (pending.length === 0) return stats;

    await resources.ensureAvailable(this.settings.footprintGb, "video model");

    return resources.scoped("video model", async (scope) => {
      scope.hold({
        name: provider.modelLabel,
        unload: async () => {
          await provider.unload?.();
        },
      });

      for (const [sceneId, images] of pending) {
        throwIfInterrupted(this.deps.isInterrupted);

        const target = store.clipPath(sceneId);
        const image = this.selectImage(sceneId, images);
        try {
          const bytes = await resources.guardOutOfMemory(`scene ${sceneId} animation`, async () => {
            const result = await provider.animateImage(await readFile(image), {
              seed: this.settings.baseSeed + sceneId,
              fps: this.settings.fps,
              motion: this.settings.motion,
              frameCount: this.settings.frameCount,
              onProgress: (message) => logger.debug(message),
            });
            return resultBytes(result, "clip");
          });
          await store.writeAtomic(target, bytes);
          logger.info(`Scene ${sceneId}: clip generated`);
          stats.successful++;
        } catch (error) {
          logger.error(`Scene ${sceneId}: ${errorMessage(error)}`);
          stats.failed++;
        }
      }
      return stats;
    });
  }
}
