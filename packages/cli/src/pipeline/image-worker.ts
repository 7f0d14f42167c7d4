import { emptyStats, errorMessage, type Logger, type WorkStats } from "@reelsmith/core";
import {
  NEGATIVE_PROMPT,
  buildImagePrompt,
  type ImageGenerationProvider,
  type ImageQuality,
} from "@reelsmith/ai-providers";
import { throwIfInterrupted } from "../signals.js";
import { resultBytes } from "./media-result.js";
import type { BatchOptions, StoreFactory } from "./stage.js";
import { loadStoryboard } from "./storyboard-generator.js";

export interface ImageSettings {
  style: string;
  quality: ImageQuality;
  /** Images per scene */
  variants: number;
  baseSeed: number;
  width: number;
  height: number;
}

export interface ImageWorkerDeps {
  provider: ImageGenerationProvider;
  storeFor: StoreFactory;
  logger: Logger;
  isInterrupted?: () => boolean;
}

/** Seed of one variant: distinct per scene and per variant */
export function imageSeed(baseSeed: number, sceneId: number, variant: number): number {
  return baseSeed + sceneId * 1000 + variant;
}

/**
 * Renders stills for every storyboard scene. A scene counts as skipped only
 * when all its variants already exist.
 */
export class ImageGenerationWorker {
  constructor(
    private readonly deps: ImageWorkerDeps,
    private readonly settings: ImageSettings
  ) {}

  async generateForTopic(topic: string, options: BatchOptions = {}): Promise<WorkStats> {
    const { provider, storeFor, logger } = this.deps;
    const skipExisting = options.skipExisting ?? true;
    const store = storeFor(topic);
    const storyboard = await loadStoryboard(store, topic);
    const stats: WorkStats = { ...emptyStats(), total: storyboard.scenes.length };

    for (const scene of storyboard.scenes) {
      throwIfInterrupted(this.deps.isInterrupted);

      const variants = Array.from({ length: this.settings.variants }, (_, i) => i + 1);
      const pending: number[] = [];
      for (const variant of variants) {
        if (!skipExisting || !(await store.exists(store.imagePath(scene.sceneId, variant)))) {
          pending.push(variant);
        }
      }

      if (pending.length === 0) {
        logger.debug(`Scene ${scene.sceneId}: images exist, skipping`);
        stats.skipped++;
        continue;
      }

      const prompt = buildImagePrompt(scene, this.settings.style, this.settings.quality);
      logger.debug(`Scene ${scene.sceneId} prompt: ${prompt}`);

      let failures = 0;
      for (const variant of pending) {
        const target = store.imagePath(scene.sceneId, variant);
        try {
          const result = await provider.generateImage(prompt, {
            seed: imageSeed(this.settings.baseSeed, scene.sceneId, variant),
            width: this.settings.width,
            height: this.settings.height,
            negativePrompt: NEGATIVE_PROMPT,
          });
          await store.writeAtomic(target, await resultBytes(result, "image"));
        } catch (error) {
          failures++;
          logger.error(`Scene ${scene.sceneId} variant ${variant}: ${errorMessage(error)}`);
        }
      }

      if (failures === 0) {
        logger.info(`Scene ${scene.sceneId}: ${pending.length} image(s) generated`);
        stats.successful++;
      } else {
        stats.failed++;
      }
    }

    return stats;
  }
}
