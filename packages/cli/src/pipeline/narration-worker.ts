import { emptyStats, errorMessage, type Logger, type WorkStats } from "@reelsmith/core";
import type { NarrationProvider } from "@reelsmith/ai-providers";
import { throwIfInterrupted } from "../signals.js";
import { resultBytes } from "./media-result.js";
import type { BatchOptions, StoreFactory } from "./stage.js";
import { loadStoryboard } from "./storyboard-generator.js";

export interface NarrationSettings {
  voice: string;
  /** Pause between consecutive requests */
  requestDelayMs: number;
}

export interface NarrationWorkerDeps {
  provider: NarrationProvider;
  storeFor: StoreFactory;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  isInterrupted?: () => boolean;
}

/**
 * One narration request at a time, in scene order.
 */
export class NarrationWorker {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly deps: NarrationWorkerDeps,
    private readonly settings: NarrationSettings
  ) {
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async generateForTopic(topic: string, options: BatchOptions = {}): Promise<WorkStats> {
    const { provider, storeFor, logger } = this.deps;
    const skipExisting = options.skipExisting ?? true;
    const store = storeFor(topic);
    const storyboard = await loadStoryboard(store, topic);
    const stats: WorkStats = { ...emptyStats(), total: storyboard.scenes.length };

    let requested = false;
    for (const scene of storyboard.scenes) {
      throwIfInterrupted(this.deps.isInterrupted);

      const target = store.audioPath(scene.sceneId);
      if (skipExisting && (await store.exists(target))) {
        logger.debug(`Scene ${scene.sceneId}: narration exists, skipping`);
        stats.skipped++;
        continue;
      }

      const text = scene.audioText.trim();
      if (!text) {
        logger.error(`Scene ${scene.sceneId}: narration text is empty`);
        stats.failed++;
        continue;
      }

      if (requested && this.settings.requestDelayMs > 0) {
        await this.sleep(this.settings.requestDelayMs);
      }
      requested = true;

      try {
        const result = await provider.synthesize(text, { voice: this.settings.voice });
        await store.writeAtomic(target, await resultBytes(result, "narration"));
        logger.info(`Scene ${scene.sceneId}: narration generated`);
        stats.successful++;
      } catch (error) {
        logger.error(`Scene ${scene.sceneId}: ${errorMessage(error)}`);
        stats.failed++;
      }
    }

    return stats;
  }
}
