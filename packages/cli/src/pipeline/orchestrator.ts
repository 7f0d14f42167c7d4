/**
 * @module pipeline/orchestrator
 * @description Runs the stages in order for one topic and records the run.
 */

import {
  InMemoryJobStore,
  PipelineError,
  PipelineInterruptedError,
  createRunId,
  errorMessage,
  sumStats,
  type JobRecord,
  type JobStore,
  type Logger,
  type PipelineManifest,
  type RunStatus,
  type StageName,
  type StageRecord,
  type WorkStats,
} from "@reelsmith/core";
import type { ResourceLifecycleManager } from "../resources/lifecycle.js";
import { throwIfInterrupted } from "../signals.js";
import type { AudioSynchronizer } from "./audio-sync.js";
import type { SceneConcatenator } from "./concatenator.js";
import type { ImageGenerationWorker } from "./image-worker.js";
import { writeManifest } from "./manifest.js";
import type { NarrationWorker } from "./narration-worker.js";
import type { PipelineStage, StageOutcome, StoreFactory } from "./stage.js";
import { loadStoryboard, type StoryboardGenerator } from "./storyboard-generator.js";
import type { VideoGenerationWorker } from "./video-worker.js";

export const STAGE_ORDER: readonly StageName[] = ["storyboard", "images", "videos", "narration", "merge", "concat"];

export function isStageName(value: string): value is StageName {
  return STAGE_ORDER.some((stage) => stage === value);
}

/** Everything a run needs, already constructed and validated */
export interface PipelineServices {
  storyboard: StoryboardGenerator;
  images: ImageGenerationWorker;
  videos: VideoGenerationWorker;
  narration: NarrationWorker;
  synchronizer: AudioSynchronizer;
  concatenator: SceneConcatenator;
  resources: ResourceLifecycleManager;
  storeFor: StoreFactory;
  logger: Logger;
  models: PipelineManifest["models"];
  /** Accelerator memory for the text and image models, checked before loading */
  footprints: { text: number; image: number };
  jobs?: JobStore;
  isInterrupted?: () => boolean;
  now?: () => Date;
}

export interface RunPipelineOptions {
  topic: string;
  scenes?: number;
  style?: string;
  maxRetries?: number;
  fadeDuration?: number;
  /** First stage to run (inclusive) */
  from?: StageName;
  /** Last stage to run (inclusive) */
  until?: StageName;
  /** Keep existing outputs, including an existing storyboard (default true) */
  skipExisting?: boolean;
}

export interface StageContext {
  options: RunPipelineOptions;
  services: PipelineServices;
}

export interface PipelineRunResult {
  manifest: PipelineManifest;
  manifestPath?: string;
  job: JobRecord;
}

const single = (outcome: "successful" | "skipped"): WorkStats => ({
  total: 1,
  successful: outcome === "successful" ? 1 : 0,
  skipped: outcome === "skipped" ? 1 : 0,
  failed: 0,
});

const storyboardStage: PipelineStage<StageContext> = {
  name: "storyboard",
  async run({ options, services }) {
    const store = services.storeFor(options.topic);
    const path = store.storyboardPath();
    if ((options.skipExisting ?? true) && (await store.exists(path))) {
      await loadStoryboard(store, options.topic);
      services.logger.info(`Using existing storyboard ${path}`);
      return { stats: single("skipped"), output: path };
    }

    await services.resources.ensureAvailable(services.footprints.text, "text model");
    return services.resources.scoped("text model", async (scope) => {
      const { provider } = services.storyboard;
      scope.hold({
        name: provider.modelLabel,
        unload: async () => {
          await provider.unload?.();
        },
      });
      const storyboard = await services.storyboard.generate(options.topic, {
        numScenes: options.scenes,
        style: options.style,
        maxRetries: options.maxRetries,
      });
      services.logger.info(`Storyboard with ${storyboard.scenes.length} scenes saved to ${path}`);
      return { stats: single("successful"), output: path };
    });
  },
};

const imagesStage: PipelineStage<StageContext> = {
  name: "images",
  async run({ options, services }) {
    await services.resources.ensureAvailable(services.footprints.image, "image model");
    const stats = await services.resources.scoped("image model", () =>
      services.images.generateForTopic(options.topic, { skipExisting: options.skipExisting })
    );
    return { stats };
  },
};

const videosStage: PipelineStage<StageContext> = {
  name: "videos",
  async run({ options, services }) {
    // Scopes its own model
    return { stats: await services.videos.generateForTopic(options.topic, { skipExisting: options.skipExisting }) };
  },
};

const narrationStage: PipelineStage<StageContext> = {
  name: "narration",
  async run({ options, services }) {
    return { stats: await services.narration.generateForTopic(options.topic, { skipExisting: options.skipExisting }) };
  },
};

const mergeStage: PipelineStage<StageContext> = {
  name: "merge",
  async run({ options, services }) {
    return { stats: await services.synchronizer.mergeTopic(options.topic, { skipExisting: options.skipExisting }) };
  },
};

const concatStage: PipelineStage<StageContext> = {
  name: "concat",
  async run({ options, services }) {
    const result = await services.concatenator.concatenateTopic(options.topic, {
      fadeDuration: options.fadeDuration,
    });
    services.logger.info(`Final video: ${result.outputPath} (${result.totalDuration.toFixed(1)}s, ${result.clipCount} scenes)`);
    return { stats: single("successful"), output: result.outputPath };
  },
};

const STAGES: Readonly<Record<StageName, PipelineStage<StageContext>>> = {
  storyboard: storyboardStage,
  images: imagesStage,
  videos: videosStage,
  narration: narrationStage,
  merge: mergeStage,
  concat: concatStage,
};

/**
 * Stages between `from` and `until`, inclusive.
 * @throws RangeError when `from` comes after `until`
 */
export function selectStages(from: StageName = "storyboard", until: StageName = "concat"): StageName[] {
  const start = STAGE_ORDER.indexOf(from);
  const end = STAGE_ORDER.indexOf(until);
  if (start > end) {
    throw new RangeError(`--from ${from} comes after --until ${until}`);
  }
  return STAGE_ORDER.slice(start, end + 1);
}

const elapsedSince = (start: Date, end: Date): number => Math.round((end.getTime() - start.getTime()) / 10) / 100;

/**
 * Run the selected stages sequentially. The manifest is written whatever
 * the outcome; the original error is rethrown after it.
 */
export async function runPipeline(options: RunPipelineOptions, services: PipelineServices): Promise<PipelineRunResult> {
  const now = services.now ?? (() => new Date());
  const { logger } = services;
  const store = services.storeFor(options.topic);
  const stages = selectStages(options.from, options.until);
  const jobs = services.jobs ?? new InMemoryJobStore(now);

  const startedAt = now();
  const runId = createRunId(startedAt);
  let job = jobs.create({ topic: options.topic });
  job = jobs.update(job.id, { status: "running", progress: 0 });

  const records: StageRecord[] = [];
  let status: RunStatus = "completed";
  let failure: unknown;
  let finalVideo: string | undefined;

  try {
    for (const [index, name] of stages.entries()) {
      throwIfInterrupted(services.isInterrupted);
      job = jobs.update(job.id, {
        stage: name,
        progress: Math.round((index / stages.length) * 100),
        message: `Running ${name}`,
      });
      logger.info(`Stage ${index + 1}/${stages.length}: ${name}`);

      const stageStart = now();
      const outcome: StageOutcome = await STAGES[name].run({ options, services });
      records.push({ stage: name, elapsedSeconds: elapsedSince(stageStart, now()), ...outcome.stats });
      if (name === "concat") finalVideo = outcome.output;

      const { total, successful, skipped, failed } = outcome.stats;
      if (failed > 0) {
        logger.warn(`${name}: ${failed} of ${total} scenes failed`);
      }
      if (total > 0 && successful + skipped === 0) {
        throw new PipelineError(`Stage ${name} produced no output`, {
          hint: `Check the log above, then re-run to retry the failed scenes.`,
        });
      }
    }
    job = jobs.update(job.id, { status: "completed", progress: 100, message: "Done", result: finalVideo });
  } catch (error) {
    failure = error;
    status = error instanceof PipelineInterruptedError ? "interrupted" : "failed";
    job = jobs.update(job.id, { status, message: errorMessage(error) });
  }

  const finishedAt = now();
  const manifest: PipelineManifest = {
    runId,
    topic: options.topic,
    topicSlug: store.slug,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    status,
    models: services.models,
    stages: records,
    totals: { ...sumStats(records), elapsedSeconds: elapsedSince(startedAt, finishedAt) },
    ...(finalVideo !== undefined && { finalVideo }),
    ...(failure !== undefined && { error: errorMessage(failure) }),
  };

  let manifestPath: string | undefined;
  try {
    manifestPath = await writeManifest(store, manifest);
    logger.debug(`Manifest written to ${manifestPath}`);
  } catch (error) {
    logger.warn(`Could not write manifest: ${errorMessage(error)}`);
  }

  if (failure !== undefined) throw failure;
  return { manifest, manifestPath, job };
}
