import type { AICapability } from "@reelsmith/ai-providers";
import { SceneAssetStore, type AssetKind, type Logger } from "@reelsmith/core";
import type { ReelsmithConfig } from "../config/schema.js";
import { MediaProcessGateway, systemRunner, type ProcessRunner } from "../media/gateway.js";
import { createDevice } from "../resources/device.js";
import { ResourceLifecycleManager } from "../resources/lifecycle.js";
import { isInterrupted } from "../signals.js";
import { AudioSynchronizer } from "./audio-sync.js";
import { SceneConcatenator } from "./concatenator.js";
import { ImageGenerationWorker } from "./image-worker.js";
import { NarrationWorker } from "./narration-worker.js";
import type { PipelineServices } from "./orchestrator.js";
import { createProviders, type ProviderSet } from "./providers.js";
import type { StoreFactory } from "./stage.js";
import { StoryboardGenerator } from "./storyboard-generator.js";
import { VideoGenerationWorker } from "./video-worker.js";

export function storeFactory(root: string, overrides: Partial<Record<AssetKind, string>> = {}): StoreFactory {
  return (topic) => new SceneAssetStore({ root, topic, overrides });
}

export interface CreateServicesOptions {
  config: ReelsmithConfig;
  logger: Logger;
  /** Output root; defaults to config output.root */
  root?: string;
  overrides?: Partial<Record<AssetKind, string>>;
  preview?: boolean;
  /** Capabilities whose credentials are checked up front */
  required?: readonly AICapability[];
  runner?: ProcessRunner;
  env?: NodeJS.ProcessEnv;
}

export interface CreatedServices extends PipelineServices {
  gateway: MediaProcessGateway;
  providers: ProviderSet;
}

/**
 * Construct every stage from configuration. ffmpeg, ffprobe and provider
 * credentials are checked here, so configuration errors surface before any
 * batch work.
 */
export async function createPipelineServices(options: CreateServicesOptions): Promise<CreatedServices> {
  const { config, logger } = options;
  const runner = options.runner ?? systemRunner;

  const gateway = await MediaProcessGateway.create(runner);
  const providers = await createProviders(config, {
    gateway,
    preview: options.preview,
    required: options.required,
    env: options.env,
  });

  const device = await createDevice(config.resources.accelerator, runner);
  const resources = new ResourceLifecycleManager(device, logger);
  const storeFor = storeFactory(options.root ?? config.output.root, options.overrides);

  return {
    gateway,
    providers,
    resources,
    storeFor,
    logger,
    isInterrupted,
    models: {
      text: providers.text.modelLabel,
      image: providers.image.modelLabel,
      video: providers.video.modelLabel,
      narration: providers.narration.modelLabel,
    },
    footprints: {
      text: providers.text.footprintGb > 0 ? config.llm.footprintGb : 0,
      image: config.image.footprintGb,
    },
    storyboard: new StoryboardGenerator({
      provider: providers.text,
      storeFor,
      logger,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      isInterrupted,
    }),
    images: new ImageGenerationWorker(
      { provider: providers.image, storeFor, logger, isInterrupted },
      {
        style: config.image.style,
        quality: config.image.quality,
        variants: config.image.variants,
        baseSeed: config.image.baseSeed,
        width: config.image.width,
        height: config.image.height,
      }
    ),
    videos: new VideoGenerationWorker(
      { provider: providers.video, storeFor, resources, logger, isInterrupted },
      {
        fps: config.video.fps,
        motion: config.video.motion,
        frameCount: config.video.frameCount,
        baseSeed: config.video.baseSeed,
        footprintGb: config.video.footprintGb,
      }
    ),
    narration: new NarrationWorker(
      { provider: providers.narration, storeFor, logger, isInterrupted },
      { voice: config.narration.voice, requestDelayMs: config.narration.requestDelayMs }
    ),
    synchronizer: new AudioSynchronizer({ gateway, storeFor, logger, isInterrupted }, { preset: config.assembly.preset }),
    concatenator: new SceneConcatenator({ gateway, storeFor, logger }, { preset: config.assembly.preset }),
  };
}
