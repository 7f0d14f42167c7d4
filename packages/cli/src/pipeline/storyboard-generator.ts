/**
 * @module pipeline/storyboard-generator
 * @description Topic → validated storyboard via the text model, with retries.
 */

import { readFile } from "node:fs/promises";
import {
  LLMGenerationError,
  MAX_SCENES,
  MissingPrerequisiteError,
  StoryboardValidationError,
  deserializeStoryboard,
  err,
  errorMessage,
  parseWithRepair,
  serializeStoryboard,
  type Logger,
  type Result,
  type SceneAssetStore,
  type Storyboard,
} from "@reelsmith/core";
import {
  buildStoryboardSystemPrompt,
  buildStoryboardUserMessage,
  type TextGenerationProvider,
} from "@reelsmith/ai-providers";
import { throwIfInterrupted } from "../signals.js";
import type { StoreFactory } from "./stage.js";

export interface StoryboardGeneratorDeps {
  provider: TextGenerationProvider;
  storeFor: StoreFactory;
  logger: Logger;
  /** Base wait between attempts; attempt n waits n × backoffMs */
  backoffMs?: number;
  temperature?: number;
  maxTokens?: number;
  sleep?: (ms: number) => Promise<void>;
  isInterrupted?: () => boolean;
}

export interface GenerateStoryboardOptions {
  numScenes?: number;
  style?: string;
  maxRetries?: number;
}

export class StoryboardGenerator {
  readonly provider: TextGenerationProvider;
  private readonly storeFor: StoreFactory;
  private readonly logger: Logger;
  private readonly backoffMs: number;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly isInterrupted?: () => boolean;

  constructor(deps: StoryboardGeneratorDeps) {
    this.provider = deps.provider;
    this.storeFor = deps.storeFor;
    this.logger = deps.logger;
    this.backoffMs = deps.backoffMs ?? 1000;
    this.temperature = deps.temperature ?? 0.7;
    this.maxTokens = deps.maxTokens ?? 2000;
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.isInterrupted = deps.isInterrupted;
  }

  /**
   * Generate, validate and persist a storyboard.
   * @throws StoryboardValidationError when the scene count is out of range
   * @throws LLMGenerationError when no attempt yields a valid storyboard
   */
  async generate(topic: string, options: GenerateStoryboardOptions = {}): Promise<Storyboard> {
    const numScenes = options.numScenes ?? 5;
    if (!Number.isInteger(numScenes) || numScenes < 1 || numScenes > MAX_SCENES) {
      const issue = `scene count must be between 1 and ${MAX_SCENES}, got ${numScenes}`;
      throw new StoryboardValidationError(`Invalid scene count: ${issue}`, [issue]);
    }
    const style = options.style ?? "cinematic";
    const maxRetries = Math.max(1, options.maxRetries ?? 3);

    const system = buildStoryboardSystemPrompt({ sceneCount: numScenes, style });
    const prompt = buildStoryboardUserMessage(topic, numScenes);
    let lastError = "no attempt was made";

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      throwIfInterrupted(this.isInterrupted);
      this.logger.debug(`Storyboard attempt ${attempt}/${maxRetries} with ${this.provider.modelLabel}`);

      const outcome = await this.requestStoryboard(topic, prompt, system);
      if (outcome.ok) {
        const storyboard = outcome.value;
        if (storyboard.scenes.length !== numScenes) {
          this.logger.warn(`Requested ${numScenes} scenes, model returned ${storyboard.scenes.length}`);
        }
        // Write failures are not the model's fault: no retry
        await this.save(storyboard);
        return storyboard;
      }
      lastError = outcome.error;

      this.logger.warn(`Attempt ${attempt}/${maxRetries} failed: ${lastError}`);
      if (attempt < maxRetries) {
        await this.sleep(this.backoffMs * attempt);
      }
    }

    throw new LLMGenerationError(
      `Could not generate a valid storyboard after ${maxRetries} attempts: ${lastError}`,
      maxRetries
    );
  }

  /** One model call plus parsing; failures come back as a reason */
  private async requestStoryboard(topic: string, prompt: string, system: string): Promise<Result<Storyboard, string>> {
    let raw: string;
    try {
      raw = await this.provider.generateText(prompt, {
        system,
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });
    } catch (error) {
      return err(`text model failed: ${errorMessage(error)}`);
    }
    const parsed = parseWithRepair(raw, topic);
    return parsed.ok ? parsed : err(parsed.error.message);
  }

  private async save(storyboard: Storyboard): Promise<void> {
    const store = this.storeFor(storyboard.topic);
    const path = store.storyboardPath();
    await store.writeAtomic(path, serializeStoryboard(storyboard));
    this.logger.debug(`Storyboard saved to ${path}`);
  }
}

/**
 * Read the persisted storyboard of a topic.
 * @throws MissingPrerequisiteError when it was never generated
 */
export async function loadStoryboard(store: SceneAssetStore, topic: string): Promise<Storyboard> {
  const path = store.storyboardPath();
  if (!(await store.exists(path))) {
    throw new MissingPrerequisiteError(`No storyboard for "${topic}" at ${path}`, "reel storyboard");
  }
  return deserializeStoryboard(await readFile(path, "utf-8"), topic, path);
}
