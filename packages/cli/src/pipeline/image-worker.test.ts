import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PipelineInterruptedError, SceneAssetStore } from "@reelsmith/core";
import { NEGATIVE_PROMPT } from "@reelsmith/ai-providers";
import { ESPRESSO_STORYBOARD, RecordingLogger, StubMediaProvider } from "../testing/fakes.js";
import { ImageGenerationWorker, imageSeed, type ImageSettings } from "./image-worker.js";

const TOPIC = "The History of Espresso";

const SETTINGS: ImageSettings = {
  style: "cinematic",
  quality: "high",
  variants: 2,
  baseSeed: 42,
  width: 1024,
  height: 576,
};

describe("imageSeed", () => {
  it("should differ per scene and per variant", () => {
    expect(imageSeed(42, 1, 1)).toBe(1043);
    expect(imageSeed(42, 1, 2)).toBe(1044);
    expect(imageSeed(42, 2, 1)).toBe(2043);
  });
});

describe("ImageGenerationWorker", () => {
  let root: string;
  let store: SceneAssetStore;
  let logger: RecordingLogger;
  const storeFor = (topic: string) => new SceneAssetStore({ root, topic });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "reelsmith-images-"));
    store = storeFor(TOPIC);
    logger = new RecordingLogger();
    await store.writeAtomic(store.storyboardPath(), ESPRESSO_STORYBOARD);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should render every variant of every scene with its own seed", async () => {
    const provider = new StubMediaProvider();
    const worker = new ImageGenerationWorker({ provider, storeFor, logger }, SETTINGS);

    const stats = await worker.generateForTopic(TOPIC);

    expect(stats).toEqual({ total: 3, successful: 3, skipped: 0, failed: 0 });
    expect(provider.images.map((call) => call.options?.seed)).toEqual([1043, 1044, 2043, 2044, 3043, 3044]);
    expect(provider.images[0].options).toEqual({ seed: 1043, width: 1024, height: 576, negativePrompt: NEGATIVE_PROMPT });
    expect(await readFile(store.imagePath(2, 1), "utf-8")).toBe("image 3");
  });

  it("should skip scenes whose variants all exist and fill in missing ones", async () => {
    const worker = new ImageGenerationWorker({ provider: new StubMediaProvider(), storeFor, logger }, SETTINGS);
    await worker.generateForTopic(TOPIC);
    await rm(store.imagePath(2, 2));

    const provider = new StubMediaProvider();
    const rerun = new ImageGenerationWorker({ provider, storeFor, logger }, SETTINGS);
    const stats = await rerun.generateForTopic(TOPIC);

    expect(stats).toEqual({ total: 3, successful: 1, skipped: 2, failed: 0 });
    expect(provider.images.map((call) => call.options?.seed)).toEqual([2044]);
  });

  it("should regenerate existing images when skipping is off", async () => {
    const worker = new ImageGenerationWorker({ provider: new StubMediaProvider(), storeFor, logger }, SETTINGS);
    await worker.generateForTopic(TOPIC);

    const provider = new StubMediaProvider();
    const stats = await new ImageGenerationWorker({ provider, storeFor, logger }, SETTINGS).generateForTopic(TOPIC, {
      skipExisting: false,
    });

    expect(stats.successful).toBe(3);
    expect(provider.images).toHaveLength(6);
  });

  it("should count a scene as failed when any variant fails and carry on", async () => {
    const provider = new StubMediaProvider({
      image: (call) =>
        call === 2 ? { success: false, error: "content filtered" } : { success: true, buffer: Buffer.from("png") },
    });
    const worker = new ImageGenerationWorker({ provider, storeFor, logger }, SETTINGS);

    const stats = await worker.generateForTopic(TOPIC);

    expect(stats).toEqual({ total: 3, successful: 2, skipped: 0, failed: 1 });
    expect(logger.messages("error")).toEqual(["Scene 1 variant 2: content filtered"]);
    expect(await store.exists(store.imagePath(1, 1))).toBe(true);
    expect(await store.exists(store.imagePath(1, 2))).toBe(false);
  });

  it("should stop between scenes once interrupted", async () => {
    const provider = new StubMediaProvider();
    let checks = 0;
    const worker = new ImageGenerationWorker(
      { provider, storeFor, logger, isInterrupted: () => ++checks > 1 },
      SETTINGS
    );

    await expect(worker.generateForTopic(TOPIC)).rejects.toBeInstanceOf(PipelineInterruptedError);
    expect(provider.images).toHaveLength(2);
    expect(await store.exists(store.imagePath(1, 2))).toBe(true);
  });
});
