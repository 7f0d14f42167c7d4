import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createDefaultConfig, mergeConfig } from "../config/index.js";
import { RecordingLogger } from "../testing/fakes.js";
import { runPipeline } from "./orchestrator.js";
import { createPipelineServices } from "./services.js";

// Renders real media; needs ffmpeg and ffprobe on PATH. Run with `npm run test:ffmpeg`.
describe("preview pipeline with ffmpeg", () => {
  let root: string;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), "reelsmith-ffmpeg-"));
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should render a two-scene video whose length follows the narration", async () => {
    const config = mergeConfig(createDefaultConfig(), {
      image: { width: 320, height: 180 },
      narration: { requestDelayMs: 0 },
      assembly: { preset: "draft" },
      resources: { accelerator: "none" },
    });
    const services = await createPipelineServices({
      config,
      logger: new RecordingLogger(),
      root,
      preview: true,
      required: [],
    });

    const { manifest } = await runPipeline({ topic: "Espresso", scenes: 2, fadeDuration: 0.5 }, services);

    expect(manifest.status).toBe("completed");
    const finalVideo = services.storeFor("Espresso").finalPath();
    expect(manifest.finalVideo).toBe(finalVideo);

    const store = services.storeFor("Espresso");
    let total = 0;
    for (const sceneId of [1, 2]) {
      const narration = await services.gateway.probeDuration(store.audioPath(sceneId));
      const merged = await services.gateway.probeDuration(store.mergedPath(sceneId));
      expect(merged).toBeCloseTo(narration, 1);
      total += merged;
    }

    const metadata = await services.gateway.getMetadata(finalVideo);
    expect(metadata.width).toBe(320);
    expect(metadata.height).toBe(180);
    // "Part 1 of 2 about Espresso." is five words: a 2s tone per scene
    expect(metadata.duration).toBeCloseTo(4, 0);
    expect(metadata.duration).toBeCloseTo(total, 0);
    expect(await services.gateway.hasAudioStream(finalVideo)).toBe(true);
  }, 120000);
});
