import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MissingPrerequisiteError, SceneAssetStore } from "@reelsmith/core";
import { ESPRESSO_STORYBOARD, RecordingLogger, StubMediaProvider } from "../testing/fakes.js";
import { NarrationWorker } from "./narration-worker.js";

const TOPIC = "The History of Espresso";

describe("NarrationWorker", () => {
  let root: string;
  let store: SceneAssetStore;
  let logger: RecordingLogger;
  const sleep = vi.fn(async (_ms: number) => {});
  const storeFor = (topic: string) => new SceneAssetStore({ root, topic });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "reelsmith-narration-"));
    store = storeFor(TOPIC);
    logger = new RecordingLogger();
    sleep.mockClear();
    await store.writeAtomic(store.storyboardPath(), ESPRESSO_STORYBOARD);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const worker = (provider: StubMediaProvider) =>
    new NarrationWorker({ provider, storeFor, logger, sleep }, { voice: "Rachel", requestDelayMs: 500 });

  it("should narrate each scene in order with a pause between requests", async () => {
    const provider = new StubMediaProvider();

    const stats = await worker(provider).generateForTopic(TOPIC);

    expect(stats).toEqual({ total: 3, successful: 3, skipped: 0, failed: 0 });
    expect(provider.narrations.map((call) => call.text)).toEqual([
      "Espresso began in Milan at the turn of the century.",
      "Lever machines brought pressure and crema.",
      "Today espresso is poured all over the world.",
    ]);
    expect(provider.narrations[0].options).toEqual({ voice: "Rachel" });
    expect(sleep.mock.calls).toEqual([[500], [500]]);
    expect(await readFile(store.audioPath(3), "utf-8")).toBe("narration 3");
  });

  it("should not pause for skipped scenes", async () => {
    await store.writeAtomic(store.audioPath(1), "earlier narration");
    const provider = new StubMediaProvider();

    const stats = await worker(provider).generateForTopic(TOPIC);

    expect(stats).toEqual({ total: 3, successful: 2, skipped: 1, failed: 0 });
    expect(sleep.mock.calls).toEqual([[500]]);
  });

  it("should record failures and continue with the next scene", async () => {
    const provider = new StubMediaProvider({
      narration: (call) =>
        call === 2 ? { success: false, error: "quota exceeded" } : { success: true, buffer: Buffer.from("mp3") },
    });

    const stats = await worker(provider).generateForTopic(TOPIC);

    expect(stats).toEqual({ total: 3, successful: 2, skipped: 0, failed: 1 });
    expect(logger.messages("error")).toEqual(["Scene 2: quota exceeded"]);
    expect(await store.exists(store.audioPath(2))).toBe(false);
  });

  it("should need a storyboard", async () => {
    await rm(store.storyboardPath());
    await expect(worker(new StubMediaProvider()).generateForTopic(TOPIC)).rejects.toBeInstanceOf(
      MissingPrerequisiteError
    );
  });
});
