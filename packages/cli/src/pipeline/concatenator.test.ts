import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConcatenationError, MissingPrerequisiteError, SceneAssetStore } from "@reelsmith/core";
import { FakeMediaGateway, RecordingLogger } from "../testing/fakes.js";
import { SceneConcatenator } from "./concatenator.js";

const TOPIC = "The History of Espresso";

describe("SceneConcatenator", () => {
  let root: string;
  let store: SceneAssetStore;
  let gateway: FakeMediaGateway;
  let concatenator: SceneConcatenator;
  const storeFor = (topic: string) => new SceneAssetStore({ root, topic });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "reelsmith-concat-"));
    store = storeFor(TOPIC);
    gateway = new FakeMediaGateway();
    concatenator = new SceneConcatenator({ gateway, storeFor, logger: new RecordingLogger() }, { preset: "standard" });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("concatenate", () => {
    it("should join the clips with a fade at each end", async () => {
      gateway.durations.set("/w/a.mp4", 4);
      gateway.durations.set("/w/b.mp4", 6);

      const result = await concatenator.concatenate(["/w/a.mp4", "/w/b.mp4"], "/w/final.mp4", { fadeDuration: 1 });

      expect(result).toEqual({ outputPath: "/w/final.mp4", totalDuration: 10, clipCount: 2 });
      expect(gateway.commands[0]).toEqual([
        "-hide_banner", "-y",
        "-i", "/w/a.mp4",
        "-i", "/w/b.mp4",
        "-filter_complex",
        "[0:v][0:a][1:v][1:a]concat=n=2:v=1:a=1[vcat][acat];" +
          "[vcat]fade=t=in:st=0:d=1,fade=t=out:st=9:d=1,format=yuv420p[vout];" +
          "[acat]afade=t=in:st=0:d=1,afade=t=out:st=9:d=1[aout]",
        "-map", "[vout]", "-map", "[aout]",
        "-c:v", "libx264", "-preset", "medium", "-crf", "23",
        "-c:a", "aac", "-b:a", "192k",
        "-movflags", "+faststart",
        "/w/final.mp4",
      ]);
    });

    it("should list every clip that cannot be joined", async () => {
      gateway.durations.set("/w/a.mp4", 4);
      gateway.durations.set("/w/b.mp4", 6);
      gateway.streams.set("/w/b.mp4", { hasVideo: true, hasAudio: false });

      const error = await concatenator
        .concatenate(["/w/a.mp4", "/w/b.mp4", "/w/c.mp4"], "/w/final.mp4")
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConcatenationError);
      expect(error).toMatchObject({
        message: "2 of 3 clips cannot be concatenated",
        offenders: ["/w/b.mp4: no audio stream", "/w/c.mp4: Input file not found: /w/c.mp4"],
      });
      expect(gateway.commands).toHaveLength(0);
    });

    it("should reject an empty list", async () => {
      await expect(concatenator.concatenate([], "/w/final.mp4")).rejects.toThrow("No clips to concatenate");
    });
  });

  describe("concatenateTopic", () => {
    it("should join merged scenes in scene order into the final video", async () => {
      for (const id of [2, 1]) {
        await store.writeAtomic(store.mergedPath(id), "mp4");
        gateway.durations.set(store.mergedPath(id), 5);
      }
      const onProgress = vi.fn();

      const result = await concatenator.concatenateTopic(TOPIC, { onProgress });

      expect(result).toEqual({ outputPath: store.finalPath(), totalDuration: 10, clipCount: 2 });
      expect(gateway.commands[0].slice(2, 6)).toEqual(["-i", store.mergedPath(1), "-i", store.mergedPath(2)]);
      expect(await readFile(store.finalPath(), "utf-8")).toBe(
        `rendered ${SceneAssetStore.partialPath(store.finalPath())}`
      );
      expect(onProgress).toHaveBeenCalledWith(100);
    });

    it("should require merged scenes", async () => {
      const error = await concatenator.concatenateTopic(TOPIC).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(MissingPrerequisiteError);
      expect(error).toMatchObject({ message: `No merged scenes in ${store.dir("merged")}`, prerequisite: "reel merge" });
    });
  });
});
