import { describe, it, expect, vi, afterEach } from "vitest";
import { ReplicateProvider, svdVideoLength } from "./ReplicateProvider.js";

const json = (body: unknown): Response => new Response(JSON.stringify(body), { status: 200 });

describe("svdVideoLength", () => {
  it("should map frame counts to the SVD checkpoints", () => {
    expect(svdVideoLength(14)).toBe("14_frames_with_svd");
    expect(svdVideoLength(25)).toBe("25_frames_with_svd_xt");
  });
});

describe("ReplicateProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should create a prediction, poll and download the clip", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => json({}));
    fetchMock
      .mockResolvedValueOnce(json({ id: "p1", status: "starting" }))
      .mockResolvedValueOnce(json({ id: "p1", status: "processing" }))
      .mockResolvedValueOnce(json({ id: "p1", status: "succeeded", output: ["https://replicate.test/out.mp4"] }))
      .mockResolvedValueOnce(new Response(new Uint8Array([9, 9]), { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const sleep = vi.fn(async () => {});
    const progress: string[] = [];
    const provider = new ReplicateProvider({ sleep, pollingIntervalMs: 5 });
    await provider.initialize({ apiKey: "test-secret" });

    const result = await provider.animateImage(Buffer.from([1, 2, 3]), {
      seed: 43,
      fps: 6,
      motion: 127,
      frameCount: 25,
      onProgress: (message) => progress.push(message),
    });

    expect(result.success).toBe(true);
    expect(result.url).toBe("https://replicate.test/out.mp4");
    expect([...(result.buffer ?? [])]).toEqual([9, 9]);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(5);
    expect(progress).toEqual(["Replicate prediction p1: processing", "Replicate prediction p1: succeeded"]);

    const [createUrl, createInit] = fetchMock.mock.calls[0];
    expect(createUrl).toBe("https://api.replicate.com/v1/predictions");
    expect(JSON.parse(String(createInit?.body)).input).toEqual({
      input_image: "data:image/png;base64,AQID",
      video_length: "25_frames_with_svd_xt",
      sizing_strategy: "maintain_aspect_ratio",
      frames_per_second: 6,
      motion_bucket_id: 127,
      cond_aug: 0.02,
      seed: 43,
    });
    expect(fetchMock.mock.calls[1][0]).toBe("https://api.replicate.com/v1/predictions/p1");
  });

  it("should report a failed prediction", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => json({}));
    fetchMock
      .mockResolvedValueOnce(json({ id: "p2", status: "starting" }))
      .mockResolvedValueOnce(json({ id: "p2", status: "failed", error: "CUDA out of memory" }));
    vi.stubGlobal("fetch", fetchMock);

    const provider = new ReplicateProvider({ sleep: async () => {} });
    await provider.initialize({ apiKey: "test-secret" });

    expect(await provider.animateImage(Buffer.from([1]))).toEqual({ success: false, error: "CUDA out of memory" });
  });

  it("should time out a prediction that never finishes", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => json({ id: "p3", status: "starting" })));

    const provider = new ReplicateProvider({ maxWaitMs: 0 });
    await provider.initialize({ apiKey: "test-secret" });

    expect(await provider.animateImage(Buffer.from([1]))).toEqual({ success: false, error: "Processing timed out" });
  });

  it("should require a token", async () => {
    const provider = new ReplicateProvider();
    expect(provider.isConfigured()).toBe(false);
    expect((await provider.animateImage(Buffer.from([1]))).error).toBe(
      "Replicate API token not configured. Set REPLICATE_API_TOKEN"
    );
  });
});
