import { describe, it, expect } from "vitest";
import { parseWithRepair } from "@reelsmith/core";
import { buildStoryboardUserMessage } from "@reelsmith/ai-providers";
import { FakeMediaGateway } from "../testing/fakes.js";
import {
  PreviewImageProvider,
  PreviewNarrationProvider,
  PreviewTextProvider,
  PreviewVideoProvider,
  seedColor,
  toneDuration,
} from "./preview-providers.js";

describe("PreviewTextProvider", () => {
  it("should answer a storyboard request with a valid storyboard of the requested size", async () => {
    const provider = new PreviewTextProvider();
    const raw = await provider.generateText(buildStoryboardUserMessage("Tide Pools", 4));

    const parsed = parseWithRepair(raw, "Tide Pools");
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.value.scenes.map((s) => s.sceneId)).toEqual([1, 2, 3, 4]);
    expect(parsed.value.scenes[0].audioText).toBe("Part 1 of 4 about Tide Pools.");
    expect(parsed.value.scenes[1].visual).toEqual({
      subject: "Tide Pools, part 2",
      action: "shown in detail",
      environment: "a neutral studio backdrop",
      lighting: "golden hour glow",
      camera: "Medium shot",
    });
  });

  it("should cap the scene count", async () => {
    const raw = await new PreviewTextProvider().generateText(buildStoryboardUserMessage("Bees", 25));
    const parsed = parseWithRepair(raw, "Bees");
    expect(parsed.ok && parsed.value.scenes.length).toBe(10);
  });
});

describe("seedColor", () => {
  it("should be stable and six hex digits", () => {
    expect(seedColor(42)).toBe(seedColor(42));
    expect(seedColor(42)).toMatch(/^0x[0-9a-f]{6}$/);
    expect(seedColor(1043)).not.toBe(seedColor(1044));
  });
});

describe("toneDuration", () => {
  it("should follow the word count within 2-30 seconds", () => {
    expect(toneDuration("one two three four five six seven eight nine ten")).toBe(4);
    expect(toneDuration("hi")).toBe(2);
    expect(toneDuration(Array.from({ length: 200 }, () => "word").join(" "))).toBe(30);
  });
});

describe("preview media providers", () => {
  it("should render a solid still sized to the request", async () => {
    const gateway = new FakeMediaGateway();
    const result = await new PreviewImageProvider(gateway).generateImage("ignored", { seed: 7, width: 320, height: 180 });

    expect(result.success).toBe(true);
    expect(result.seed).toBe(7);
    expect(result.buffer?.toString()).toMatch(/^rendered .*still\.png$/);
    expect(gateway.commands[0].slice(2, 6)).toEqual(["-f", "lavfi", "-i", `color=c=${seedColor(7)}:s=320x180`]);
    expect(gateway.commands[0].slice(6, 8)).toEqual(["-frames:v", "1"]);
  });

  it("should animate with a zoom of the requested frame count", async () => {
    const gateway = new FakeMediaGateway();
    const provider = new PreviewVideoProvider(gateway, { width: 640, height: 360 });
    const result = await provider.animateImage(Buffer.from("png"), { fps: 8, frameCount: 16 });

    expect(result.success).toBe(true);
    const args = gateway.commands[0];
    expect(args[args.indexOf("-vf") + 1]).toBe("zoompan=z='min(zoom+0.002,1.3)':d=16:s=640x360:fps=8,format=yuv420p");
    expect(args[args.indexOf("-frames:v") + 1]).toBe("16");
  });

  it("should report render failures instead of throwing", async () => {
    const gateway = new FakeMediaGateway();
    gateway.failWhen = () => true;
    const result = await new PreviewNarrationProvider(gateway).synthesize("A short line.");

    expect(result).toEqual({ success: false, error: "ffmpeg failed: Conversion failed!" });
    expect(gateway.commands[0].slice(2, 6)).toEqual(["-f", "lavfi", "-i", "sine=frequency=440:duration=2"]);
  });
});
