/**
 * @module media/preview-providers
 * @description Offline stand-ins for every collaborator, selected with
 * `--preview` or `provider: preview` in the config file.
 *
 * Text is a deterministic storyboard; images, clips and narration are
 * rendered locally with ffmpeg (solid colour still, slow zoom, sine tone).
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type {
  AICapability,
  AnimateImageOptions,
  ImageGenerationOptions,
  ImageGenerationProvider,
  ImageToVideoProvider,
  MediaResult,
  NarrationProvider,
  ProviderConfig,
  TextGenerationProvider,
} from "@reelsmith/ai-providers";
import { MAX_SCENES, errorMessage } from "@reelsmith/core";
import { FfmpegCommand, formatSeconds } from "./command.js";
import type { MediaGateway } from "./gateway.js";

const STORYBOARD_REQUEST = /Create a (\d+)-scene visual storyboard for: (.+)$/s;

const SHOTS = ["Wide establishing shot", "Medium shot", "Close-up", "Slow tracking shot"];
const LIGHTS = ["soft morning light", "golden hour glow", "overcast daylight", "warm lamplight"];

/** Words per second used to size tone narration */
const SPEAKING_RATE = 2.5;

abstract class PreviewProvider {
  abstract id: string;
  name = "Preview";
  description = "Offline placeholder output rendered with ffmpeg";
  isAvailable = true;
  footprintGb = 0;
  readonly modelLabel = "preview";

  async initialize(_config: ProviderConfig): Promise<void> {}

  isConfigured(): boolean {
    return true;
  }
}

/**
 * Render into a scratch directory and return the bytes
 */
async function renderToBuffer(
  gateway: MediaGateway,
  filename: string,
  build: (outputPath: string) => FfmpegCommand
): Promise<MediaResult> {
  const dir = await mkdtemp(join(tmpdir(), "reelsmith-preview-"));
  try {
    const outputPath = join(dir, filename);
    await gateway.run(build(outputPath));
    return { success: true, buffer: await readFile(outputPath) };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export class PreviewTextProvider extends PreviewProvider implements TextGenerationProvider {
  id = "preview-text";
  capabilities: AICapability[] = ["text-generation"];

  async generateText(prompt: string): Promise<string> {
    const match = STORYBOARD_REQUEST.exec(prompt.trim());
    const count = match ? Math.min(MAX_SCENES, Math.max(1, Number.parseInt(match[1], 10))) : 3;
    const topic = match ? match[2].trim() : prompt.trim();

    const scenes = Array.from({ length: count }, (_, i) => ({
      scene_id: i + 1,
      visual_subject: `${topic}, part ${i + 1}`,
      visual_action: i === 0 ? "introduced in its setting" : "shown in detail",
      background_environment: "a neutral studio backdrop",
      lighting: LIGHTS[i % LIGHTS.length],
      camera_shot: SHOTS[i % SHOTS.length],
      audio_text: `Part ${i + 1} of ${count} about ${topic}.`,
      duration: 5,
    }));
    return JSON.stringify(scenes, null, 2);
  }
}

/** Stable colour per seed, `0xRRGGBB` */
export function seedColor(seed: number): string {
  const value = Math.abs(Math.imul(seed, 2654435761)) % 0x1000000;
  return `0x${value.toString(16).padStart(6, "0")}`;
}

export class PreviewImageProvider extends PreviewProvider implements ImageGenerationProvider {
  id = "preview-image";
  capabilities: AICapability[] = ["text-to-image"];

  constructor(private readonly gateway: MediaGateway) {
    super();
  }

  async generateImage(_prompt: string, options: ImageGenerationOptions = {}): Promise<MediaResult> {
    const width = options.width ?? 1024;
    const height = options.height ?? 576;
    const seed = options.seed ?? 0;
    const result = await renderToBuffer(this.gateway, "still.png", (outputPath) =>
      new FfmpegCommand().lavfi(`color=c=${seedColor(seed)}:s=${width}x${height}`).frames(1).output(outputPath)
    );
    return { ...result, seed };
  }
}

export class PreviewVideoProvider extends PreviewProvider implements ImageToVideoProvider {
  id = "preview-video";
  capabilities: AICapability[] = ["image-to-video"];

  constructor(
    private readonly gateway: MediaGateway,
    private readonly size = { width: 1024, height: 576 }
  ) {
    super();
  }

  async animateImage(image: Buffer, options: AnimateImageOptions = {}): Promise<MediaResult> {
    const fps = options.fps ?? 6;
    const frames = options.frameCount ?? 25;
    const { width, height } = this.size;

    const dir = await mkdtemp(join(tmpdir(), "reelsmith-preview-"));
    try {
      const stillPath = join(dir, "still.png");
      await writeFile(stillPath, image);
      options.onProgress?.(`Rendering ${frames} preview frames`);

      const outputPath = join(dir, "clip.mp4");
      await this.gateway.run(
        new FfmpegCommand()
          .input(stillPath)
          .videoFilter(`zoompan=z='min(zoom+0.002,1.3)':d=${frames}:s=${width}x${height}:fps=${fps},format=yuv420p`)
          .frames(frames)
          .videoCodec("libx264")
          .output(outputPath)
      );
      return { success: true, buffer: await readFile(outputPath), seed: options.seed };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}

/** Tone length for a narration text: word count at a normal speaking rate, 2-30s */
export function toneDuration(text: string): number {
  const words = text.trim().split(/\s+/).filter(Boolean).length;
  return Math.min(30, Math.max(2, words / SPEAKING_RATE));
}

export class PreviewNarrationProvider extends PreviewProvider implements NarrationProvider {
  id = "preview-narration";
  capabilities: AICapability[] = ["text-to-speech"];

  constructor(private readonly gateway: MediaGateway) {
    super();
  }

  async synthesize(text: string): Promise<MediaResult> {
    const duration = formatSeconds(toneDuration(text));
    return renderToBuffer(this.gateway, "tone.mp3", (outputPath) =>
      new FfmpegCommand()
        .lavfi(`sine=frequency=440:duration=${duration}`)
        .audioCodec("libmp3lame")
        .audioBitrate("128k")
        .output(outputPath)
    );
  }
}
