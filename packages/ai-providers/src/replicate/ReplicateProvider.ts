import { z } from "zod";
import type {
  AICapability,
  AnimateImageOptions,
  ImageToVideoProvider,
  MediaResult,
  ProviderConfig,
} from "../interface/types.js";
import { describeError, readApiError, timeoutSignal } from "../http.js";

/** stability-ai/stable-video-diffusion */
export const SVD_VERSION = "3f0457e4619daac51203dedb472816fd4af51f3149fa7a9e0b5ffcf1b8172438";

const predictionSchema = z.object({
  id: z.string(),
  status: z.enum(["starting", "processing", "succeeded", "failed", "canceled"]),
  output: z.union([z.string(), z.array(z.string())]).nullish(),
  error: z.string().nullish(),
});

/**
 * Replicate prediction response
 */
export type ReplicatePrediction = z.infer<typeof predictionSchema>;

export interface ReplicateProviderOptions {
  /** Delay between status polls */
  pollingIntervalMs?: number;
  /** Give up on a prediction after this long */
  maxWaitMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/** SVD ships two checkpoints: 14 frames and 25 frames (XT) */
export function svdVideoLength(frameCount: number): "14_frames_with_svd" | "25_frames_with_svd_xt" {
  return frameCount > 14 ? "25_frames_with_svd_xt" : "14_frames_with_svd";
}

/**
 * Replicate provider running Stable Video Diffusion for image-to-video
 */
export class ReplicateProvider implements ImageToVideoProvider {
  id = "replicate";
  name = "Replicate";
  description = "Stable Video Diffusion image-to-video on Replicate";
  capabilities: AICapability[] = ["image-to-video"];
  isAvailable = true;
  footprintGb = 0;

  private apiToken?: string;
  private baseUrl = "https://api.replicate.com/v1";
  private version = SVD_VERSION;
  private timeout?: number;
  private readonly pollingInterval: number;
  private readonly maxWaitMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ReplicateProviderOptions = {}) {
    this.pollingInterval = options.pollingIntervalMs ?? 3000;
    this.maxWaitMs = options.maxWaitMs ?? 600000;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async initialize(config: ProviderConfig): Promise<void> {
    this.apiToken = config.apiKey;
    if (config.baseUrl) {
      this.baseUrl = config.baseUrl;
    }
    if (config.model) {
      this.version = config.model;
    }
    this.timeout = config.timeout;
  }

  isConfigured(): boolean {
    return !!this.apiToken;
  }

  get modelLabel(): string {
    return this.version === SVD_VERSION ? "replicate:stable-video-diffusion" : `replicate:${this.version}`;
  }

  /**
   * Animate a still image into a short silent clip and download it
   */
  async animateImage(image: Buffer, options: AnimateImageOptions = {}): Promise<MediaResult> {
    if (!this.apiToken) {
      return {
        success: false,
        error: "Replicate API token not configured. Set REPLICATE_API_TOKEN",
      };
    }

    try {
      const response = await fetch(`${this.baseUrl}/predictions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify({
          version: this.version,
          input: {
            input_image: `data:image/png;base64,${image.toString("base64")}`,
            video_length: svdVideoLength(options.frameCount ?? 25),
            sizing_strategy: "maintain_aspect_ratio",
            frames_per_second: options.fps ?? 6,
            motion_bucket_id: options.motion ?? 127,
            cond_aug: 0.02,
            ...(options.seed !== undefined ? { seed: options.seed } : {}),
          },
        }),
        signal: timeoutSignal(this.timeout),
      });

      if (!response.ok) {
        return { success: false, error: await readApiError(response) };
      }

      const created = predictionSchema.parse(await response.json());
      const prediction = await this.waitForCompletion(created.id, options.onProgress);

      if (prediction.status !== "succeeded") {
        return { success: false, error: prediction.error || `Prediction ${prediction.status}` };
      }

      const url = Array.isArray(prediction.output) ? prediction.output[0] : prediction.output;
      if (!url) {
        return { success: false, error: "Prediction succeeded without an output URL" };
      }

      const download = await fetch(url, { signal: timeoutSignal(this.timeout) });
      if (!download.ok) {
        return { success: false, url, error: `Failed to download output (${download.status})` };
      }
      return { success: true, url, buffer: Buffer.from(await download.arrayBuffer()) };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  /**
   * Get prediction status
   */
  async getPrediction(id: string): Promise<ReplicatePrediction> {
    const response = await fetch(`${this.baseUrl}/predictions/${id}`, {
      headers: {
        Authorization: `Bearer ${this.apiToken ?? ""}`,
      },
      signal: timeoutSignal(this.timeout),
    });

    if (!response.ok) {
      throw new Error(`Failed to get status: ${await readApiError(response)}`);
    }
    return predictionSchema.parse(await response.json());
  }

  /**
   * Poll until the prediction finishes or the wait limit passes
   */
  async waitForCompletion(id: string, onProgress?: (message: string) => void): Promise<ReplicatePrediction> {
    const startTime = Date.now();

    while (Date.now() - startTime < this.maxWaitMs) {
      const prediction = await this.getPrediction(id);
      onProgress?.(`Replicate prediction ${id}: ${prediction.status}`);

      if (prediction.status === "succeeded" || prediction.status === "failed" || prediction.status === "canceled") {
        return prediction;
      }

      await this.sleep(this.pollingInterval);
    }

    return { id, status: "failed", error: "Processing timed out" };
  }
}
