import type {
  AICapability,
  ImageGenerationOptions,
  ImageGenerationProvider,
  MediaResult,
  ProviderConfig,
} from "../interface/types.js";
import { describeError, readApiError, timeoutSignal } from "../http.js";

/** Aspect ratios accepted by the Stable Image endpoints */
export const STABILITY_ASPECT_RATIOS = ["21:9", "16:9", "3:2", "5:4", "1:1", "4:5", "2:3", "9:16", "9:21"] as const;

export type StabilityAspectRatio = (typeof STABILITY_ASPECT_RATIOS)[number];

/** Supported ratio closest to the requested size */
export function aspectRatioFor(width: number, height: number): StabilityAspectRatio {
  const target = width / height;
  let best: StabilityAspectRatio = "1:1";
  let bestDiff = Number.POSITIVE_INFINITY;
  for (const ratio of STABILITY_ASPECT_RATIOS) {
    const [w, h] = ratio.split(":").map(Number);
    const diff = Math.abs(Math.log(w / h) - Math.log(target));
    if (diff < bestDiff) {
      best = ratio;
      bestDiff = diff;
    }
  }
  return best;
}

/**
 * Stability AI provider for Stable Diffusion image generation
 */
export class StabilityProvider implements ImageGenerationProvider {
  id = "stability";
  name = "Stability AI";
  description = "Stable Diffusion 3.5 image generation";
  capabilities: AICapability[] = ["text-to-image"];
  isAvailable = true;
  footprintGb = 0;

  private apiKey?: string;
  private baseUrl = "https://api.stability.ai";
  private model = "sd3.5-large";
  private timeout?: number;

  async initialize(config: ProviderConfig): Promise<void> {
    this.apiKey = config.apiKey;
    if (config.baseUrl) {
      this.baseUrl = config.baseUrl;
    }
    if (config.model) {
      this.model = config.model;
    }
    this.timeout = config.timeout;
  }

  isConfigured(): boolean {
    return !!this.apiKey;
  }

  get modelLabel(): string {
    return `stability:${this.model}`;
  }

  /**
   * Generate one PNG from a text prompt
   */
  async generateImage(prompt: string, options: ImageGenerationOptions = {}): Promise<MediaResult> {
    if (!this.apiKey) {
      return {
        success: false,
        error: "Stability AI API key not configured. Set STABILITY_API_KEY",
      };
    }

    try {
      const formData = new FormData();
      formData.append("prompt", prompt);
      formData.append("output_format", "png");
      formData.append("model", this.model);

      if (options.negativePrompt) {
        formData.append("negative_prompt", options.negativePrompt);
      }
      if (options.width && options.height) {
        formData.append("aspect_ratio", aspectRatioFor(options.width, options.height));
      }
      if (options.seed !== undefined) {
        formData.append("seed", String(options.seed));
      }

      const response = await fetch(`${this.baseUrl}/v2beta/stable-image/generate/sd3`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          Accept: "image/*",
        },
        body: formData,
        signal: timeoutSignal(this.timeout),
      });

      if (!response.ok) {
        return { success: false, error: await readApiError(response) };
      }

      // Response is the image directly
      const buffer = Buffer.from(await response.arrayBuffer());
      const seed = response.headers.get("seed");
      const finishReason = response.headers.get("finish-reason");
      if (finishReason === "CONTENT_FILTERED") {
        return { success: false, error: "Image was blocked by the content filter" };
      }

      return {
        success: true,
        buffer,
        seed: seed ? Number.parseInt(seed, 10) : undefined,
      };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }
}
