/**
 * Configuration schema for the reel CLI
 * Stored at ~/.reelsmith/config.yaml
 */

import { z } from "zod";

export const LLM_PROVIDERS = ["ollama", "claude", "preview"] as const;
export const IMAGE_PROVIDERS = ["stability", "preview"] as const;
export const VIDEO_PROVIDERS = ["replicate", "preview"] as const;
export const NARRATION_PROVIDERS = ["elevenlabs", "preview"] as const;
export const ENCODING_PRESET_NAMES = ["draft", "standard", "high"] as const;
export const ACCELERATOR_MODES = ["auto", "nvidia", "none"] as const;

export type LLMProvider = (typeof LLM_PROVIDERS)[number];
export type EncodingPresetName = (typeof ENCODING_PRESET_NAMES)[number];
export type AcceleratorMode = (typeof ACCELERATOR_MODES)[number];

/** Default local text model */
export const DEFAULT_OLLAMA_MODEL = "llama3.2:3b";

export const configSchema = z.object({
  /** Config file version */
  version: z.string().default("1.0.0"),

  output: z
    .object({
      /** Each topic gets a directory below this */
      root: z.string().min(1).default("output"),
    })
    .default({}),

  llm: z
    .object({
      provider: z.enum(LLM_PROVIDERS).default("ollama"),
      /** Provider default when unset (llama3.2:3b for Ollama) */
      model: z.string().optional(),
      temperature: z.number().min(0).max(2).default(0.7),
      maxTokens: z.number().int().positive().default(2000),
      maxRetries: z.number().int().min(1).default(3),
      /** Accelerator memory the local model needs, in GB */
      footprintGb: z.number().min(0).default(3.5),
    })
    .default({}),

  image: z
    .object({
      provider: z.enum(IMAGE_PROVIDERS).default("stability"),
      model: z.string().optional(),
      style: z.string().default("cinematic"),
      quality: z.enum(["ultra", "high", "standard"]).default("high"),
      variants: z.number().int().min(1).max(8).default(1),
      baseSeed: z.number().int().default(42),
      width: z.number().int().positive().default(1024),
      height: z.number().int().positive().default(576),
      footprintGb: z.number().min(0).default(0),
    })
    .default({}),

  video: z
    .object({
      provider: z.enum(VIDEO_PROVIDERS).default("replicate"),
      model: z.string().optional(),
      fps: z.number().int().min(1).max(60).default(6),
      /** Motion strength, 1-255 */
      motion: z.number().int().min(1).max(255).default(127),
      frameCount: z.number().int().min(1).max(100).default(25),
      baseSeed: z.number().int().default(42),
      footprintGb: z.number().min(0).default(0),
    })
    .default({}),

  narration: z
    .object({
      provider: z.enum(NARRATION_PROVIDERS).default("elevenlabs"),
      voice: z.string().default("rachel"),
      /** Pause between consecutive narration requests */
      requestDelayMs: z.number().int().min(0).default(500),
    })
    .default({}),

  assembly: z
    .object({
      fadeDuration: z.number().min(0).default(1.0),
      preset: z.enum(ENCODING_PRESET_NAMES).default("standard"),
    })
    .default({}),

  resources: z
    .object({
      accelerator: z.enum(ACCELERATOR_MODES).default("auto"),
    })
    .default({}),

  /** API keys and endpoints */
  providers: z
    .object({
      anthropic: z.string().optional(),
      elevenlabs: z.string().optional(),
      stability: z.string().optional(),
      replicate: z.string().optional(),
      ollamaHost: z.string().optional(),
    })
    .default({}),
});

export type ReelsmithConfig = z.output<typeof configSchema>;

export type ProviderKey = keyof ReelsmithConfig["providers"];

/** Environment variable mappings */
export const PROVIDER_ENV_VARS: Record<ProviderKey, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  elevenlabs: "ELEVENLABS_API_KEY",
  stability: "STABILITY_API_KEY",
  replicate: "REPLICATE_API_TOKEN",
  ollamaHost: "OLLAMA_HOST",
};

/** Default configuration */
export function createDefaultConfig(): ReelsmithConfig {
  return configSchema.parse({});
}
