/**
 * @module image-prompt
 * @description Diffusion prompt assembly from a scene's structured visual fields.
 *
 * Order: style prefix, subject + action, environment, lighting + camera,
 * quality tags, style suffix.
 */

import type { Scene } from "@reelsmith/core";

export type ImageQuality = "ultra" | "high" | "standard";

export const QUALITY_TAGS: Readonly<Record<ImageQuality, string>> = {
  ultra: "8k uhd, ultra detailed, masterpiece, professional photography, award winning",
  high: "4k, sharp focus, highly detailed, professional",
  standard: "hd, good quality, detailed",
};

export interface StylePreset {
  prefix: string;
  suffix: string;
}

export const STYLE_PRESETS = {
  cinematic: {
    prefix: "Cinematic film still, moody atmosphere, dramatic lighting, film grain",
    suffix: "shot on Arri Alexa, shallow depth of field",
  },
  anime: {
    prefix: "Anime style, hand-painted backgrounds, vibrant colors, cel-shaded",
    suffix: "highly detailed anime art",
  },
  photorealistic: {
    prefix: "Photorealistic, natural lighting, realistic textures",
    suffix: "professional photography, DSLR, 85mm lens",
  },
  analog_film: {
    prefix: "Analog film photography, Kodak Portra 400, film grain, warm tones",
    suffix: "vintage aesthetic, nostalgic",
  },
  concept_art: {
    prefix: "Concept art, painterly style, atmospheric perspective",
    suffix: "digital painting, trending on artstation",
  },
  cyberpunk: {
    prefix: "Cyberpunk aesthetic, neon lights, high tech low life, dystopian",
    suffix: "volumetric lighting, rain-soaked streets",
  },
  fantasy: {
    prefix: "Fantasy art, magical atmosphere, ethereal lighting",
    suffix: "epic composition, detailed environment",
  },
  minimalist: {
    prefix: "Minimalist style, clean composition, simple background",
    suffix: "modern aesthetic, negative space",
  },
} satisfies Record<string, StylePreset>;

export type StyleName = keyof typeof STYLE_PRESETS;

export const STYLE_NAMES = Object.keys(STYLE_PRESETS);

export const NEGATIVE_PROMPT =
  "ugly, poorly drawn, bad anatomy, extra limb, missing limb, mutation, blurry, watermark, text, signature, low quality, jpeg artifacts";

function isStyleName(name: string): name is StyleName {
  return Object.prototype.hasOwnProperty.call(STYLE_PRESETS, name);
}

/** Unknown style names fall back to cinematic */
export function resolveStyle(name: string): StylePreset {
  const key = name.toLowerCase();
  return isStyleName(key) ? STYLE_PRESETS[key] : STYLE_PRESETS.cinematic;
}

/**
 * Build the positive prompt for a scene.
 *
 * @example
 * buildImagePrompt({ sceneId: 1, visual: { subject: "A barista", action: "pulling a shot" }, ... }, "minimalist", "standard")
 * // "Minimalist style, clean composition, simple background, A barista pulling a shot, hd, good quality, detailed, modern aesthetic, negative space"
 */
export function buildImagePrompt(scene: Scene, style = "cinematic", quality: ImageQuality = "high"): string {
  const preset = resolveStyle(style);
  const { subject, action, environment, lighting, camera } = scene.visual;
  const structured = [subject, action, environment, lighting, camera].some(Boolean);

  if (!structured && scene.visualPrompt) {
    return [preset.prefix, scene.visualPrompt, QUALITY_TAGS[quality], preset.suffix].join(", ");
  }

  const components = [
    preset.prefix,
    [subject, action].filter(Boolean).join(" "),
    environment ?? "",
    [lighting, camera].filter(Boolean).join(", "),
    QUALITY_TAGS[quality],
    preset.suffix,
  ];
  return components.filter(Boolean).join(", ");
}
