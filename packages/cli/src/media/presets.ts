import { ENCODING_PRESET_NAMES, type EncodingPresetName } from "../config/schema.js";

export interface EncodingSettings {
  /** libx264 -preset */
  preset: string;
  crf: number;
  audioBitrate: string;
}

const PRESETS: Record<EncodingPresetName, EncodingSettings> = {
  draft: { preset: "ultrafast", crf: 28, audioBitrate: "128k" },
  standard: { preset: "medium", crf: 23, audioBitrate: "192k" },
  high: { preset: "slow", crf: 18, audioBitrate: "192k" },
};

/**
 * Get encoder settings for a quality preset; unknown names use standard
 */
export function getPresetSettings(preset: string): EncodingSettings {
  const key = ENCODING_PRESET_NAMES.find((name) => name === preset) ?? "standard";
  return { ...PRESETS[key] };
}
