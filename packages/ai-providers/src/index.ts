/**
 * AI Providers - collaborator contracts and HTTP providers for Reelsmith
 */

// Interface and registry
export * from "./interface/index.js";

// Prompt builders
export {
  buildStoryboardSystemPrompt,
  buildStoryboardUserMessage,
  type StoryboardPromptOptions,
} from "./storyboard-prompt.js";
export {
  buildImagePrompt,
  resolveStyle,
  QUALITY_TAGS,
  STYLE_PRESETS,
  STYLE_NAMES,
  NEGATIVE_PROMPT,
  type ImageQuality,
  type StyleName,
  type StylePreset,
} from "./image-prompt.js";

// Individual providers
export { ClaudeProvider, callClaude, type ClaudeApiParams } from "./claude/index.js";
export { OllamaProvider } from "./ollama/index.js";
export { StabilityProvider, aspectRatioFor, type StabilityAspectRatio } from "./stability/index.js";
export {
  ReplicateProvider,
  SVD_VERSION,
  svdVideoLength,
  type ReplicatePrediction,
  type ReplicateProviderOptions,
} from "./replicate/index.js";
export { ElevenLabsProvider, KNOWN_VOICES, resolveVoiceId, type Voice, type TTSOptions } from "./elevenlabs/index.js";
