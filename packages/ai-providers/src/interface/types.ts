/**
 * @module types
 * @description Collaborator contracts for the generation stages.
 *
 * Each stage depends on one capability: text generation for the storyboard,
 * text-to-image for scene stills, image-to-video for silent clips and
 * text-to-speech for narration. Concrete HTTP providers and the offline
 * preview providers implement these interfaces; stages never import a
 * provider class directly.
 */

/**
 * Capabilities that a provider can declare support for.
 *
 * Used by the {@link AIProviderRegistry} to find providers for a stage.
 */
export type AICapability = "text-generation" | "text-to-image" | "image-to-video" | "text-to-speech";

/**
 * Configuration passed to {@link AIProvider.initialize}.
 */
export interface ProviderConfig {
  /** API key for authentication with the provider */
  apiKey?: string;
  /** Custom base URL (overrides the provider's default endpoint) */
  baseUrl?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Override the default model for this provider instance */
  model?: string;
}

/**
 * Base interface that every provider implements.
 */
export interface AIProvider {
  /** Unique identifier for this provider */
  id: string;
  /** Display name */
  name: string;
  /** Provider description */
  description: string;
  /** Available capabilities */
  capabilities: AICapability[];
  /** Whether the provider is currently available */
  isAvailable: boolean;
  /**
   * Accelerator memory (GB) the model needs while resident on this machine.
   * Remote APIs report 0.
   */
  footprintGb: number;

  initialize(config: ProviderConfig): Promise<void>;

  /** `true` when the provider can accept requests (e.g. its key is set) */
  isConfigured(): boolean;

  /** Release a locally resident model, if the provider holds one */
  unload?(): Promise<void>;
}

/** Model identifier reported in run manifests */
export interface ModelDescriptor {
  /** e.g. "ollama:llama3.2:3b" */
  readonly modelLabel: string;
}

export interface TextGenerationOptions {
  system?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Text model used by the storyboard generator.
 * Throws on transport or API failure.
 */
export interface TextGenerationProvider extends AIProvider, ModelDescriptor {
  generateText(prompt: string, options?: TextGenerationOptions): Promise<string>;
}

/**
 * Outcome of a media generation call. Failures are reported, not thrown,
 * so batch stages can count them per scene.
 */
export interface MediaResult {
  success: boolean;
  /** Generated bytes */
  buffer?: Buffer;
  /** Remote location of the output when the API returns a URL instead of bytes */
  url?: string;
  /** Seed actually used, when the API reports it */
  seed?: number;
  /** Error message if failed */
  error?: string;
}

export interface ImageGenerationOptions {
  seed?: number;
  width?: number;
  height?: number;
  negativePrompt?: string;
}

export interface ImageGenerationProvider extends AIProvider, ModelDescriptor {
  generateImage(prompt: string, options?: ImageGenerationOptions): Promise<MediaResult>;
}

export interface AnimateImageOptions {
  seed?: number;
  /** Output frame rate */
  fps?: number;
  /** Motion strength (1-255) */
  motion?: number;
  /** Frames to generate */
  frameCount?: number;
  /** Called with status text while a remote job is pending */
  onProgress?: (message: string) => void;
}

export interface ImageToVideoProvider extends AIProvider, ModelDescriptor {
  animateImage(image: Buffer, options?: AnimateImageOptions): Promise<MediaResult>;
}

export interface NarrationOptions {
  /** Voice name or provider voice id */
  voice?: string;
}

export interface NarrationProvider extends AIProvider, ModelDescriptor {
  synthesize(text: string, options?: NarrationOptions): Promise<MediaResult>;
}

/**
 * Registry for managing multiple {@link AIProvider} instances.
 */
export interface AIProviderRegistry {
  /** Register a provider (overwrites an existing one with the same id) */
  register(provider: AIProvider): void;
  get(id: string): AIProvider | undefined;
  getAll(): AIProvider[];
  getByCapability(capability: AICapability): AIProvider[];
  /** @returns `true` if the provider was found and removed */
  unregister(id: string): boolean;
}
