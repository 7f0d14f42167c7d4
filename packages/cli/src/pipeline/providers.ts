/**
 * @module pipeline/providers
 * @description Builds the four collaborators from configuration.
 */

import {
  ClaudeProvider,
  ElevenLabsProvider,
  OllamaProvider,
  ProviderRegistryImpl,
  ReplicateProvider,
  StabilityProvider,
  getBestProviderForCapability,
  type AICapability,
  type AIProvider,
  type AIProviderRegistry,
  type ImageGenerationProvider,
  type ImageToVideoProvider,
  type NarrationProvider,
  type TextGenerationProvider,
} from "@reelsmith/ai-providers";
import { ConfigurationError } from "@reelsmith/core";
import { resolveCredential } from "../config/index.js";
import { DEFAULT_OLLAMA_MODEL, PROVIDER_ENV_VARS, type ProviderKey, type ReelsmithConfig } from "../config/schema.js";
import type { MediaGateway } from "../media/gateway.js";
import {
  PreviewImageProvider,
  PreviewNarrationProvider,
  PreviewTextProvider,
  PreviewVideoProvider,
} from "../media/preview-providers.js";

export interface ProviderSet {
  text: TextGenerationProvider;
  image: ImageGenerationProvider;
  video: ImageToVideoProvider;
  narration: NarrationProvider;
  registry: AIProviderRegistry;
}

export interface CreateProvidersOptions {
  gateway: MediaGateway;
  /** Use the offline preview providers for everything */
  preview?: boolean;
  /** Capabilities whose credentials must be present */
  required?: readonly AICapability[];
  env?: NodeJS.ProcessEnv;
}

/** Credential each remote provider needs */
const CREDENTIAL_FOR: Readonly<Record<string, ProviderKey>> = {
  claude: "anthropic",
  stability: "stability",
  replicate: "replicate",
  elevenlabs: "elevenlabs",
};

async function createTextProvider(config: ReelsmithConfig, env: NodeJS.ProcessEnv): Promise<TextGenerationProvider> {
  switch (config.llm.provider) {
    case "claude": {
      const provider = new ClaudeProvider();
      await provider.initialize({ apiKey: resolveCredential("anthropic", config, undefined, env), model: config.llm.model });
      return provider;
    }
    case "ollama": {
      const provider = new OllamaProvider();
      await provider.initialize({
        baseUrl: resolveCredential("ollamaHost", config, undefined, env),
        model: config.llm.model ?? DEFAULT_OLLAMA_MODEL,
      });
      return provider;
    }
    case "preview":
      return new PreviewTextProvider();
  }
}

/**
 * Instantiate and initialise the providers selected in the config. Missing
 * credentials for a required capability fail here, before any work starts.
 */
export async function createProviders(config: ReelsmithConfig, options: CreateProvidersOptions): Promise<ProviderSet> {
  const env = options.env ?? process.env;
  const { gateway } = options;
  const preview = options.preview ?? false;
  const size = { width: config.image.width, height: config.image.height };

  const text = preview ? new PreviewTextProvider() : await createTextProvider(config, env);

  let image: ImageGenerationProvider;
  if (preview || config.image.provider === "preview") {
    image = new PreviewImageProvider(gateway);
  } else {
    const stability = new StabilityProvider();
    await stability.initialize({ apiKey: resolveCredential("stability", config, undefined, env), model: config.image.model });
    image = stability;
  }

  let video: ImageToVideoProvider;
  if (preview || config.video.provider === "preview") {
    video = new PreviewVideoProvider(gateway, size);
  } else {
    const replicate = new ReplicateProvider();
    await replicate.initialize({ apiKey: resolveCredential("replicate", config, undefined, env), model: config.video.model });
    video = replicate;
  }

  let narration: NarrationProvider;
  if (preview || config.narration.provider === "preview") {
    narration = new PreviewNarrationProvider(gateway);
  } else {
    const elevenlabs = new ElevenLabsProvider();
    await elevenlabs.initialize({ apiKey: resolveCredential("elevenlabs", config, undefined, env) });
    narration = elevenlabs;
  }

  const registry = new ProviderRegistryImpl();
  for (const provider of [text, image, video, narration]) {
    registry.register(provider);
  }

  for (const capability of options.required ?? []) {
    if (!getBestProviderForCapability(capability, registry)) {
      throw notConfigured(registry.getByCapability(capability)[0]);
    }
  }

  return { text, image, video, narration, registry };
}

function notConfigured(provider: AIProvider | undefined): ConfigurationError {
  if (!provider) {
    return new ConfigurationError("No provider is selected", "Check the provider settings in ~/.reelsmith/config.yaml.");
  }
  const key = CREDENTIAL_FOR[provider.id];
  const hint = key
    ? `Set ${PROVIDER_ENV_VARS[key]}, add providers.${key} to ~/.reelsmith/config.yaml, or use --preview.`
    : "Check the provider settings in ~/.reelsmith/config.yaml.";
  return new ConfigurationError(`${provider.name} is not configured`, hint);
}
