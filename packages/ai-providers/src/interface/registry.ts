import type { AIProvider, AIProviderRegistry, AICapability } from "./types.js";

/**
 * Default implementation of the AI Provider Registry
 */
export class ProviderRegistryImpl implements AIProviderRegistry {
  private providers: Map<string, AIProvider> = new Map();

  constructor(private readonly onOverwrite: (id: string) => void = () => {}) {}

  register(provider: AIProvider): void {
    if (this.providers.has(provider.id)) {
      this.onOverwrite(provider.id);
    }
    this.providers.set(provider.id, provider);
  }

  get(id: string): AIProvider | undefined {
    return this.providers.get(id);
  }

  getAll(): AIProvider[] {
    return Array.from(this.providers.values());
  }

  getByCapability(capability: AICapability): AIProvider[] {
    return this.getAll().filter((provider) => provider.capabilities.includes(capability));
  }

  unregister(id: string): boolean {
    return this.providers.delete(id);
  }
}

/** First available and configured provider for a capability */
export function getBestProviderForCapability(
  capability: AICapability,
  registry: AIProviderRegistry
): AIProvider | undefined {
  return registry.getByCapability(capability).find((p) => p.isAvailable && p.isConfigured());
}
