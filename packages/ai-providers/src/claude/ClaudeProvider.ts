import type {
  AICapability,
  ProviderConfig,
  TextGenerationOptions,
  TextGenerationProvider,
} from "../interface/types.js";
import { callClaude } from "./claude-api.js";

/**
 * Anthropic Claude provider for storyboard text generation
 */
export class ClaudeProvider implements TextGenerationProvider {
  id = "claude";
  name = "Claude";
  description = "Anthropic Claude for structured storyboard writing";
  capabilities: AICapability[] = ["text-generation"];
  isAvailable = true;
  footprintGb = 0;

  private apiKey?: string;
  private baseUrl = "https://api.anthropic.com/v1";
  private model = "claude-sonnet-4-20250514";
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
    return `claude:${this.model}`;
  }

  async generateText(prompt: string, options: TextGenerationOptions = {}): Promise<string> {
    if (!this.apiKey) {
      throw new Error("Anthropic API key not configured. Set ANTHROPIC_API_KEY");
    }

    return callClaude(
      { apiKey: this.apiKey, baseUrl: this.baseUrl, model: this.model, timeout: this.timeout },
      {
        system: options.system ?? "",
        messages: [{ role: "user", content: prompt }],
        maxTokens: options.maxTokens ?? 2000,
        temperature: options.temperature,
      }
    );
  }
}
