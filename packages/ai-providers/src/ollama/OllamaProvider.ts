import { z } from "zod";
import type {
  AICapability,
  ProviderConfig,
  TextGenerationOptions,
  TextGenerationProvider,
} from "../interface/types.js";
import { readApiError, timeoutSignal } from "../http.js";

const generateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
});

/**
 * Ollama provider for local text generation.
 *
 * The model runs on this machine, so it reports an accelerator footprint and
 * can be evicted with {@link OllamaProvider.unload} between stages.
 */
export class OllamaProvider implements TextGenerationProvider {
  id = "ollama";
  name = "Ollama";
  description = "Local open-weight text models served by Ollama";
  capabilities: AICapability[] = ["text-generation"];
  isAvailable = true;
  footprintGb = 3.5;

  private baseUrl = "http://localhost:11434";
  private model = "llama3.2:3b";
  private timeout?: number;

  async initialize(config: ProviderConfig): Promise<void> {
    if (config.baseUrl) {
      this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    }
    if (config.model) {
      this.model = config.model;
    }
    this.timeout = config.timeout;
  }

  /** No credentials needed; the server is checked on first use */
  isConfigured(): boolean {
    return true;
  }

  get modelLabel(): string {
    return `ollama:${this.model}`;
  }

  async generateText(prompt: string, options: TextGenerationOptions = {}): Promise<string> {
    const response = await fetch(`${this.baseUrl}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.model,
        prompt,
        ...(options.system ? { system: options.system } : {}),
        stream: false,
        options: {
          temperature: options.temperature ?? 0.7,
          num_predict: options.maxTokens ?? 2000,
        },
      }),
      signal: timeoutSignal(this.timeout),
    });

    if (!response.ok) {
      throw new Error(`Ollama ${await readApiError(response)}`);
    }

    const data = generateResponseSchema.parse(await response.json());
    if (!data.response.trim()) {
      throw new Error("Ollama returned an empty response");
    }
    return data.response;
  }

  /** Ask the server to evict the model from memory now */
  async unload(): Promise<void> {
    const response = await fetch(`${this.baseUrl}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model: this.model, keep_alive: 0 }),
      signal: timeoutSignal(this.timeout),
    });
    if (!response.ok) {
      throw new Error(`Ollama unload failed: ${await readApiError(response)}`);
    }
  }
}
