import { z } from "zod";
import type {
  AICapability,
  MediaResult,
  NarrationOptions,
  NarrationProvider,
  ProviderConfig,
} from "../interface/types.js";
import { describeError, readApiError, timeoutSignal } from "../http.js";

/** Premade voices addressable by name */
export const KNOWN_VOICES: Readonly<Record<string, string>> = {
  rachel: "21m00Tcm4TlvDq8ikWAM",
  adam: "pNInz6obpgDQGcFmaJgB",
  antoni: "ErXwobaYiN019PkySvjV",
  bella: "EXAVITQu4vr4xnSDxMaL",
  josh: "TxGEqnHWrfWFTfGW9XjX",
  domi: "AZnzlk1XvdvUeBnXmlld",
  elli: "MF3mGyEYCl7XYWbV9V6O",
  sam: "yoZ06aMxZJJ28mfd3POQ",
};

/** Voice name (case-insensitive) or a raw voice id */
export function resolveVoiceId(voice: string | undefined): string {
  if (!voice) return KNOWN_VOICES.rachel;
  return KNOWN_VOICES[voice.toLowerCase()] ?? voice;
}

const voicesSchema = z.object({
  voices: z.array(
    z.object({
      voice_id: z.string(),
      name: z.string(),
      category: z.string().optional(),
    })
  ),
});

/**
 * Voice info from ElevenLabs API
 */
export type Voice = z.infer<typeof voicesSchema>["voices"][number];

/**
 * TTS generation options
 */
export interface TTSOptions {
  /** Voice ID to use */
  voiceId?: string;
  /** Model to use (eleven_multilingual_v2, eleven_monolingual_v1) */
  model?: string;
  /** Stability (0-1) - higher = more consistent */
  stability?: number;
  /** Similarity boost (0-1) */
  similarityBoost?: number;
  /** Style (0-1) - only for v2 models */
  style?: number;
}

/**
 * ElevenLabs provider for scene narration
 */
export class ElevenLabsProvider implements NarrationProvider {
  id = "elevenlabs";
  name = "ElevenLabs";
  description = "AI text-to-speech with natural voices";
  capabilities: AICapability[] = ["text-to-speech"];
  isAvailable = true;
  footprintGb = 0;

  private apiKey?: string;
  private baseUrl = "https://api.elevenlabs.io/v1";
  private model = "eleven_multilingual_v2";
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
    return `elevenlabs:${this.model}`;
  }

  /**
   * Get list of available voices
   */
  async getVoices(): Promise<Voice[]> {
    if (!this.apiKey) {
      return [];
    }

    const response = await fetch(`${this.baseUrl}/voices`, {
      headers: { "xi-api-key": this.apiKey },
      signal: timeoutSignal(this.timeout),
    });
    if (!response.ok) {
      throw new Error(`ElevenLabs ${await readApiError(response)}`);
    }
    return voicesSchema.parse(await response.json()).voices;
  }

  /**
   * Generate speech from text
   */
  async textToSpeech(text: string, options: TTSOptions = {}): Promise<MediaResult> {
    if (!this.apiKey) {
      return {
        success: false,
        error: "ElevenLabs API key not configured. Set ELEVENLABS_API_KEY",
      };
    }

    try {
      const voiceId = options.voiceId || KNOWN_VOICES.rachel;

      const response = await fetch(`${this.baseUrl}/text-to-speech/${voiceId}`, {
        method: "POST",
        headers: {
          "xi-api-key": this.apiKey,
          "Content-Type": "application/json",
          Accept: "audio/mpeg",
        },
        body: JSON.stringify({
          text,
          model_id: options.model || this.model,
          voice_settings: {
            stability: options.stability ?? 0.5,
            similarity_boost: options.similarityBoost ?? 0.75,
            style: options.style ?? 0,
            use_speaker_boost: true,
          },
        }),
        signal: timeoutSignal(this.timeout),
      });

      if (!response.ok) {
        return { success: false, error: `TTS failed: ${await readApiError(response)}` };
      }

      return { success: true, buffer: Buffer.from(await response.arrayBuffer()) };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  async synthesize(text: string, options: NarrationOptions = {}): Promise<MediaResult> {
    return this.textToSpeech(text, { voiceId: resolveVoiceId(options.voice) });
  }
}
