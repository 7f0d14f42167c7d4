export {
  ElevenLabsProvider,
  KNOWN_VOICES,
  resolveVoiceId,
  type Voice,
  type TTSOptions,
} from "./ElevenLabsProvider.js";
