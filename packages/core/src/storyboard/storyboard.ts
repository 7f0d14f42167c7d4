import { StoryboardValidationError } from "../errors.js";
import { toWire, validateStoryboard } from "./schema.js";
import type { Storyboard } from "./types.js";

export function totalDuration(storyboard: Storyboard): number {
  return storyboard.scenes.reduce((sum, scene) => sum + scene.duration, 0);
}

export function sceneCount(storyboard: Storyboard): number {
  return storyboard.scenes.length;
}

/** Storyboard file contents: wire-format array, 2-space indent */
export function serializeStoryboard(storyboard: Storyboard): string {
  return JSON.stringify(storyboard.scenes.map(toWire), null, 2) + "\n";
}

/**
 * Parse a storyboard file. Persisted files are not repaired; anything
 * that fails to parse or validate throws.
 */
export function deserializeStoryboard(content: string, topic: string, source = "storyboard"): Storyboard {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StoryboardValidationError(`${source} is not valid JSON: ${reason}`, [reason]);
  }

  const result = validateStoryboard(raw, topic);
  if (!result.ok) {
    throw new StoryboardValidationError(`${source} failed validation`, result.error);
  }
  return result.value;
}
