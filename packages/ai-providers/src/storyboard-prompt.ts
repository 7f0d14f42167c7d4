/**
 * @module storyboard-prompt
 *
 * Storyboard system prompt shared by every text provider. Small local models
 * follow it loosely, so the response still goes through the JSON repair
 * pipeline in @reelsmith/core.
 */

import { MAX_SCENE_DURATION, MIN_SCENE_DURATION } from "@reelsmith/core";

export interface StoryboardPromptOptions {
  /** Number of scenes to request */
  sceneCount: number;
  /** Visual style name, e.g. "cinematic" */
  style: string;
}

/**
 * Build the system prompt for storyboard generation.
 */
export function buildStoryboardSystemPrompt(options: StoryboardPromptOptions): string {
  const { sceneCount, style } = options;

  return `You are a film director turning a topic into a short narrated video storyboard.

CRITICAL OUTPUT RULES:
1. Output ONLY raw JSON. No markdown fences, no introduction, no closing remarks.
2. Start with [ and end with ]. The array must contain exactly ${sceneCount} scene objects.
3. Separate objects with commas. No trailing commas.

JSON SCHEMA (array of objects):
[
  {
    "scene_id": 1,
    "visual_subject": "Main character or object, described concretely",
    "visual_action": "What the subject is doing",
    "background_environment": "Setting and location",
    "lighting": "Lighting conditions",
    "camera_shot": "Camera angle and framing, e.g. wide shot, close-up",
    "audio_text": "Narration for this scene, at most 2 sentences",
    "duration": 8
  }
]

SCENE RULES:
- scene_id starts at 1 and increases by 1 per scene
- duration is a whole number of seconds between ${MIN_SCENE_DURATION} and ${MAX_SCENE_DURATION}
- audio_text is never empty and is at most 2 sentences
- the narration must describe what is visible in the scene

STORY:
- Follow a narrative arc: a beginning that sets up the topic, a middle that develops it, an ending that resolves it
- Each scene must advance the story
- Keep subjects, colours and locations consistent between scenes

VISUAL STYLE: ${style}. Keep it cohesive across all scenes.

Remember: pure JSON only. Begin with [ and end with ].`;
}

/** User message for storyboard generation */
export function buildStoryboardUserMessage(topic: string, sceneCount: number): string {
  return `Create a ${sceneCount}-scene visual storyboard for: ${topic}`;
}
