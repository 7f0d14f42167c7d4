/**
 * @module storyboard/types
 * @description Scene and Storyboard shapes.
 *
 * Scenes are created once by the storyboard generator and then read by every
 * downstream stage. The JSON file on disk uses the snake_case
 * {@link SceneWire} shape; code works with the camelCase {@link Scene}.
 */

/** Structured visual description of a scene, all fields optional */
export interface SceneVisual {
  subject?: string;
  action?: string;
  environment?: string;
  lighting?: string;
  camera?: string;
}

export interface Scene {
  /** 1-based, unique within a storyboard */
  readonly sceneId: number;
  readonly visual: Readonly<SceneVisual>;
  /** Legacy single-string visual description */
  readonly visualPrompt?: string;
  /** Narration text, never empty */
  readonly audioText: string;
  /** Advisory length in seconds (3-30); the merged clip follows the narration */
  readonly duration: number;
}

export interface Storyboard {
  readonly topic: string;
  /** Sorted by ascending sceneId */
  readonly scenes: readonly Scene[];
}

/** On-disk representation of a scene */
export interface SceneWire {
  scene_id: number;
  visual_subject?: string;
  visual_action?: string;
  background_environment?: string;
  lighting?: string;
  camera_shot?: string;
  visual_prompt?: string;
  audio_text: string;
  duration: number;
}

export const MIN_SCENE_DURATION = 3;
export const MAX_SCENE_DURATION = 30;
export const DEFAULT_SCENE_DURATION = 8;
export const MAX_SCENES = 10;
