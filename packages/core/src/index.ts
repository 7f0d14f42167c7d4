/**
 * @reelsmith/core - Scene model, storyboard repair, asset layout and errors
 */

export * from "./errors.js";
export * from "./result.js";
export * from "./logger.js";

export * from "./storyboard/types.js";
export { validateStoryboard, toWire } from "./storyboard/schema.js";
export {
  stripCodeFences,
  extractJsonArrays,
  repairJson,
  parseWithRepair,
  type StoryboardParseError,
  type StoryboardParseStage,
} from "./storyboard/repair.js";
export { totalDuration, sceneCount, serializeStoryboard, deserializeStoryboard } from "./storyboard/storyboard.js";

export { slugifyTopic } from "./assets/slug.js";
export {
  SceneAssetStore,
  ASSET_KINDS,
  padSceneId,
  sceneIdFromFilename,
  type AssetKind,
  type SceneAssetStoreOptions,
} from "./assets/store.js";

export { planLoop, type LoopPlan } from "./sync/loop-plan.js";

export * from "./jobs/store.js";
export * from "./manifest/types.js";
