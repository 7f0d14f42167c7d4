import type { SceneAssetStore, StageName, WorkStats } from "@reelsmith/core";

export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".webp"] as const;
export const VIDEO_EXTENSIONS = [".mp4", ".mov", ".webm", ".mkv"] as const;
export const AUDIO_EXTENSIONS = [".mp3", ".wav", ".m4a", ".aac"] as const;

/** Per-topic asset store, with any directory overrides already applied */
export type StoreFactory = (topic: string) => SceneAssetStore;

export interface BatchOptions {
  /** Keep outputs that already exist (default true) */
  skipExisting?: boolean;
}

export interface StageOutcome {
  stats: WorkStats;
  /** Main artifact of the stage, e.g. the storyboard file or final video */
  output?: string;
}

export interface PipelineStage<C> {
  readonly name: StageName;
  run(context: C): Promise<StageOutcome>;
}
