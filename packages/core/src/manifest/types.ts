export type StageName = "storyboard" | "images" | "videos" | "narration" | "merge" | "concat";

/** Outcome counters returned by every batch stage */
export interface WorkStats {
  total: number;
  successful: number;
  skipped: number;
  failed: number;
}

export const emptyStats = (): WorkStats => ({ total: 0, successful: 0, skipped: 0, failed: 0 });

export interface StageRecord extends WorkStats {
  stage: StageName;
  elapsedSeconds: number;
}

export type RunStatus = "completed" | "failed" | "interrupted";

export interface PipelineManifest {
  runId: string;
  topic: string;
  topicSlug: string;
  startedAt: string;
  finishedAt: string;
  status: RunStatus;
  models: {
    text: string;
    image: string;
    video: string;
    narration: string;
  };
  stages: StageRecord[];
  totals: WorkStats & { elapsedSeconds: number };
  finalVideo?: string;
  error?: string;
}

/** `YYYYMMDD_HHMMSS` in local time plus a short random suffix */
export function createRunId(startedAt: Date, suffix = Math.random().toString(36).slice(2, 6)): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  const date = `${startedAt.getFullYear()}${pad(startedAt.getMonth() + 1)}${pad(startedAt.getDate())}`;
  const time = `${pad(startedAt.getHours())}${pad(startedAt.getMinutes())}${pad(startedAt.getSeconds())}`;
  return `${date}_${time}_${suffix}`;
}

/** Sum stage counters into run totals */
export function sumStats(stages: readonly WorkStats[]): WorkStats {
  return stages.reduce<WorkStats>(
    (acc, s) => ({
      total: acc.total + s.total,
      successful: acc.successful + s.successful,
      skipped: acc.skipped + s.skipped,
      failed: acc.failed + s.failed,
    }),
    emptyStats()
  );
}
