/** Guards against float noise such as 2.0000000001 loops */
const LOOP_EPSILON = 1e-9;

export interface LoopPlan {
  /** Total playthroughs of the clip needed to cover the narration, at least 1 */
  loops: number;
  /** Additional playthroughs after the first (the value ffmpeg's -stream_loop takes) */
  extraLoops: number;
  /** Output length in seconds; always the narration length */
  targetDuration: number;
}

/**
 * How many times a clip must play to cover its narration. The narration is
 * never cut or stretched; the looped clip is trimmed to it.
 */
export function planLoop(videoDuration: number, audioDuration: number): LoopPlan {
  if (!Number.isFinite(videoDuration) || videoDuration <= 0) {
    throw new RangeError(`video duration must be a positive number, got ${videoDuration}`);
  }
  if (!Number.isFinite(audioDuration) || audioDuration <= 0) {
    throw new RangeError(`audio duration must be a positive number, got ${audioDuration}`);
  }

  const loops = Math.max(1, Math.ceil(audioDuration / videoDuration - LOOP_EPSILON));
  return { loops, extraLoops: loops - 1, targetDuration: audioDuration };
}
