import { formatSeconds, validateNumber } from "./command.js";

/**
 * Filter graph that concatenates N clips (video and audio) and fades the
 * joined result in and out. The fades sit inside the timeline, so the output
 * is exactly `totalDuration` long. The fade is clamped to half the total.
 *
 * @example
 * buildConcatFilter(2, 10, 1)
 * // "[0:v][0:a][1:v][1:a]concat=n=2:v=1:a=1[vcat][acat];[vcat]fade=t=in:st=0:d=1,fade=t=out:st=9:d=1,format=yuv420p[vout];[acat]afade=t=in:st=0:d=1,afade=t=out:st=9:d=1[aout]"
 */
export function buildConcatFilter(clipCount: number, totalDuration: number, fadeDuration: number): string {
  validateNumber(clipCount, "clipCount", { min: 1, integer: true });
  validateNumber(totalDuration, "totalDuration", { min: 0 });
  validateNumber(fadeDuration, "fadeDuration", { min: 0 });

  const inputs = Array.from({ length: clipCount }, (_, i) => `[${i}:v][${i}:a]`).join("");
  const concat = `${inputs}concat=n=${clipCount}:v=1:a=1[vcat][acat]`;

  const fade = Math.min(fadeDuration, totalDuration / 2);
  if (fade <= 0) {
    return `${concat};[vcat]format=yuv420p[vout];[acat]anull[aout]`;
  }

  const d = formatSeconds(fade);
  const outStart = formatSeconds(totalDuration - fade);
  const video = `[vcat]fade=t=in:st=0:d=${d},fade=t=out:st=${outStart}:d=${d},format=yuv420p[vout]`;
  const audio = `[acat]afade=t=in:st=0:d=${d},afade=t=out:st=${outStart}:d=${d}[aout]`;
  return `${concat};${video};${audio}`;
}
