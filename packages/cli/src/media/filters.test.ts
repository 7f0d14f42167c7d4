import { describe, it, expect } from "vitest";
import { buildConcatFilter } from "./filters.js";

describe("buildConcatFilter", () => {
  it("should concatenate clips and fade both ends inside the timeline", () => {
    expect(buildConcatFilter(3, 24.5, 1)).toBe(
      "[0:v][0:a][1:v][1:a][2:v][2:a]concat=n=3:v=1:a=1[vcat][acat];" +
        "[vcat]fade=t=in:st=0:d=1,fade=t=out:st=23.5:d=1,format=yuv420p[vout];" +
        "[acat]afade=t=in:st=0:d=1,afade=t=out:st=23.5:d=1[aout]"
    );
  });

  it("should clamp the fade to half the total duration", () => {
    expect(buildConcatFilter(1, 1.2, 1)).toBe(
      "[0:v][0:a]concat=n=1:v=1:a=1[vcat][acat];" +
        "[vcat]fade=t=in:st=0:d=0.6,fade=t=out:st=0.6:d=0.6,format=yuv420p[vout];" +
        "[acat]afade=t=in:st=0:d=0.6,afade=t=out:st=0.6:d=0.6[aout]"
    );
  });

  it("should pass streams through without a fade", () => {
    expect(buildConcatFilter(2, 10, 0)).toBe(
      "[0:v][0:a][1:v][1:a]concat=n=2:v=1:a=1[vcat][acat];[vcat]format=yuv420p[vout];[acat]anull[aout]"
    );
  });

  it("should reject a clip count below one", () => {
    expect(() => buildConcatFilter(0, 10, 1)).toThrow("clipCount must be >= 1, got 0");
  });
});
