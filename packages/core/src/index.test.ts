import { describe, it, expect } from "vitest";
import * as core from "./index.js";

describe("@reelsmith/core", () => {
  it("should export the storyboard limits and helpers", () => {
    expect(core.MAX_SCENES).toBe(10);
    expect(typeof core.parseWithRepair).toBe("function");
    expect(typeof core.planLoop).toBe("function");
  });

  it("should leave logger implementations to the caller", () => {
    expect(Object.keys(core)).not.toContain("nullLogger");
  });
});
