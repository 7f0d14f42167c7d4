import { describe, expect, it } from "vitest";
import { parseSize } from "./test-clip.js";

describe("parseSize", () => {
  it("should parse WIDTHxHEIGHT", () => {
    expect(parseSize("1280x720")).toEqual({ width: 1280, height: 720 });
    expect(parseSize(" 640x360 ")).toEqual({ width: 640, height: 360 });
  });

  it("should reject other formats", () => {
    expect(() => parseSize("1280*720")).toThrow("Expected WIDTHxHEIGHT, e.g. 640x360.");
  });
});
