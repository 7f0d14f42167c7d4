import { describe, it, expect } from "vitest";
import { buildStoryboardSystemPrompt, buildStoryboardUserMessage } from "./storyboard-prompt.js";

describe("buildStoryboardSystemPrompt", () => {
  const prompt = buildStoryboardSystemPrompt({ sceneCount: 3, style: "analog_film" });

  it("should request the scene count and style", () => {
    expect(prompt).toContain("The array must contain exactly 3 scene objects.");
    expect(prompt).toContain("VISUAL STYLE: analog_film.");
  });

  it("should describe the wire schema and duration bounds", () => {
    expect(prompt).toContain('"visual_subject"');
    expect(prompt).toContain('"audio_text"');
    expect(prompt).toContain("between 3 and 30");
  });
});

describe("buildStoryboardUserMessage", () => {
  it("should name the topic", () => {
    expect(buildStoryboardUserMessage("The History of Espresso", 3)).toBe(
      "Create a 3-scene visual storyboard for: The History of Espresso"
    );
  });
});
