import { describe, it, expect } from "vitest";
import { extractJsonArrays, parseWithRepair, repairJson, stripCodeFences } from "./repair.js";

const scene = (id: number, extra = ""): string =>
  `{"scene_id": ${id}, "visual_subject": "A barista at work", "audio_text": "Scene ${id} narration."${extra}}`;

describe("stripCodeFences", () => {
  it("should remove json fences", () => {
    expect(stripCodeFences("```json\n[1, 2]\n```")).toBe("[1, 2]");
  });

  it("should leave unfenced text alone", () => {
    expect(stripCodeFences("  [1]  ")).toBe("[1]");
  });
});

describe("extractJsonArrays", () => {
  it("should ignore brackets inside strings", () => {
    expect(extractJsonArrays('Here you go: [{"a": "]"}] enjoy')).toEqual(['[{"a": "]"}]']);
  });

  it("should return every top-level array", () => {
    expect(extractJsonArrays("first [1] then [[2], 3]")).toEqual(["[1]", "[[2], 3]"]);
  });

  it("should wrap bare objects into one array", () => {
    expect(extractJsonArrays('{"a": 1}\n{"b": 2}')).toEqual(['[{"a": 1},{"b": 2}]']);
  });

  it("should return nothing when there is no JSON", () => {
    expect(extractJsonArrays("I cannot help with that.")).toEqual([]);
  });

  it("should skip an unterminated array", () => {
    expect(extractJsonArrays('[{"a": 1}')).toEqual([]);
  });
});

describe("repairJson", () => {
  it("should insert commas between adjacent objects", () => {
    expect(repairJson('[{"a":1} {"b":2}]')).toBe('[{"a":1},{"b":2}]');
    expect(repairJson('[{"a":1}\n\n{"b":2}]')).toBe('[{"a":1},{"b":2}]');
  });

  it("should drop trailing commas", () => {
    expect(repairJson('[{"a":1,},]')).toBe('[{"a":1}]');
  });

  it("should leave commas and braces inside strings alone", () => {
    expect(repairJson('[{"audio_text":"one, ] two"}]')).toBe('[{"audio_text":"one, ] two"}]');
    expect(repairJson('[{"t":"}{"}]')).toBe('[{"t":"}{"}]');
    expect(repairJson('[{"t":"say \\"}\\" {"}]')).toBe('[{"t":"say \\"}\\" {"}]');
  });
});

describe("parseWithRepair", () => {
  it("should parse fenced output with surrounding prose", () => {
    const text = "Sure! Here is your storyboard:\n```json\n[" + scene(1) + "," + scene(2) + "]\n```\nLet me know.";
    const result = parseWithRepair(text, "Espresso");

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.topic).toBe("Espresso");
      expect(result.value.scenes.map((s) => s.sceneId)).toEqual([1, 2]);
      expect(result.value.scenes[0].visual.subject).toBe("A barista at work");
      expect(result.value.scenes[0].duration).toBe(8);
    }
  });

  it("should repair missing commas and trailing commas", () => {
    const text = "[" + scene(1) + "\n" + scene(2) + ",]";
    const result = parseWithRepair(text, "t");
    expect(result.ok && result.value.scenes.length).toBe(2);
  });

  it("should merge several arrays and sort by scene id", () => {
    const text = "[" + scene(3) + "]\n[" + scene(1) + "," + scene(2) + "]";
    const result = parseWithRepair(text, "t");
    expect(result.ok && result.value.scenes.map((s) => s.sceneId)).toEqual([1, 2, 3]);
  });

  it("should ignore arrays without scene objects in surrounding prose", () => {
    const text = "Here are the [3] scenes you asked for:\n[" + scene(1) + "," + scene(2) + "," + scene(3) + "]";
    const result = parseWithRepair(text, "t");
    expect(result.ok && result.value.scenes.map((s) => s.sceneId)).toEqual([1, 2, 3]);
  });

  it("should report the extract stage when no fragment holds an object", () => {
    const result = parseWithRepair("Scores: [1, 2] and [3]", "t");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.stage).toBe("extract");
      expect(result.error.message).toBe("No scene objects found in model output");
    }
  });

  it("should skip an unparseable fragment when another parses", () => {
    const text = "[not json] [" + scene(1) + "]";
    const result = parseWithRepair(text, "t");
    expect(result.ok && result.value.scenes.length).toBe(1);
  });

  it("should report the extract stage when no JSON is present", () => {
    const result = parseWithRepair("no json here", "t");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.stage).toBe("extract");
  });

  it("should report the json stage when nothing parses", () => {
    const result = parseWithRepair("[{scene_id: one}]", "t");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.stage).toBe("json");
  });

  it("should report the schema stage with issues", () => {
    const result = parseWithRepair("[" + scene(1) + "," + scene(1) + "]", "t");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.stage).toBe("schema");
      expect(result.error.issues).toEqual(["1.scene_id: duplicate scene_id 1"]);
    }
  });
});
