/**
 * @module storyboard/repair
 * @description Turns raw text-model output into a validated storyboard.
 *
 * Small local models wrap JSON in markdown, add prose around it, emit several
 * arrays, forget commas between objects or leave trailing commas. Each step
 * below handles one of those habits and is exported so it can be tested alone.
 */

import { err, ok, type Result } from "../result.js";
import { validateStoryboard } from "./schema.js";
import type { Storyboard } from "./types.js";

export type StoryboardParseStage = "extract" | "json" | "schema";

export interface StoryboardParseError {
  stage: StoryboardParseStage;
  message: string;
  /** Schema issues, set when stage is "schema" */
  issues?: string[];
}

/** Remove ```json / ``` markers */
export function stripCodeFences(text: string): string {
  return text.replace(/```[a-zA-Z]*[ \t]*\r?\n?/g, "").trim();
}

/**
 * Find every top-level `[...]` in the text, ignoring brackets inside string
 * literals. When there is no array at all, top-level `{...}` objects are
 * collected and wrapped into a single array.
 */
export function extractJsonArrays(text: string): string[] {
  const arrays: string[] = [];
  const objects: string[] = [];
  const stack: string[] = [];
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      // Quotes only matter once we're inside a structure
      if (stack.length > 0) inString = true;
      continue;
    }

    if (ch === "[" || ch === "{") {
      if (stack.length === 0) start = i;
      stack.push(ch);
    } else if ((ch === "]" || ch === "}") && stack.length > 0) {
      const opener = stack.pop();
      if (stack.length === 0) {
        const fragment = text.slice(start, i + 1);
        if (opener === "[") arrays.push(fragment);
        else objects.push(fragment);
      }
    }
  }

  if (arrays.length > 0) return arrays;
  if (objects.length > 0) return [`[${objects.join(",")}]`];
  return [];
}

/** Index of the next non-whitespace character at or after `from`, or -1 */
function nextSignificant(text: string, from: number): number {
  for (let i = from; i < text.length; i++) {
    if (!/\s/.test(text[i])) return i;
  }
  return -1;
}

/**
 * Insert missing commas between adjacent objects and drop trailing commas.
 * String literals are copied untouched.
 */
export function repairJson(fragment: string): string {
  let out = "";
  let inString = false;
  let escaped = false;

  for (let i = 0; i < fragment.length; i++) {
    const ch = fragment[i];

    if (inString) {
      out += ch;
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
      continue;
    }

    const next = nextSignificant(fragment, i + 1);
    if (ch === "," && next !== -1 && (fragment[next] === "]" || fragment[next] === "}")) {
      i = next - 1;
      continue;
    }

    out += ch;
    if (ch === "}" && next !== -1 && fragment[next] === "{") {
      out += ",";
      i = next - 1;
    }
  }

  return out;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Full repair pipeline: fences, extraction, repair, merge of the objects
 * of every array, then schema validation. Fragments that hold no objects,
 * such as a "[3]" in surrounding prose, are ignored.
 */
export function parseWithRepair(text: string, topic: string): Result<Storyboard, StoryboardParseError> {
  const fragments = extractJsonArrays(stripCodeFences(text));
  if (fragments.length === 0) {
    return err({ stage: "extract", message: "No JSON array found in model output" });
  }

  const items: unknown[] = [];
  let parsedAny = false;
  let lastError = "";

  for (const fragment of fragments) {
    try {
      const value: unknown = JSON.parse(repairJson(fragment));
      parsedAny = true;
      const candidates: unknown[] = Array.isArray(value) ? value : [value];
      items.push(...candidates.filter(isPlainObject));
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);
    }
  }

  if (!parsedAny) {
    return err({ stage: "json", message: `Invalid JSON after repair: ${lastError}` });
  }
  if (items.length === 0) {
    return err({ stage: "extract", message: "No scene objects found in model output" });
  }

  const validated = validateStoryboard(items, topic);
  if (!validated.ok) {
    return err({
      stage: "schema",
      message: `Storyboard failed validation: ${validated.error.join("; ")}`,
      issues: validated.error,
    });
  }
  return ok(validated.value);
}
