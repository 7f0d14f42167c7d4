import { z } from "zod";
import { err, ok, type Result } from "../result.js";
import {
  DEFAULT_SCENE_DURATION,
  MAX_SCENE_DURATION,
  MAX_SCENES,
  MIN_SCENE_DURATION,
  type Scene,
  type SceneWire,
  type Storyboard,
} from "./types.js";

/** Accepts 8, 8.0 and "8"; rejects 8.5 */
const integerLike = z
  .union([z.number(), z.string().trim().regex(/^-?\d+(\.0+)?$/, "must be an integer").transform(Number)])
  .pipe(z.number().int("must be an integer"));

/** Blank or null text counts as absent */
const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const sceneWireSchema = z
  .object({
    scene_id: integerLike.pipe(z.number().min(1, "must be >= 1")),
    visual_subject: optionalText,
    visual_action: optionalText,
    background_environment: optionalText,
    lighting: optionalText,
    camera_shot: optionalText,
    visual_prompt: optionalText,
    audio_text: z.string().trim().min(1, "narration text cannot be empty"),
    duration: integerLike
      .pipe(
        z
          .number()
          .min(MIN_SCENE_DURATION, `must be at least ${MIN_SCENE_DURATION}s`)
          .max(MAX_SCENE_DURATION, `must be at most ${MAX_SCENE_DURATION}s`)
      )
      .default(DEFAULT_SCENE_DURATION),
  })
  .superRefine((scene, ctx) => {
    const structured = [
      scene.visual_subject,
      scene.visual_action,
      scene.background_environment,
      scene.lighting,
      scene.camera_shot,
    ].some((field) => field !== undefined);

    if (!structured && scene.visual_prompt === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "scene needs visual_subject (or another visual field) or a legacy visual_prompt",
        path: ["visual_subject"],
      });
    }
    if (scene.visual_prompt !== undefined && scene.visual_prompt.length < 10) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "visual_prompt is too short, must be at least 10 characters",
        path: ["visual_prompt"],
      });
    }
  });

const storyboardWireSchema = z
  .array(sceneWireSchema)
  .min(1, "storyboard needs at least one scene")
  .max(MAX_SCENES, `storyboard supports at most ${MAX_SCENES} scenes`)
  .superRefine((scenes, ctx) => {
    const seen = new Set<number>();
    scenes.forEach((scene, index) => {
      if (seen.has(scene.scene_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate scene_id ${scene.scene_id}`,
          path: [index, "scene_id"],
        });
      }
      seen.add(scene.scene_id);
    });
  });

type ParsedSceneWire = z.output<typeof sceneWireSchema>;

function toScene(wire: ParsedSceneWire): Scene {
  const visual: Scene["visual"] = {
    ...(wire.visual_subject !== undefined && { subject: wire.visual_subject }),
    ...(wire.visual_action !== undefined && { action: wire.visual_action }),
    ...(wire.background_environment !== undefined && { environment: wire.background_environment }),
    ...(wire.lighting !== undefined && { lighting: wire.lighting }),
    ...(wire.camera_shot !== undefined && { camera: wire.camera_shot }),
  };

  return {
    sceneId: wire.scene_id,
    visual,
    ...(wire.visual_prompt !== undefined && { visualPrompt: wire.visual_prompt }),
    audioText: wire.audio_text,
    duration: wire.duration,
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate raw scene objects (as parsed from JSON) and build a storyboard.
 * Returns the list of schema issues on failure.
 */
export function validateStoryboard(raw: unknown, topic: string): Result<Storyboard, string[]> {
  const parsed = storyboardWireSchema.safeParse(raw);
  if (!parsed.success) {
    return err(formatIssues(parsed.error));
  }

  const scenes = parsed.data.map(toScene).sort((a, b) => a.sceneId - b.sceneId);
  return ok({ topic, scenes });
}

/** Convert a scene back to its on-disk shape */
export function toWire(scene: Scene): SceneWire {
  return {
    scene_id: scene.sceneId,
    ...(scene.visual.subject !== undefined && { visual_subject: scene.visual.subject }),
    ...(scene.visual.action !== undefined && { visual_action: scene.visual.action }),
    ...(scene.visual.environment !== undefined && { background_environment: scene.visual.environment }),
    ...(scene.visual.lighting !== undefined && { lighting: scene.visual.lighting }),
    ...(scene.visual.camera !== undefined && { camera_shot: scene.visual.camera }),
    ...(scene.visualPrompt !== undefined && { visual_prompt: scene.visualPrompt }),
    audio_text: scene.audioText,
    duration: scene.duration,
  };
}
