/**
 * @module errors
 * @description Error taxonomy shared by every pipeline stage.
 *
 * Each error carries a stable `code` and an optional `hint` that the CLI
 * prints under the message. Per-scene failures are isolated by the batch
 * workers; the remaining errors are fatal for the command that raised them.
 */

export type PipelineErrorCode =
  | "pipeline"
  | "llm-generation"
  | "storyboard-validation"
  | "configuration"
  | "missing-prerequisite"
  | "media-process"
  | "resource-exhausted"
  | "concatenation"
  | "generation"
  | "interrupted";

/** Base class for all Reelsmith errors */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly hint?: string;

  constructor(message: string, options: { code?: PipelineErrorCode; hint?: string; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = options.code ?? "pipeline";
    this.hint = options.hint;
  }
}

/** The text model never produced a valid storyboard */
export class LLMGenerationError extends PipelineError {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super(message, {
      code: "llm-generation",
      hint: "Try again, raise --retries, or switch the text model with --provider/--model.",
      cause,
    });
    this.attempts = attempts;
  }
}

/** A persisted storyboard file does not match the scene schema */
export class StoryboardValidationError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message, { code: "storyboard-validation" });
    this.issues = issues;
  }
}

/** Missing binaries, missing credentials or an invalid config file */
export class ConfigurationError extends PipelineError {
  constructor(message: string, hint?: string) {
    super(message, { code: "configuration", hint });
  }
}

/** A stage was started before the stage it depends on produced output */
export class MissingPrerequisiteError extends PipelineError {
  readonly prerequisite: string;

  constructor(message: string, prerequisite: string) {
    super(message, {
      code: "missing-prerequisite",
      hint: `Run \`${prerequisite}\` first.`,
    });
    this.prerequisite = prerequisite;
  }
}

export type MediaProcessFailure =
  | "missing-input"
  | "probe-failed"
  | "invalid-duration"
  | "process-failed";

/** ffmpeg or ffprobe could not complete an operation */
export class MediaProcessError extends PipelineError {
  readonly failure: MediaProcessFailure;
  readonly stderr?: string;

  constructor(message: string, failure: MediaProcessFailure, stderr?: string) {
    super(message, { code: "media-process" });
    this.failure = failure;
    this.stderr = stderr;
  }
}

/** Not enough accelerator memory for a model, or an out-of-memory failure mid-call */
export class ResourceExhaustedError extends PipelineError {
  readonly requiredGb?: number;
  readonly freeGb?: number;

  constructor(message: string, details: { requiredGb?: number; freeGb?: number; cause?: unknown } = {}) {
    super(message, {
      code: "resource-exhausted",
      hint: "Reduce the frame count (--frames) or clip size, or free accelerator memory held by other processes.",
      cause: details.cause,
    });
    this.requiredGb = details.requiredGb;
    this.freeGb = details.freeGb;
  }
}

/** Clips cannot be joined; lists every offending input */
export class ConcatenationError extends PipelineError {
  readonly offenders: string[];

  constructor(message: string, offenders: string[] = [], hint?: string) {
    super(message, { code: "concatenation", hint });
    this.offenders = offenders;
  }
}

/** A collaborator reported failure for a single unit of work */
export class GenerationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "generation", cause });
  }
}

/** An interrupt was observed between two steps */
export class PipelineInterruptedError extends PipelineError {
  constructor(message = "Interrupted") {
    super(message, {
      code: "interrupted",
      hint: "Completed outputs are kept; re-run the same command to resume.",
    });
  }
}

/** Normalise an unknown thrown value to a message */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
