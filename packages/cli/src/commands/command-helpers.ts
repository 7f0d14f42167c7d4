/**
 * Shared plumbing for the stage commands.
 */

import { InvalidArgumentError, type Command } from "commander";
import chalk from "chalk";
import {
  ConcatenationError,
  LLMGenerationError,
  MAX_SCENES,
  MediaProcessError,
  PipelineError,
  PipelineInterruptedError,
  StoryboardValidationError,
  errorMessage,
  type AssetKind,
  type WorkStats,
} from "@reelsmith/core";
import type { AICapability } from "@reelsmith/ai-providers";
import { loadConfig, mergeConfig, type ConfigPatch } from "../config/index.js";
import type { ReelsmithConfig } from "../config/schema.js";
import { createPipelineServices, type CreatedServices } from "../pipeline/services.js";
import { ConsoleLogger } from "../utils/logger.js";

export interface GlobalOptions {
  verbose?: boolean;
  root?: string;
}

export interface CommandContext {
  config: ReelsmithConfig;
  logger: ConsoleLogger;
  root: string;
  verbose: boolean;
}

export const INTERRUPT_MESSAGE = "Interrupted: completed outputs are kept; re-run the same command to resume";

/** commander parser for integer options */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

/** commander parser for --scenes, limited to 1..MAX_SCENES */
export function parseSceneCount(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 1 || parsed > MAX_SCENES) {
    throw new InvalidArgumentError(`Must be between 1 and ${MAX_SCENES}.`);
  }
  return parsed;
}

/** commander parser for numeric options */
export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

/**
 * Config with command-line overrides applied, plus a logger honouring --verbose
 */
export async function createCommandContext(command: Command, patch: ConfigPatch = {}): Promise<CommandContext> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const verbose = globals.verbose ?? false;
  const config = mergeConfig(await loadConfig(), patch);
  return {
    config,
    logger: new ConsoleLogger({ verbose }),
    root: globals.root ?? config.output.root,
    verbose,
  };
}

/** Services for a command, with the topic's run log attached */
export async function createServices(
  context: CommandContext,
  topic: string,
  options: { required: readonly AICapability[]; preview?: boolean; overrides?: Partial<Record<AssetKind, string>> }
): Promise<CreatedServices> {
  const services = await createPipelineServices({
    config: context.config,
    logger: context.logger,
    root: context.root,
    overrides: options.overrides,
    preview: options.preview,
    required: options.required,
  });
  context.logger.attachFile(services.storeFor(topic).logPath());
  return services;
}

/** 0 when at least one scene was produced in this run */
export function exitCodeFor(stats: WorkStats): number {
  return stats.successful > 0 ? 0 : 1;
}

export function printStats(label: string, stats: WorkStats): void {
  const parts = [
    chalk.green(`${stats.successful} generated`),
    chalk.dim(`${stats.skipped} skipped`),
    stats.failed > 0 ? chalk.red(`${stats.failed} failed`) : chalk.dim("0 failed"),
  ];
  console.log();
  console.log(`${chalk.bold(label)}: ${parts.join(", ")} ${chalk.dim(`(${stats.total} scenes)`)}`);
}

/**
 * Print an error the way every command does. Returns the exit code.
 */
export function reportError(error: unknown, verbose: boolean): number {
  if (error instanceof PipelineInterruptedError) {
    console.error(chalk.yellow(INTERRUPT_MESSAGE));
    return 130;
  }

  console.error(chalk.red(errorMessage(error)));

  const details: string[] =
    error instanceof StoryboardValidationError
      ? error.issues
      : error instanceof ConcatenationError
        ? error.offenders
        : [];
  for (const detail of details) {
    console.error(chalk.red(`  - ${detail}`));
  }
  if (error instanceof LLMGenerationError) {
    console.error(chalk.dim(`Attempts: ${error.attempts}`));
  }
  if (error instanceof MediaProcessError && error.stderr && verbose) {
    console.error(chalk.dim(error.stderr.trim().split("\n").slice(-10).join("\n")));
  }
  if (error instanceof PipelineError) {
    if (error.hint) console.error(chalk.dim(error.hint));
  } else if (verbose && error instanceof Error && error.stack) {
    console.error(chalk.dim(error.stack));
  } else {
    console.error(chalk.dim("Run with --verbose for details."));
  }
  return 1;
}

/**
 * Wrap a command action: the handler returns an exit code, errors are
 * reported uniformly.
 */
export function action<T>(
  handler: (options: T, command: Command) => Promise<number>
): (options: T, command: Command) => Promise<void> {
  return async (options, command) => {
    try {
      process.exitCode = await handler(options, command);
    } catch (error) {
      const verbose = command.optsWithGlobals<GlobalOptions>().verbose ?? false;
      process.exitCode = reportError(error, verbose);
    }
  };
}
