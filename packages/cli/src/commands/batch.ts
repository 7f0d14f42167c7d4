import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Command } from "commander";
import chalk from "chalk";
import type { AICapability } from "@reelsmith/ai-providers";
import {
  ConfigurationError,
  PipelineError,
  PipelineInterruptedError,
  errorMessage,
  type Logger,
} from "@reelsmith/core";
import { runPipeline } from "../pipeline/orchestrator.js";
import { action, createCommandContext, createServices, parseSceneCount } from "./command-helpers.js";

interface BatchCommandOptions {
  file: string;
  scenes: number;
  style?: string;
  preview?: boolean;
  skip: boolean;
}

export interface BatchFailure {
  topic: string;
  error: string;
}

export interface BatchSummary {
  succeeded: string[];
  failed: BatchFailure[];
}

const ALL_CAPABILITIES: readonly AICapability[] = ["text-generation", "text-to-image", "image-to-video", "text-to-speech"];

/** One topic per line; blank lines and `#` comments are skipped */
export function parseTopics(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

export async function readTopics(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new PipelineError(`Topics file not found: ${path}`, {
      hint: "Pass a text file with one topic per line.",
      cause: error,
    });
  }
  const topics = parseTopics(text);
  if (topics.length === 0) {
    throw new PipelineError(`No topics in ${path}`, { hint: "Pass a text file with one topic per line." });
  }
  return topics;
}

/**
 * Run every topic in turn. A failed topic is recorded and the batch moves
 * on; an interrupt or a configuration problem stops the whole batch.
 */
export async function runBatch(
  topics: readonly string[],
  runOne: (topic: string) => Promise<void>,
  logger: Logger
): Promise<BatchSummary> {
  const summary: BatchSummary = { succeeded: [], failed: [] };

  for (const [index, topic] of topics.entries()) {
    logger.info(`Batch ${index + 1}/${topics.length}: ${topic}`);
    try {
      await runOne(topic);
      summary.succeeded.push(topic);
    } catch (error) {
      if (error instanceof PipelineInterruptedError || error instanceof ConfigurationError) {
        throw error;
      }
      const message = errorMessage(error);
      logger.error(`Failed to process "${topic}": ${message}`);
      summary.failed.push({ topic, error: message });
    }
  }

  logger.info(`Batch complete: ${summary.succeeded.length}/${topics.length} successful, ${summary.failed.length} failed`);
  return summary;
}

export const batchCommand = new Command("batch")
  .description("Run the whole pipeline for every topic in a file")
  .requiredOption("-f, --file <path>", "Text file with one topic per line")
  .option("-n, --scenes <count>", "Number of scenes per video (1-10)", parseSceneCount, 5)
  .option("-s, --style <name>", "Visual style")
  .option("--preview", "Use offline placeholder providers for every stage")
  .option("--no-skip", "Regenerate outputs that already exist")
  .action(
    action<BatchCommandOptions>(async (options, command) => {
      const context = await createCommandContext(command, { image: { style: options.style } });
      const topics = await readTopics(resolve(process.cwd(), options.file));

      console.log(chalk.bold.cyan(`Reelsmith batch: ${topics.length} topics`));
      console.log(chalk.dim("─".repeat(60)));

      const summary = await runBatch(
        topics,
        async (topic) => {
          const services = await createServices(context, topic, {
            required: ALL_CAPABILITIES,
            preview: options.preview,
          });
          const { manifest } = await runPipeline(
            {
              topic,
              scenes: options.scenes,
              style: context.config.image.style,
              maxRetries: context.config.llm.maxRetries,
              fadeDuration: context.config.assembly.fadeDuration,
              skipExisting: options.skip,
            },
            services
          );
          if (manifest.finalVideo) console.log(`Final video: ${chalk.green(manifest.finalVideo)}`);
        },
        context.logger
      );

      console.log();
      console.log(chalk.bold.cyan("Summary"));
      console.log(chalk.dim("─".repeat(60)));
      for (const topic of summary.succeeded) {
        console.log(`  ${chalk.green("✓")} ${topic}`);
      }
      for (const failure of summary.failed) {
        console.log(`  ${chalk.red("✗")} ${failure.topic} ${chalk.dim(failure.error)}`);
      }
      return summary.succeeded.length > 0 ? 0 : 1;
    })
  );
