import { Command, Option } from "commander";
import chalk from "chalk";
import type { AICapability } from "@reelsmith/ai-providers";
import type { StageName } from "@reelsmith/core";
import { runPipeline, selectStages, STAGE_ORDER } from "../pipeline/orchestrator.js";
import { action, createCommandContext, createServices, parseSceneCount } from "./command-helpers.js";

interface RunCommandOptions {
  topic: string;
  scenes: number;
  style?: string;
  from?: StageName;
  until?: StageName;
  preview?: boolean;
  skip: boolean;
}

const CAPABILITY_FOR: Partial<Record<StageName, AICapability>> = {
  storyboard: "text-generation",
  images: "text-to-image",
  videos: "image-to-video",
  narration: "text-to-speech",
};

export const runCommand = new Command("run")
  .description("Run the whole pipeline for a topic and write a run manifest")
  .requiredOption("-t, --topic <text>", "Video topic")
  .option("-n, --scenes <count>", "Number of scenes (1-10)", parseSceneCount, 5)
  .option("-s, --style <name>", "Visual style")
  .addOption(new Option("--from <stage>", "First stage to run").choices(STAGE_ORDER))
  .addOption(new Option("--until <stage>", "Last stage to run").choices(STAGE_ORDER))
  .option("--preview", "Use offline placeholder providers for every stage")
  .option("--no-skip", "Regenerate outputs that already exist")
  .action(
    action<RunCommandOptions>(async (options, command) => {
      const stages = selectStages(options.from, options.until);
      const context = await createCommandContext(command, { image: { style: options.style } });
      const required = stages.flatMap((stage) => {
        const capability = CAPABILITY_FOR[stage];
        return capability ? [capability] : [];
      });
      const services = await createServices(context, options.topic, { required, preview: options.preview });

      console.log(chalk.bold.cyan(`Reelsmith: ${options.topic}`));
      console.log(chalk.dim("─".repeat(60)));
      console.log(`Stages: ${stages.join(" → ")}`);
      console.log();

      const { manifest, manifestPath } = await runPipeline(
        {
          topic: options.topic,
          scenes: options.scenes,
          style: context.config.image.style,
          maxRetries: context.config.llm.maxRetries,
          fadeDuration: context.config.assembly.fadeDuration,
          from: options.from,
          until: options.until,
          skipExisting: options.skip,
        },
        services
      );

      console.log();
      console.log(chalk.bold.cyan("Summary"));
      console.log(chalk.dim("─".repeat(60)));
      for (const record of manifest.stages) {
        const failed = record.failed > 0 ? chalk.red(`${record.failed} failed`) : chalk.dim("0 failed");
        console.log(
          `  ${record.stage.padEnd(11)} ${chalk.green(`${record.successful} ok`)}, ${chalk.dim(`${record.skipped} skipped`)}, ${failed} ${chalk.dim(`${record.elapsedSeconds.toFixed(1)}s`)}`
        );
      }
      console.log(`  ${chalk.bold("total")}       ${manifest.totals.elapsedSeconds.toFixed(1)}s`);
      if (manifest.finalVideo) console.log(`Final video: ${chalk.green(manifest.finalVideo)}`);
      if (manifestPath) console.log(chalk.dim(`Manifest: ${manifestPath}`));
      return 0;
    })
  );
