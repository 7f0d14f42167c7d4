import { Command, Option } from "commander";
import chalk from "chalk";
import ora from "ora";
import { ENCODING_PRESET_NAMES } from "../config/schema.js";
import { action, createCommandContext, createServices, parseNumber } from "./command-helpers.js";

interface ConcatCommandOptions {
  topic: string;
  input?: string;
  output?: string;
  fade?: number;
  preset?: string;
}

export const concatCommand = new Command("concat")
  .description("Join the merged scenes into the final video")
  .requiredOption("-t, --topic <text>", "Video topic")
  .option("-i, --input <dir>", "Directory containing merged scenes")
  .option("-o, --output <dir>", "Directory for the final video")
  .option("--fade <seconds>", "Fade in/out duration", parseNumber)
  .addOption(new Option("--preset <name>", "Encoding preset").choices(ENCODING_PRESET_NAMES))
  .action(
    action<ConcatCommandOptions>(async (options, command) => {
      const context = await createCommandContext(command, {
        assembly: { fadeDuration: options.fade, preset: options.preset },
      });
      const services = await createServices(context, options.topic, {
        required: [],
        overrides: { merged: options.input, final: options.output },
      });

      const spinner = ora("Concatenating scenes...").start();
      const result = await services.concatenator
        .concatenateTopic(options.topic, {
          fadeDuration: context.config.assembly.fadeDuration,
          onProgress: (percent) => {
            spinner.text = `Concatenating scenes... ${percent}%`;
          },
        })
        .catch((error: unknown) => {
          spinner.fail(chalk.red("Concatenation failed"));
          throw error;
        });

      spinner.succeed(chalk.green(`${result.clipCount} scenes, ${result.totalDuration.toFixed(1)}s`));
      console.log(`Final video: ${chalk.green(result.outputPath)}`);
      return 0;
    })
  );
