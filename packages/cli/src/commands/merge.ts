import { Command, Option } from "commander";
import chalk from "chalk";
import { ENCODING_PRESET_NAMES } from "../config/schema.js";
import { action, createCommandContext, createServices, exitCodeFor, printStats } from "./command-helpers.js";

interface MergeCommandOptions {
  topic: string;
  videoDir?: string;
  audioDir?: string;
  output?: string;
  preset?: string;
  skip: boolean;
}

export const mergeCommand = new Command("merge")
  .description("Loop each clip to its narration and mux them")
  .requiredOption("-t, --topic <text>", "Video topic")
  .option("--video-dir <dir>", "Directory containing scene clips")
  .option("--audio-dir <dir>", "Directory containing narration")
  .option("-o, --output <dir>", "Directory for merged scenes")
  .addOption(new Option("--preset <name>", "Encoding preset").choices(ENCODING_PRESET_NAMES))
  .option("--no-skip", "Re-merge scenes that already exist")
  .action(
    action<MergeCommandOptions>(async (options, command) => {
      const context = await createCommandContext(command, { assembly: { preset: options.preset } });
      const services = await createServices(context, options.topic, {
        required: [],
        overrides: { clips: options.videoDir, audio: options.audioDir, merged: options.output },
      });

      console.log(chalk.bold.cyan("Merge"));
      console.log(chalk.dim("─".repeat(60)));

      const stats = await services.synchronizer.mergeTopic(options.topic, { skipExisting: options.skip });
      printStats("Merged scenes", stats);
      return exitCodeFor(stats);
    })
  );
