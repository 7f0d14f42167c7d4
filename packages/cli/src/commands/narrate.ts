import { Command } from "commander";
import chalk from "chalk";
import { action, createCommandContext, createServices, exitCodeFor, parseInteger, printStats } from "./command-helpers.js";

interface NarrateCommandOptions {
  topic: string;
  voice?: string;
  delay?: number;
  skip: boolean;
  input?: string;
  output?: string;
  preview?: boolean;
}

export const narrateCommand = new Command("narrate")
  .description("Synthesize narration for every scene")
  .requiredOption("-t, --topic <text>", "Video topic")
  .option("-v, --voice <name>", "Voice name (rachel, adam, josh, ...) or voice id")
  .option("--delay <ms>", "Pause between requests", parseInteger)
  .option("--no-skip", "Regenerate narration that already exists")
  .option("-i, --input <dir>", "Directory containing the storyboard file")
  .option("-o, --output <dir>", "Directory for narration files")
  .option("--preview", "Render tones instead of speech")
  .action(
    action<NarrateCommandOptions>(async (options, command) => {
      const context = await createCommandContext(command, {
        narration: { voice: options.voice, requestDelayMs: options.delay },
      });
      const services = await createServices(context, options.topic, {
        required: ["text-to-speech"],
        preview: options.preview,
        overrides: { scripts: options.input, audio: options.output },
      });

      console.log(chalk.bold.cyan("Narration"));
      console.log(chalk.dim("─".repeat(60)));
      console.log(`Voice: ${context.config.narration.voice} ${chalk.dim(`(${services.models.narration})`)}`);

      const stats = await services.narration.generateForTopic(options.topic, { skipExisting: options.skip });
      printStats("Narration", stats);
      return exitCodeFor(stats);
    })
  );
