import { Command } from "commander";
import chalk from "chalk";
import { action, createCommandContext, createServices, exitCodeFor, parseInteger, printStats } from "./command-helpers.js";

interface VideosCommandOptions {
  topic: string;
  fps?: number;
  motion?: number;
  frames?: number;
  seed?: number;
  skip: boolean;
  input?: string;
  output?: string;
  preview?: boolean;
}

export const videosCommand = new Command("videos")
  .description("Animate each scene's image into a silent clip")
  .requiredOption("-t, --topic <text>", "Video topic")
  .option("--fps <number>", "Frames per second", parseInteger)
  .option("--motion <number>", "Motion strength (1-255)", parseInteger)
  .option("--frames <count>", "Frames per clip", parseInteger)
  .option("--seed <number>", "Base seed", parseInteger)
  .option("--no-skip", "Regenerate clips that already exist")
  .option("-i, --input <dir>", "Directory containing scene images")
  .option("-o, --output <dir>", "Directory for generated clips")
  .option("--preview", "Render a slow zoom over each image with ffmpeg")
  .action(
    action<VideosCommandOptions>(async (options, command) => {
      const context = await createCommandContext(command, {
        video: { fps: options.fps, motion: options.motion, frameCount: options.frames, baseSeed: options.seed },
      });
      const services = await createServices(context, options.topic, {
        required: ["image-to-video"],
        preview: options.preview,
        overrides: { images: options.input, clips: options.output },
      });

      console.log(chalk.bold.cyan("Scene clips"));
      console.log(chalk.dim("─".repeat(60)));
      console.log(`Model: ${services.models.video}`);

      const stats = await services.videos.generateForTopic(options.topic, { skipExisting: options.skip });
      printStats("Clips", stats);
      return exitCodeFor(stats);
    })
  );
