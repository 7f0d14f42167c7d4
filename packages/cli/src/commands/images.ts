import { Command, Option } from "commander";
import chalk from "chalk";
import { action, createCommandContext, createServices, exitCodeFor, parseInteger, printStats } from "./command-helpers.js";

interface ImagesCommandOptions {
  topic: string;
  variants?: number;
  seed?: number;
  style?: string;
  quality?: string;
  skip: boolean;
  input?: string;
  output?: string;
  preview?: boolean;
}

export const imagesCommand = new Command("images")
  .description("Generate scene stills from the storyboard")
  .requiredOption("-t, --topic <text>", "Video topic")
  .option("--variants <count>", "Images per scene", parseInteger)
  .option("--seed <number>", "Base seed", parseInteger)
  .option("-s, --style <name>", "Style preset (cinematic, anime, photorealistic, ...)")
  .addOption(new Option("-q, --quality <level>", "Quality tags").choices(["ultra", "high", "standard"]))
  .option("--no-skip", "Regenerate images that already exist")
  .option("-i, --input <dir>", "Directory containing the storyboard file")
  .option("-o, --output <dir>", "Directory for generated images")
  .option("--preview", "Render placeholder stills with ffmpeg")
  .action(
    action<ImagesCommandOptions>(async (options, command) => {
      const context = await createCommandContext(command, {
        image: { variants: options.variants, baseSeed: options.seed, style: options.style, quality: options.quality },
      });
      const services = await createServices(context, options.topic, {
        required: ["text-to-image"],
        preview: options.preview,
        overrides: { scripts: options.input, images: options.output },
      });

      console.log(chalk.bold.cyan("Scene images"));
      console.log(chalk.dim("─".repeat(60)));
      console.log(`Model: ${services.models.image}`);

      await services.resources.ensureAvailable(services.footprints.image, "image model");
      const stats = await services.resources.scoped("image model", () =>
        services.images.generateForTopic(options.topic, { skipExisting: options.skip })
      );
      printStats("Images", stats);
      return exitCodeFor(stats);
    })
  );
