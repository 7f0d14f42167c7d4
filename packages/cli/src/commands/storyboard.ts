import { Command, Option } from "commander";
import chalk from "chalk";
import ora from "ora";
import { totalDuration } from "@reelsmith/core";
import { LLM_PROVIDERS } from "../config/schema.js";
import { action, createCommandContext, createServices, parseInteger, parseSceneCount } from "./command-helpers.js";

interface StoryboardCommandOptions {
  topic: string;
  scenes: number;
  style: string;
  retries?: number;
  provider?: string;
  model?: string;
  preview?: boolean;
}

export const storyboardCommand = new Command("storyboard")
  .description("Generate a scene storyboard for a topic with the text model")
  .requiredOption("-t, --topic <text>", "Video topic")
  .option("-n, --scenes <count>", "Number of scenes (1-10)", parseSceneCount, 5)
  .option("-s, --style <name>", "Visual style for the scene descriptions", "cinematic")
  .option("-r, --retries <count>", "Generation attempts before giving up", parseInteger)
  .addOption(new Option("-p, --provider <name>", "Text model provider").choices(LLM_PROVIDERS))
  .option("-m, --model <name>", "Text model name")
  .option("--preview", "Use the offline placeholder model")
  .action(
    action<StoryboardCommandOptions>(async (options, command) => {
      const context = await createCommandContext(command, {
        llm: { provider: options.provider, model: options.model, maxRetries: options.retries },
      });
      const services = await createServices(context, options.topic, {
        required: ["text-generation"],
        preview: options.preview,
      });

      console.log(chalk.bold.cyan("Storyboard"));
      console.log(chalk.dim("─".repeat(60)));
      console.log(`Topic: ${chalk.bold(options.topic)}`);
      console.log(`Model: ${services.models.text}`);

      await services.resources.ensureAvailable(services.footprints.text, "text model");
      const spinner = ora(`Writing ${options.scenes} scenes...`).start();
      const storyboard = await services.resources
        .scoped("text model", (scope) => {
          const { provider } = services.storyboard;
          scope.hold({ name: provider.modelLabel, unload: async () => provider.unload?.() });
          return services.storyboard.generate(options.topic, {
            numScenes: options.scenes,
            style: options.style,
            maxRetries: context.config.llm.maxRetries,
          });
        })
        .catch((error: unknown) => {
          spinner.fail(chalk.red("Storyboard generation failed"));
          throw error;
        });
      spinner.succeed(chalk.green(`${storyboard.scenes.length} scenes, ${totalDuration(storyboard)}s planned`));

      for (const scene of storyboard.scenes) {
        const visual = scene.visual.subject ?? scene.visualPrompt ?? "";
        console.log(`  ${chalk.bold(`Scene ${scene.sceneId}`)} ${chalk.dim(`(${scene.duration}s)`)} ${visual}`);
        console.log(`    ${chalk.dim(scene.audioText)}`);
      }
      console.log();
      console.log(`Saved to ${chalk.green(services.storeFor(options.topic).storyboardPath())}`);
      return 0;
    })
  );
