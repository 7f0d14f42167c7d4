import { Command, InvalidArgumentError } from "commander";
import { mkdir } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import chalk from "chalk";
import ora from "ora";
import { MediaProcessGateway } from "../media/gateway.js";
import { action, createCommandContext, parseNumber } from "./command-helpers.js";

interface TestClipCommandOptions {
  duration: number;
  size: { width: number; height: number };
  audio: boolean;
  output?: string;
}

/** `640x360` → dimensions */
export function parseSize(value: string): { width: number; height: number } {
  const match = /^(\d+)x(\d+)$/.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError("Expected WIDTHxHEIGHT, e.g. 640x360.");
  }
  return { width: Number(match[1]), height: Number(match[2]) };
}

export const testClipCommand = new Command("test-clip")
  .description("Render a synthetic test clip to check the ffmpeg setup")
  .option("-d, --duration <seconds>", "Clip length", parseNumber, 5)
  .option("--size <WxH>", "Frame size", parseSize, { width: 640, height: 360 })
  .option("--no-audio", "Leave out the sine tone")
  .option("-o, --output <path>", "Output file (default: <root>/test_clip.mp4)")
  .action(
    action<TestClipCommandOptions>(async (options, command) => {
      const context = await createCommandContext(command);
      const gateway = await MediaProcessGateway.create();
      const outputPath = resolve(options.output ?? resolve(context.root, "test_clip.mp4"));

      await mkdir(dirname(outputPath), { recursive: true });

      const spinner = ora("Rendering test clip...").start();
      await gateway
        .generateSyntheticTestClip({
          outputPath,
          duration: options.duration,
          width: options.size.width,
          height: options.size.height,
          withAudio: options.audio,
        })
        .catch((error: unknown) => {
          spinner.fail(chalk.red("Test clip failed"));
          throw error;
        });
      spinner.succeed(chalk.green(`Wrote ${outputPath}`));

      const metadata = await gateway.getMetadata(outputPath);
      const hasAudio = await gateway.hasAudioStream(outputPath);
      console.log(
        `  ${metadata.width}x${metadata.height} ${metadata.codec} @ ${metadata.fps}fps, ${metadata.duration.toFixed(2)}s, audio: ${hasAudio ? "yes" : "no"}`
      );
      return 0;
    })
  );
