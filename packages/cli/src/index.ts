#!/usr/bin/env -S node --import tsx

import { Command } from "commander";
import { createRequire } from "module";
import chalk from "chalk";
import { z } from "zod";
import { batchCommand } from "./commands/batch.js";
import { concatCommand } from "./commands/concat.js";
import { doctorCommand } from "./commands/doctor.js";
import { imagesCommand } from "./commands/images.js";
import { mergeCommand } from "./commands/merge.js";
import { narrateCommand } from "./commands/narrate.js";
import { runCommand } from "./commands/run.js";
import { storyboardCommand } from "./commands/storyboard.js";
import { testClipCommand } from "./commands/test-clip.js";
import { videosCommand } from "./commands/videos.js";
import { isInterrupted, setInterrupted } from "./signals.js";
import { loadEnv } from "./utils/env.js";

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require("../package.json"));

loadEnv();

// First Ctrl+C stops between scenes, the second one right away
process.on("SIGINT", () => {
  if (isInterrupted()) {
    console.error(chalk.red("\nAborted"));
    process.exit(130);
  }
  setInterrupted(true);
  console.error(chalk.yellow("\nFinishing the current step, then stopping (Ctrl+C again to abort now)"));
});

const program = new Command();

program
  .name("reel")
  .description("Reelsmith - turn a topic into a narrated short video")
  .version(pkg.version)
  .option("--verbose", "Show debug output and stack traces")
  .option("--root <dir>", "Output root (default: output, or output.root in ~/.reelsmith/config.yaml)");

program.addCommand(storyboardCommand);
program.addCommand(imagesCommand);
program.addCommand(videosCommand);
program.addCommand(narrateCommand);
program.addCommand(mergeCommand);
program.addCommand(concatCommand);
program.addCommand(runCommand);
program.addCommand(batchCommand);
program.addCommand(doctorCommand);
program.addCommand(testClipCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
