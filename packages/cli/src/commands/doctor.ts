import { Command } from "commander";
import chalk from "chalk";
import { errorMessage } from "@reelsmith/core";
import { CONFIG_PATH, loadConfig, resolveCredential } from "../config/index.js";
import { PROVIDER_ENV_VARS, type ProviderKey, type ReelsmithConfig } from "../config/schema.js";
import { FFMPEG_INSTALL_HINT, MediaProcessGateway, systemRunner, type ProcessRunner } from "../media/gateway.js";
import { createDevice } from "../resources/device.js";
import { action } from "./command-helpers.js";

export interface Check {
  name: string;
  ok: boolean;
  detail: string;
  /** Failing checks that only limit some providers */
  optional?: boolean;
}

/** Credentials needed by the providers selected in the config */
export function requiredCredentials(config: ReelsmithConfig): ProviderKey[] {
  const keys: ProviderKey[] = [];
  if (config.llm.provider === "claude") keys.push("anthropic");
  if (config.image.provider === "stability") keys.push("stability");
  if (config.video.provider === "replicate") keys.push("replicate");
  if (config.narration.provider === "elevenlabs") keys.push("elevenlabs");
  return keys;
}

export async function runChecks(runner: ProcessRunner = systemRunner, env: NodeJS.ProcessEnv = process.env): Promise<Check[]> {
  const checks: Check[] = [];

  try {
    const gateway = await MediaProcessGateway.create(runner);
    checks.push({ name: "ffmpeg", ok: true, detail: await gateway.version() });
  } catch (error) {
    checks.push({ name: "ffmpeg", ok: false, detail: `${errorMessage(error)}. ${FFMPEG_INSTALL_HINT}` });
  }

  let config: ReelsmithConfig | undefined;
  try {
    config = await loadConfig(env);
    checks.push({ name: "config", ok: true, detail: CONFIG_PATH });
  } catch (error) {
    checks.push({ name: "config", ok: false, detail: errorMessage(error) });
  }

  if (config) {
    checks.push({
      name: "providers",
      ok: true,
      detail: `text ${config.llm.provider}, image ${config.image.provider}, video ${config.video.provider}, narration ${config.narration.provider}`,
    });
    for (const key of requiredCredentials(config)) {
      const present = resolveCredential(key, config, undefined, env) !== undefined;
      checks.push({
        name: key,
        ok: present,
        detail: present ? "credential found" : `missing; set ${PROVIDER_ENV_VARS[key]} or use --preview`,
        optional: true,
      });
    }

    const device = await createDevice(config.resources.accelerator, runner);
    const snapshot = await device.snapshot();
    checks.push({
      name: "accelerator",
      ok: true,
      detail: snapshot.available
        ? `${device.name}: ${snapshot.freeGb.toFixed(1)}GB free of ${snapshot.totalGb.toFixed(1)}GB`
        : "none detected (memory checks disabled)",
    });
  }

  return checks;
}

export const doctorCommand = new Command("doctor")
  .description("Check ffmpeg, configuration and credentials")
  .action(
    action<Record<string, never>>(async () => {
      console.log(chalk.bold.cyan("Environment"));
      console.log(chalk.dim("─".repeat(60)));

      const checks = await runChecks();
      for (const check of checks) {
        const mark = check.ok ? chalk.green("●") : check.optional ? chalk.yellow("○") : chalk.red("○");
        console.log(`${mark} ${chalk.bold(check.name.padEnd(12))} ${chalk.dim(check.detail)}`);
      }
      return checks.some((check) => !check.ok && !check.optional) ? 1 : 0;
    })
  );
