/**
 * Configuration loader/saver for the reel CLI
 * Config stored at ~/.reelsmith/config.yaml
 */

import { resolve } from "node:path";
import { homedir } from "node:os";
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { parse, stringify } from "yaml";
import { ConfigurationError } from "@reelsmith/core";
import {
  configSchema,
  LLM_PROVIDERS,
  PROVIDER_ENV_VARS,
  type LLMProvider,
  type ProviderKey,
  type ReelsmithConfig,
} from "./schema.js";

/** Config directory path */
export const CONFIG_DIR = resolve(homedir(), ".reelsmith");

/** Config file path */
export const CONFIG_PATH = resolve(CONFIG_DIR, "config.yaml");

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Read ~/.reelsmith/config.yaml merged over defaults.
 * Returns null if the file doesn't exist; throws ConfigurationError if it is invalid.
 */
export async function readConfigFile(path: string = CONFIG_PATH): Promise<ReelsmithConfig | null> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }

  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Config file is not valid YAML: ${path}`,
      error instanceof Error ? error.message : undefined
    );
  }

  // An empty file parses to null
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid config file: ${path}`, issues.join("; "));
  }
  return parsed.data;
}

function isLLMProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

/**
 * Apply REELSMITH_* environment overrides
 */
export function applyEnvOverrides(
  config: ReelsmithConfig,
  env: NodeJS.ProcessEnv = process.env
): ReelsmithConfig {
  const next: ReelsmithConfig = { ...config, output: { ...config.output }, llm: { ...config.llm } };

  if (env.REELSMITH_OUTPUT_ROOT) {
    next.output.root = env.REELSMITH_OUTPUT_ROOT;
  }
  if (env.REELSMITH_LLM_PROVIDER) {
    const provider = env.REELSMITH_LLM_PROVIDER;
    if (!isLLMProvider(provider)) {
      throw new ConfigurationError(
        `Unknown REELSMITH_LLM_PROVIDER: ${provider}`,
        `Use one of: ${LLM_PROVIDERS.join(", ")}`
      );
    }
    next.llm.provider = provider;
  }
  if (env.REELSMITH_LLM_MODEL) {
    next.llm.model = env.REELSMITH_LLM_MODEL;
  }
  return next;
}

/**
 * Effective configuration: defaults, then the config file, then environment
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<ReelsmithConfig> {
  const fromFile = (await readConfigFile()) ?? configSchema.parse({});
  return applyEnvOverrides(fromFile, env);
}

type ConfigSection = Exclude<keyof ReelsmithConfig, "version">;

/** Per-command overrides; values are validated by the schema */
export type ConfigPatch = { [K in ConfigSection]?: { [P in keyof ReelsmithConfig[K]]?: unknown } };

function defined(values: Record<string, unknown> | undefined): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values ?? {}).filter(([, value]) => value !== undefined));
}

/**
 * Overlay command-line values on the loaded config. Undefined values keep
 * the configured setting.
 * @throws ConfigurationError when a value fails validation
 */
export function mergeConfig(config: ReelsmithConfig, patch: ConfigPatch): ReelsmithConfig {
  const raw = {
    ...config,
    output: { ...config.output, ...defined(patch.output) },
    llm: { ...config.llm, ...defined(patch.llm) },
    image: { ...config.image, ...defined(patch.image) },
    video: { ...config.video, ...defined(patch.video) },
    narration: { ...config.narration, ...defined(patch.narration) },
    assembly: { ...config.assembly, ...defined(patch.assembly) },
    resources: { ...config.resources, ...defined(patch.resources) },
    providers: { ...config.providers, ...defined(patch.providers) },
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError("Invalid option value", issues.join("; "));
  }
  return parsed.data;
}

/**
 * Save configuration to ~/.reelsmith/config.yaml
 */
export async function saveConfig(config: ReelsmithConfig): Promise<void> {
  await mkdir(CONFIG_DIR, { recursive: true });

  const content = stringify(config, {
    indent: 2,
    lineWidth: 0, // Don't wrap lines
  });

  await writeFile(CONFIG_PATH, content, "utf-8");
}

/**
 * Credential lookup: explicit option, then config file, then environment
 */
export function resolveCredential(
  key: ProviderKey,
  config: ReelsmithConfig,
  optionValue?: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (optionValue) return optionValue;
  const fromConfig = config.providers[key];
  if (fromConfig) return fromConfig;
  const fromEnv = env[PROVIDER_ENV_VARS[key]];
  return fromEnv ? fromEnv : undefined;
}

// Re-export types
export type { ReelsmithConfig, LLMProvider, ProviderKey, EncodingPresetName } from "./schema.js";
export { createDefaultConfig, configSchema, PROVIDER_ENV_VARS, DEFAULT_OLLAMA_MODEL } from "./schema.js";
