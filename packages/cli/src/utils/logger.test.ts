import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import chalk from "chalk";
import { ConsoleLogger } from "./logger.js";

describe("ConsoleLogger", () => {
  let dir: string;

  beforeEach(async () => {
    chalk.level = 0;
    dir = await mkdtemp(join(tmpdir(), "reelsmith-logger-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("should hide debug output unless verbose", () => {
    new ConsoleLogger().debug("cache hit");
    expect(console.log).not.toHaveBeenCalled();

    new ConsoleLogger({ verbose: true }).debug("cache hit");
    expect(console.log).toHaveBeenCalledWith("cache hit");
  });

  it("should fix verbosity at construction", () => {
    const logger = new ConsoleLogger({ verbose: false });
    expect("setVerbose" in logger).toBe(false);
    logger.debug("cache hit");
    expect(console.log).not.toHaveBeenCalled();
  });

  it("should append every level to the attached file", async () => {
    const logger = new ConsoleLogger();
    const path = join(dir, "logs", "pipeline.log");
    logger.attachFile(path);

    logger.debug("Scene 1 prompt: espresso");
    logger.warn("Attempt 1/3 failed: No JSON array found in model output");

    const lines = (await readFile(path, "utf-8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z DEBUG Scene 1 prompt: espresso$/);
    expect(lines[1]).toMatch(/ WARN  Attempt 1\/3 failed: No JSON array found in model output$/);
  });
});
