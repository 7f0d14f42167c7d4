import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import chalk from "chalk";
import type { Logger } from "@reelsmith/core";

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  /** Append plain timestamped lines to this file as well */
  logFile?: string;
}

/**
 * Coloured console logger for the CLI, with an optional plain-text log file.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private logFile?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.logFile = options.logFile;
  }

  /** Start (or move) the run log file */
  attachFile(path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    this.logFile = path;
  }

  debug(message: string): void {
    this.write("DEBUG", message);
    if (this.verbose) console.log(chalk.dim(message));
  }

  info(message: string): void {
    this.write("INFO", message);
    console.log(message);
  }

  warn(message: string): void {
    this.write("WARN", message);
    console.warn(chalk.yellow(message));
  }

  error(message: string): void {
    this.write("ERROR", message);
    console.error(chalk.red(message));
  }

  success(message: string): void {
    this.write("INFO", message);
    console.log(chalk.green(message));
  }

  private write(level: string, message: string): void {
    if (!this.logFile) return;
    appendFileSync(this.logFile, `${new Date().toISOString()} ${level.padEnd(5)} ${message}\n`, "utf-8");
  }
}
