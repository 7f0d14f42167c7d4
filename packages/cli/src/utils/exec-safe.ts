import { execFile, spawn } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** Run without a shell; arguments are passed as an array */
export async function execSafe(
  cmd: string,
  args: string[],
  options?: { timeout?: number; maxBuffer?: number },
): Promise<{ stdout: string; stderr: string }> {
  return execFileAsync(cmd, args, {
    timeout: options?.timeout,
    maxBuffer: options?.maxBuffer ?? 50 * 1024 * 1024,
  });
}

/**
 * Absolute path of an executable on PATH, or null
 */
export async function resolveCommand(cmd: string): Promise<string | null> {
  try {
    const { stdout } = await execSafe("which", [cmd]);
    return stdout.trim().split("\n")[0] || null;
  } catch {
    try {
      const { stdout } = await execSafe("where", [cmd]);
      return stdout.trim().split(/\r?\n/)[0] || null;
    } catch {
      return null;
    }
  }
}

/** Non-zero exit of a spawned process; keeps the full stderr */
export class ProcessExitError extends Error {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, exitCode: number | null, stderr: string) {
    super(message);
    this.name = "ProcessExitError";
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/** `HH:MM:SS.ss` → seconds */
function parseTimestamp(hours: string, minutes: string, seconds: string): number {
  return parseInt(hours, 10) * 3600 + parseInt(minutes, 10) * 60 + parseFloat(seconds);
}

/**
 * Tracks ffmpeg's stderr to turn `Duration:` and `time=` lines into a percentage.
 * A `-t` limit on the output can be passed as the expected duration.
 */
export class FfmpegProgressParser {
  private duration: number;

  constructor(expectedDuration = 0) {
    this.duration = expectedDuration;
  }

  /** Feed a stderr chunk; returns a percentage when the chunk reports progress */
  push(chunk: string): number | undefined {
    if (this.duration <= 0) {
      const durationMatch = chunk.match(/Duration: (\d+):(\d+):(\d+\.\d+)/);
      if (durationMatch) {
        const [, hours, minutes, seconds] = durationMatch;
        this.duration = parseTimestamp(hours, minutes, seconds);
      }
    }

    const timeMatch = chunk.match(/time=(\d+):(\d+):(\d+\.\d+)/);
    if (timeMatch && this.duration > 0) {
      const [, hours, minutes, seconds] = timeMatch;
      const currentTime = parseTimestamp(hours, minutes, seconds);
      return Math.min(100, Math.round((currentTime / this.duration) * 100));
    }
    return undefined;
  }
}

/**
 * Spawn a long-running media process, reporting percentage progress parsed
 * from its stderr. Rejects with {@link ProcessExitError} on a non-zero exit.
 */
export function runWithProgress(
  cmd: string,
  args: string[],
  onProgress?: (percent: number) => void,
  expectedDuration?: number,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    const parser = new FfmpegProgressParser(expectedDuration);
    let stderr = "";

    child.stderr?.on("data", (data: Buffer) => {
      const output = data.toString();
      stderr += output;
      const percent = parser.push(output);
      if (percent !== undefined) {
        onProgress?.(percent);
      }
    });

    child.on("close", (code) => {
      if (code === 0) {
        resolve();
      } else {
        // Extract error message
        const errorMatch = stderr.match(/Error.*$/m);
        const errorMsg = errorMatch ? errorMatch[0] : `${cmd} exited with code ${code}`;
        reject(new ProcessExitError(errorMsg, code, stderr));
      }
    });

    child.on("error", (err) => {
      reject(err);
    });
  });
}
