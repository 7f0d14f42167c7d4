/**
 * @module media/command
 * @description Typed builder for ffmpeg argument vectors.
 *
 * Commands are always run without a shell, so the builder's job is to keep
 * arguments well-formed: paths are made absolute and must not be empty or
 * contain control characters, numbers must be finite, stream labels must
 * match ffmpeg's specifier syntax.
 */

import { isAbsolute, resolve } from "node:path";

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const STREAM_SPECIFIER = /^(\d+(:[vas](:\d+)?)?|\[[A-Za-z0-9_]+\])$/;

/** Absolute form of a media path; throws TypeError for unusable paths */
export function validateMediaPath(path: string, role = "path"): string {
  if (!path || !path.trim()) {
    throw new TypeError(`Media ${role} is empty`);
  }
  if (CONTROL_CHARS.test(path)) {
    throw new TypeError(`Media ${role} contains control characters: ${JSON.stringify(path)}`);
  }
  return isAbsolute(path) ? path : resolve(path);
}

export function validateNumber(value: number, name: string, options: { min?: number; integer?: boolean } = {}): number {
  if (!Number.isFinite(value)) {
    throw new TypeError(`${name} must be a finite number, got ${value}`);
  }
  if (options.integer && !Number.isInteger(value)) {
    throw new TypeError(`${name} must be an integer, got ${value}`);
  }
  if (options.min !== undefined && value < options.min) {
    throw new TypeError(`${name} must be >= ${options.min}, got ${value}`);
  }
  return value;
}

/** Seconds as ffmpeg accepts them, without float noise */
export function formatSeconds(seconds: number): string {
  return String(Number(validateNumber(seconds, "seconds", { min: 0 }).toFixed(3)));
}

interface InputSpec {
  options: string[];
  source: string;
}

export class FfmpegCommand {
  private inputs: InputSpec[] = [];
  private filterGraph?: string;
  private maps: string[] = [];
  private outputOptions: string[] = [];
  private outputPath?: string;
  private expectedDuration?: number;

  /** Add a file input. `streamLoop` is the number of extra playthroughs. */
  input(path: string, options: { streamLoop?: number; loop?: boolean; frameRate?: number } = {}): this {
    const opts: string[] = [];
    if (options.streamLoop !== undefined && options.streamLoop > 0) {
      opts.push("-stream_loop", String(validateNumber(options.streamLoop, "streamLoop", { min: 0, integer: true })));
    }
    if (options.loop) {
      opts.push("-loop", "1");
    }
    if (options.frameRate !== undefined) {
      opts.push("-framerate", String(validateNumber(options.frameRate, "frameRate", { min: 1 })));
    }
    this.inputs.push({ options: opts, source: validateMediaPath(path, "input") });
    return this;
  }

  /** Add a lavfi source such as `testsrc=duration=5:size=640x360:rate=24` */
  lavfi(source: string): this {
    if (!source || CONTROL_CHARS.test(source)) {
      throw new TypeError(`Invalid lavfi source: ${JSON.stringify(source)}`);
    }
    this.inputs.push({ options: ["-f", "lavfi"], source });
    return this;
  }

  get inputCount(): number {
    return this.inputs.length;
  }

  filterComplex(graph: string): this {
    if (CONTROL_CHARS.test(graph)) {
      throw new TypeError("Filter graph contains control characters");
    }
    this.filterGraph = graph;
    return this;
  }

  /** `0:v:0`, `1:a:0` or a filter label such as `[vout]` */
  map(specifier: string): this {
    if (!STREAM_SPECIFIER.test(specifier)) {
      throw new TypeError(`Invalid stream specifier: ${specifier}`);
    }
    this.maps.push("-map", specifier);
    return this;
  }

  videoCodec(codec: string): this {
    return this.option("-c:v", codec);
  }

  audioCodec(codec: string): this {
    return this.option("-c:a", codec);
  }

  /** libx264 speed preset and quality */
  x264(preset: string, crf: number): this {
    this.option("-c:v", "libx264");
    this.option("-preset", preset);
    return this.option("-crf", String(validateNumber(crf, "crf", { min: 0, integer: true })));
  }

  audioBitrate(bitrate: string): this {
    if (!/^\d+k$/.test(bitrate)) {
      throw new TypeError(`Invalid audio bitrate: ${bitrate}`);
    }
    return this.option("-b:a", bitrate);
  }

  pixelFormat(format: string): this {
    return this.option("-pix_fmt", format);
  }

  videoFilter(filter: string): this {
    if (CONTROL_CHARS.test(filter)) {
      throw new TypeError("Video filter contains control characters");
    }
    return this.option("-vf", filter);
  }

  /** Limit output length (-t) */
  duration(seconds: number): this {
    this.expectedDuration = seconds;
    return this.option("-t", formatSeconds(seconds));
  }

  /** Expected output length for progress reporting, without limiting it */
  expectDuration(seconds: number): this {
    this.expectedDuration = validateNumber(seconds, "expected duration", { min: 0 });
    return this;
  }

  frames(count: number): this {
    return this.option("-frames:v", String(validateNumber(count, "frames", { min: 1, integer: true })));
  }

  noVideo(): this {
    this.outputOptions.push("-vn");
    return this;
  }

  shortest(): this {
    this.outputOptions.push("-shortest");
    return this;
  }

  faststart(): this {
    return this.option("-movflags", "+faststart");
  }

  output(path: string): this {
    this.outputPath = validateMediaPath(path, "output");
    return this;
  }

  /** Output length when known, for progress reporting */
  get durationHint(): number | undefined {
    return this.expectedDuration;
  }

  build(): string[] {
    if (this.inputs.length === 0) {
      throw new TypeError("ffmpeg command has no inputs");
    }
    if (!this.outputPath) {
      throw new TypeError("ffmpeg command has no output");
    }

    const args = ["-hide_banner", "-y"];
    for (const input of this.inputs) {
      args.push(...input.options, "-i", input.source);
    }
    if (this.filterGraph) {
      args.push("-filter_complex", this.filterGraph);
    }
    args.push(...this.maps, ...this.outputOptions, this.outputPath);
    return args;
  }

  private option(flag: string, value: string): this {
    if (!value || CONTROL_CHARS.test(value)) {
      throw new TypeError(`Invalid value for ${flag}: ${JSON.stringify(value)}`);
    }
    this.outputOptions.push(flag, value);
    return this;
  }
}
