/**
 * @module assets/store
 * @description Per-topic directory layout for every pipeline artifact.
 *
 * The existence of a scene's output file is that scene's checkpoint, so all
 * writes go to a `.partial` sibling first and are renamed into place.
 */

import { access, mkdir, readdir, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join, resolve } from "node:path";
import { slugifyTopic } from "./slug.js";

export const ASSET_KINDS = ["scripts", "images", "clips", "audio", "merged", "final", "manifests", "logs"] as const;

export type AssetKind = (typeof ASSET_KINDS)[number];

export interface SceneAssetStoreOptions {
  /** Output root; each topic gets a directory below it */
  root: string;
  /** Topic text or an existing slug */
  topic: string;
  /** Per-kind directory overrides (e.g. from --input/--output flags) */
  overrides?: Partial<Record<AssetKind, string>>;
}

const SCENE_ID_PATTERN = /scene[_-]?(\d+)/i;
const VARIANT_PATTERN = /var[_-]?(\d+)/i;

export function padSceneId(id: number): string {
  return String(id).padStart(2, "0");
}

/** Numeric scene id from a filename, e.g. `scene_03_var_01.png` → 3 */
export function sceneIdFromFilename(filename: string): number | undefined {
  const match = SCENE_ID_PATTERN.exec(basename(filename));
  return match ? Number.parseInt(match[1], 10) : undefined;
}

function variantFromFilename(filename: string): number {
  const match = VARIANT_PATTERN.exec(basename(filename));
  return match ? Number.parseInt(match[1], 10) : 0;
}

/** Variant number first, then name */
function compareVariants(a: string, b: string): number {
  const diff = variantFromFilename(a) - variantFromFilename(b);
  return diff !== 0 ? diff : a.localeCompare(b);
}

export class SceneAssetStore {
  readonly root: string;
  readonly topic: string;
  readonly slug: string;
  private readonly overrides: Partial<Record<AssetKind, string>>;

  constructor(options: SceneAssetStoreOptions) {
    this.root = resolve(options.root);
    this.topic = options.topic;
    this.slug = slugifyTopic(options.topic);
    this.overrides = options.overrides ?? {};
  }

  /** Copy of this store with some directories redirected */
  withOverrides(overrides: Partial<Record<AssetKind, string>>): SceneAssetStore {
    const merged = { ...this.overrides };
    for (const kind of ASSET_KINDS) {
      const dir = overrides[kind];
      if (dir) merged[kind] = dir;
    }
    return new SceneAssetStore({ root: this.root, topic: this.topic, overrides: merged });
  }

  get topicDir(): string {
    return join(this.root, this.slug);
  }

  dir(kind: AssetKind): string {
    const override = this.overrides[kind];
    return override ? resolve(override) : join(this.topicDir, kind);
  }

  storyboardPath(): string {
    return join(this.dir("scripts"), `${this.slug}_scenes.json`);
  }

  imagePath(sceneId: number, variant: number): string {
    return join(this.dir("images"), `scene_${padSceneId(sceneId)}_var_${padSceneId(variant)}.png`);
  }

  clipPath(sceneId: number): string {
    return join(this.dir("clips"), `scene_${padSceneId(sceneId)}.mp4`);
  }

  audioPath(sceneId: number): string {
    return join(this.dir("audio"), `scene_${padSceneId(sceneId)}.mp3`);
  }

  mergedPath(sceneId: number): string {
    return join(this.dir("merged"), `scene_${padSceneId(sceneId)}_final.mp4`);
  }

  finalPath(): string {
    return join(this.dir("final"), `${this.slug}_complete.mp4`);
  }

  manifestPath(runId: string): string {
    return join(this.dir("manifests"), `${runId}.json`);
  }

  logPath(): string {
    return join(this.dir("logs"), "pipeline.log");
  }

  async ensureDir(kind: AssetKind): Promise<string> {
    const dir = this.dir(kind);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Scene files of one kind grouped by scene id, ascending. Files without a
   * scene id and in-progress `.partial` files are ignored.
   * Returns undefined when the directory does not exist.
   */
  async listSceneFiles(kind: AssetKind, extensions: readonly string[]): Promise<Map<number, string[]> | undefined> {
    const dir = this.dir(kind);
    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }

    const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
    const groups = new Map<number, string[]>();
    for (const entry of entries) {
      if (entry.includes(".partial.")) continue;
      if (!wanted.has(extname(entry).toLowerCase())) continue;
      const sceneId = sceneIdFromFilename(entry);
      if (sceneId === undefined) continue;
      const group = groups.get(sceneId) ?? [];
      group.push(join(dir, entry));
      groups.set(sceneId, group);
    }

    const sorted = new Map<number, string[]>();
    for (const id of [...groups.keys()].sort((a, b) => a - b)) {
      sorted.set(id, (groups.get(id) ?? []).sort(compareVariants));
    }
    return sorted;
  }

  /** `clip.mp4` → `clip.partial.mp4` */
  static partialPath(target: string): string {
    const ext = extname(target);
    return join(dirname(target), `${basename(target, ext)}.partial${ext}`);
  }

  /** Write via a partial file and rename into place */
  async writeAtomic(target: string, data: string | Uint8Array): Promise<void> {
    await mkdir(dirname(target), { recursive: true });
    const partial = SceneAssetStore.partialPath(target);
    try {
      await writeFile(partial, data);
      await rename(partial, target);
    } catch (error) {
      await rm(partial, { force: true });
      throw error;
    }
  }

  /**
   * Run a producer that writes to the partial path itself (e.g. ffmpeg),
   * then commit the result.
   */
  async commitFrom<T>(target: string, produce: (partialPath: string) => Promise<T>): Promise<T> {
    await mkdir(dirname(target), { recursive: true });
    const partial = SceneAssetStore.partialPath(target);
    try {
      const result = await produce(partial);
      await rename(partial, target);
      return result;
    } catch (error) {
      await rm(partial, { force: true });
      throw error;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
