import { writeFile } from "node:fs/promises";
import type { PipelineManifest, SceneAssetStore } from "@reelsmith/core";

/**
 * Write a run manifest. Each run id is written once; an existing file is an
 * error rather than being replaced.
 */
export async function writeManifest(store: SceneAssetStore, manifest: PipelineManifest): Promise<string> {
  await store.ensureDir("manifests");
  const path = store.manifestPath(manifest.runId);
  await writeFile(path, JSON.stringify(manifest, null, 2) + "\n", { encoding: "utf-8", flag: "wx" });
  return path;
}
