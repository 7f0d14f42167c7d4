import type { MediaResult } from "@reelsmith/ai-providers";
import { GenerationError } from "@reelsmith/core";

/**
 * Bytes of a successful generation, downloading them when the provider
 * only returned a URL. Throws GenerationError otherwise.
 */
export async function resultBytes(result: MediaResult, what: string): Promise<Buffer> {
  if (!result.success) {
    throw new GenerationError(result.error ?? `${what} generation failed`);
  }
  if (result.buffer) return result.buffer;
  if (!result.url) {
    throw new GenerationError(`${what} generation returned no data`);
  }

  const response = await fetch(result.url);
  if (!response.ok) {
    throw new GenerationError(`Failed to download ${what} (${response.status})`);
  }
  return Buffer.from(await response.arrayBuffer());
}
