/**
 * @module resources/lifecycle
 * @description Keeps at most one large model resident at a time.
 *
 * Stages that load a model run inside {@link ResourceLifecycleManager.scoped};
 * whatever happens inside, held models are unloaded and memory is reclaimed
 * before the next stage starts.
 */

import { ResourceExhaustedError, errorMessage, type Logger } from "@reelsmith/core";
import type { AcceleratorDevice, ResourceSnapshot } from "./device.js";

/** A model that occupies accelerator memory until unloaded */
export interface ResidentModel {
  name: string;
  unload(): Promise<void>;
}

export interface ResourceScope {
  /** Register a model to unload when the scope exits */
  hold(model: ResidentModel): void;
}

export interface CleanupReport {
  before: ResourceSnapshot;
  after: ResourceSnapshot;
  freedGb: number;
}

const OOM_PATTERN = /out of memory|\bOOM\b|CUDA error: out of memory|insufficient memory|failed to allocate/i;

export function isOutOfMemoryError(error: unknown): boolean {
  return OOM_PATTERN.test(errorMessage(error));
}

function formatSnapshot(s: ResourceSnapshot): string {
  if (!s.available) return "no accelerator";
  return `${s.allocatedGb.toFixed(2)}GB allocated, ${s.reservedGb.toFixed(2)}GB reserved, ${s.freeGb.toFixed(2)}GB free of ${s.totalGb.toFixed(2)}GB`;
}

export class ResourceLifecycleManager {
  constructor(
    private readonly device: AcceleratorDevice,
    private readonly logger: Logger,
    private readonly runtimeGc: () => void = defaultGc
  ) {}

  getSnapshot(): Promise<ResourceSnapshot> {
    return this.device.snapshot();
  }

  /**
   * Garbage collection, then cached blocks, then shared handles.
   */
  async forceCleanup(): Promise<CleanupReport> {
    const before = await this.device.snapshot();

    this.runtimeGc();
    await this.device.collect();
    await this.device.releaseCached();
    await this.device.releaseShared();

    const after = await this.device.snapshot();
    const freedGb = Math.max(0, Math.round((before.reservedGb - after.reservedGb) * 1000) / 1000);
    this.logger.debug(`Cleanup freed ${freedGb.toFixed(2)}GB (${formatSnapshot(after)})`);
    return { before, after, freedGb };
  }

  async checkAvailability(requiredGb: number): Promise<boolean> {
    if (requiredGb <= 0) return true;
    const snapshot = await this.device.snapshot();
    if (!snapshot.available) return false;
    if (snapshot.freeGb < requiredGb) {
      this.logger.warn(
        `Insufficient accelerator memory: need ${requiredGb.toFixed(2)}GB, ${snapshot.freeGb.toFixed(2)}GB free`
      );
      return false;
    }
    return true;
  }

  /**
   * Throws ResourceExhaustedError when a model of `requiredGb` would not fit.
   * Skipped entirely on machines without an accelerator.
   */
  async ensureAvailable(requiredGb: number, name: string): Promise<void> {
    if (requiredGb <= 0) return;
    const snapshot = await this.device.snapshot();
    if (!snapshot.available) {
      this.logger.debug(`No accelerator detected; not checking memory for ${name}`);
      return;
    }
    if (!(await this.checkAvailability(requiredGb))) {
      throw new ResourceExhaustedError(`Not enough accelerator memory to load ${name}`, {
        requiredGb,
        freeGb: snapshot.freeGb,
      });
    }
  }

  async scoped<T>(name: string, fn: (scope: ResourceScope) => Promise<T>): Promise<T> {
    const held: ResidentModel[] = [];
    this.logger.debug(`[${name}] enter: ${formatSnapshot(await this.device.snapshot())}`);

    try {
      return await fn({ hold: (model) => held.push(model) });
    } finally {
      for (const model of held.reverse()) {
        try {
          await model.unload();
        } catch (error) {
          this.logger.warn(`[${name}] failed to unload ${model.name}: ${errorMessage(error)}`);
        }
      }
      try {
        const { after } = await this.forceCleanup();
        this.logger.debug(`[${name}] exit: ${formatSnapshot(after)}`);
      } catch (error) {
        this.logger.warn(`[${name}] cleanup failed: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * Out-of-memory failures become ResourceExhaustedError after a cleanup;
   * anything else propagates unchanged.
   */
  async guardOutOfMemory<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (!isOutOfMemoryError(error)) throw error;
      try {
        await this.forceCleanup();
      } catch (cleanupError) {
        this.logger.warn(`Cleanup after out-of-memory failed: ${errorMessage(cleanupError)}`);
      }
      throw new ResourceExhaustedError(`Out of accelerator memory during ${label}`, { cause: error });
    }
  }
}

/** `global.gc` is only exposed with --expose-gc */
function defaultGc(): void {
  const gc: unknown = Reflect.get(globalThis, "gc");
  if (typeof gc === "function") gc();
}
