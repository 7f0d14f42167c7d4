/**
 * @module resources/device
 * @description Accelerator memory accounting behind the lifecycle manager.
 */

import type { ProcessRunner } from "../media/gateway.js";
import type { AcceleratorMode } from "../config/schema.js";

export interface ResourceSnapshot {
  available: boolean;
  totalGb: number;
  /** Allocated plus cached by the runtime */
  reservedGb: number;
  allocatedGb: number;
  /** `totalGb - allocatedGb` */
  freeGb: number;
}

export interface AcceleratorDevice {
  readonly name: string;
  snapshot(): Promise<ResourceSnapshot>;
  /** Return garbage blocks to the runtime's cache */
  collect(): Promise<void>;
  /** Hand cached blocks back to the driver */
  releaseCached(): Promise<void>;
  /** Drop inter-process shared handles */
  releaseShared(): Promise<void>;
}

const UNAVAILABLE: ResourceSnapshot = { available: false, totalGb: 0, reservedGb: 0, allocatedGb: 0, freeGb: 0 };

const roundGb = (gb: number): number => Math.round(gb * 1000) / 1000;

/** No accelerator present */
export class NullDevice implements AcceleratorDevice {
  readonly name = "none";

  async snapshot(): Promise<ResourceSnapshot> {
    return { ...UNAVAILABLE };
  }

  async collect(): Promise<void> {}
  async releaseCached(): Promise<void> {}
  async releaseShared(): Promise<void> {}
}

export const NVIDIA_SMI_ARGS = ["--query-gpu=memory.total,memory.used,memory.free", "--format=csv,noheader,nounits"];

/**
 * First GPU's memory from `nvidia-smi` CSV output (MiB), in GB.
 * Returns undefined for output it cannot read.
 */
export function parseNvidiaSmi(stdout: string): ResourceSnapshot | undefined {
  const line = stdout.split("\n").find((l) => l.trim().length > 0);
  if (!line) return undefined;
  const [total, used, free] = line.split(",").map((v) => Number.parseFloat(v.trim()));
  if (![total, used, free].every(Number.isFinite)) return undefined;
  return {
    available: true,
    totalGb: roundGb(total / 1024),
    reservedGb: roundGb(used / 1024),
    allocatedGb: roundGb(used / 1024),
    freeGb: roundGb(free / 1024),
  };
}

/**
 * Reads device memory through nvidia-smi. Memory is owned by the model
 * processes, so the release operations have nothing to do in-process.
 */
export class NvidiaSmiDevice implements AcceleratorDevice {
  readonly name = "nvidia";

  constructor(
    private readonly runner: ProcessRunner,
    private readonly command = "nvidia-smi"
  ) {}

  async snapshot(): Promise<ResourceSnapshot> {
    try {
      const { stdout } = await this.runner.exec(this.command, NVIDIA_SMI_ARGS);
      return parseNvidiaSmi(stdout) ?? { ...UNAVAILABLE };
    } catch {
      return { ...UNAVAILABLE };
    }
  }

  async collect(): Promise<void> {}
  async releaseCached(): Promise<void> {}
  async releaseShared(): Promise<void> {}
}

/**
 * In-process model of a caching allocator: live allocations, released
 * blocks still awaiting collection, cached blocks and shared handles.
 */
export class VirtualDevice implements AcceleratorDevice {
  readonly name = "virtual";

  private allocations = new Map<number, number>();
  private garbageGb = 0;
  private cachedGb = 0;
  private sharedGb = 0;
  private nextId = 1;

  constructor(readonly totalGb: number) {}

  /** Returns an allocation id */
  allocate(gb: number): number {
    const id = this.nextId++;
    this.allocations.set(id, gb);
    return id;
  }

  /** Mark an allocation unreachable; it stays counted until collected */
  release(id: number): void {
    const gb = this.allocations.get(id);
    if (gb === undefined) return;
    this.allocations.delete(id);
    this.garbageGb += gb;
  }

  share(gb: number): void {
    this.sharedGb += gb;
  }

  async snapshot(): Promise<ResourceSnapshot> {
    let live = 0;
    for (const gb of this.allocations.values()) live += gb;
    const allocatedGb = roundGb(live + this.garbageGb + this.sharedGb);
    return {
      available: true,
      totalGb: this.totalGb,
      allocatedGb,
      reservedGb: roundGb(allocatedGb + this.cachedGb),
      freeGb: roundGb(this.totalGb - allocatedGb),
    };
  }

  async collect(): Promise<void> {
    this.cachedGb += this.garbageGb;
    this.garbageGb = 0;
  }

  async releaseCached(): Promise<void> {
    this.cachedGb = 0;
  }

  async releaseShared(): Promise<void> {
    this.sharedGb = 0;
  }
}

/** `auto` picks nvidia when nvidia-smi is on PATH */
export async function createDevice(mode: AcceleratorMode, runner: ProcessRunner): Promise<AcceleratorDevice> {
  if (mode === "none") return new NullDevice();
  const smi = await runner.resolve("nvidia-smi");
  if (smi) return new NvidiaSmiDevice(runner, smi);
  return new NullDevice();
}
