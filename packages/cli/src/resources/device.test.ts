import { describe, it, expect } from "vitest";
import type { ProcessRunner } from "../media/gateway.js";
import { NullDevice, NvidiaSmiDevice, NVIDIA_SMI_ARGS, VirtualDevice, createDevice, parseNvidiaSmi } from "./device.js";

function smiRunner(stdout: string | Error, onPath = true): ProcessRunner & { calls: string[][] } {
  const calls: string[][] = [];
  return {
    calls,
    resolve: async (cmd) => (onPath ? `/usr/bin/${cmd}` : null),
    exec: async (cmd, args) => {
      calls.push([cmd, ...args]);
      if (stdout instanceof Error) throw stdout;
      return { stdout, stderr: "" };
    },
    spawn: async () => {},
  };
}

describe("parseNvidiaSmi", () => {
  it("should convert the first GPU's MiB figures to GB", () => {
    expect(parseNvidiaSmi("24576, 1024, 23552\n8192, 0, 8192\n")).toEqual({
      available: true,
      totalGb: 24,
      reservedGb: 1,
      allocatedGb: 1,
      freeGb: 23,
    });
  });

  it("should return undefined for unreadable output", () => {
    expect(parseNvidiaSmi("")).toBeUndefined();
    expect(parseNvidiaSmi("[N/A], [N/A], [N/A]")).toBeUndefined();
  });
});

describe("NvidiaSmiDevice", () => {
  it("should query nvidia-smi for memory", async () => {
    const runner = smiRunner("16384, 4096, 12288");
    const snapshot = await new NvidiaSmiDevice(runner).snapshot();

    expect(runner.calls[0]).toEqual(["nvidia-smi", ...NVIDIA_SMI_ARGS]);
    expect(snapshot.freeGb).toBe(12);
  });

  it("should report unavailable when nvidia-smi fails", async () => {
    const snapshot = await new NvidiaSmiDevice(smiRunner(new Error("NVIDIA-SMI has failed"))).snapshot();
    expect(snapshot.available).toBe(false);
  });
});

describe("VirtualDevice", () => {
  it("should keep released memory allocated until collected", async () => {
    const device = new VirtualDevice(16);
    const id = device.allocate(6);
    device.share(1);
    expect(await device.snapshot()).toEqual({ available: true, totalGb: 16, allocatedGb: 7, reservedGb: 7, freeGb: 9 });

    device.release(id);
    expect((await device.snapshot()).allocatedGb).toBe(7);

    await device.collect();
    expect(await device.snapshot()).toMatchObject({ allocatedGb: 1, reservedGb: 7, freeGb: 15 });

    await device.releaseCached();
    expect((await device.snapshot()).reservedGb).toBe(1);

    await device.releaseShared();
    expect(await device.snapshot()).toMatchObject({ allocatedGb: 0, reservedGb: 0, freeGb: 16 });
  });

  it("should ignore unknown allocation ids", async () => {
    const device = new VirtualDevice(8);
    device.release(99);
    expect((await device.snapshot()).allocatedGb).toBe(0);
  });
});

describe("createDevice", () => {
  it("should return a null device when disabled", async () => {
    expect(await createDevice("none", smiRunner(""))).toBeInstanceOf(NullDevice);
  });

  it("should use nvidia-smi when it is on PATH", async () => {
    const device = await createDevice("auto", smiRunner("8192, 0, 8192"));
    expect(device.name).toBe("nvidia");
    expect((await device.snapshot()).totalGb).toBe(8);
  });

  it("should fall back to no accelerator without nvidia-smi", async () => {
    const device = await createDevice("nvidia", smiRunner("", false));
    expect(device.name).toBe("none");
    expect((await device.snapshot()).available).toBe(false);
  });
});
