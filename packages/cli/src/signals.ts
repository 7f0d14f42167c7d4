/**
 * Shared interrupt state between the SIGINT handler in index.ts and the
 * pipeline, checked between scenes and between stages.
 */

import { PipelineInterruptedError } from "@reelsmith/core";

export let interrupted = false;

export function setInterrupted(value: boolean): void {
  interrupted = value;
}

export function isInterrupted(): boolean {
  return interrupted;
}

/** Throws {@link PipelineInterruptedError} once an interrupt was requested */
export function throwIfInterrupted(check: () => boolean = isInterrupted): void {
  if (check()) {
    throw new PipelineInterruptedError();
  }
}
