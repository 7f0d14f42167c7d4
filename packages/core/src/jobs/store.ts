/**
 * @module jobs/store
 * @description Status tracking for pipeline runs.
 *
 * The orchestrator only talks to the {@link JobStore} interface, so a
 * persistent store can replace the in-memory one without touching stages.
 */

import { randomUUID } from "node:crypto";

export type JobStatus = "queued" | "running" | "completed" | "failed" | "interrupted";

export interface JobRecord {
  id: string;
  topic: string;
  status: JobStatus;
  stage?: string;
  /** 0-100 */
  progress: number;
  message?: string;
  createdAt: string;
  updatedAt: string;
  /** Path of the final video once completed */
  result?: string;
}

export type JobPatch = Partial<Pick<JobRecord, "status" | "stage" | "progress" | "message" | "result">>;

export interface JobStore {
  create(input: { topic: string }): JobRecord;
  update(id: string, patch: JobPatch): JobRecord;
  get(id: string): JobRecord | undefined;
}

export class InMemoryJobStore implements JobStore {
  private jobs = new Map<string, JobRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  create(input: { topic: string }): JobRecord {
    const timestamp = this.now().toISOString();
    const job: JobRecord = {
      id: randomUUID(),
      topic: input.topic,
      status: "queued",
      progress: 0,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.jobs.set(job.id, job);
    return { ...job };
  }

  update(id: string, patch: JobPatch): JobRecord {
    const existing = this.jobs.get(id);
    if (!existing) {
      throw new Error(`Unknown job: ${id}`);
    }
    const progress = patch.progress === undefined ? existing.progress : Math.min(100, Math.max(0, patch.progress));
    const updated: JobRecord = {
      ...existing,
      ...patch,
      progress,
      updatedAt: this.now().toISOString(),
    };
    this.jobs.set(id, updated);
    return { ...updated };
  }

  get(id: string): JobRecord | undefined {
    const job = this.jobs.get(id);
    return job ? { ...job } : undefined;
  }
}
