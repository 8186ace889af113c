/**
 * Job Store
 * 
 * Holds the current snapshot of every job. Jobs are immutable values: a
 * write replaces the stored object, so anything handed to a reader stays
 * consistent however long it is kept.
 */

import type { Job } from '../types/job.js';

export interface JobStore {
  /** Populate from durable storage, if any */
  load(): Promise<number>;
  get(id: string): Job | undefined;
  all(): Job[];
  put(job: Job): Promise<void>;
  remove(id: string): Promise<boolean>;
  clear(): Promise<number>;
}

export class MemoryJobStore implements JobStore {
  protected readonly jobs = new Map<string, Job>();

  constructor(initial: readonly Job[] = []) {
    for (const job of initial) {
      this.jobs.set(job.id, job);
    }
  }

  async load(): Promise<number> {
    return this.jobs.size;
  }

  get(id: string): Job | undefined {
    return this.jobs.get(id);
  }

  all(): Job[] {
    return Array.from(this.jobs.values());
  }

  async put(job: Job): Promise<void> {
    this.jobs.set(job.id, job);
    await this.persist();
  }

  async remove(id: string): Promise<boolean> {
    const removed = this.jobs.delete(id);
    if (removed) {
      await this.persist();
    }
    return removed;
  }

  async clear(): Promise<number> {
    const count = this.jobs.size;
    this.jobs.clear();
    await this.persist();
    return count;
  }

  /** Hook for durable subclasses */
  protected async persist(): Promise<void> {
    return;
  }
}
