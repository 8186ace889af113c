/**
 * JSON File Job Store
 * 
 * Keeps jobs in memory and mirrors every change to a single JSON file so
 * the queue and history survive restarts. Writes are serialized and go
 * through a temp file plus rename.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import pLimit from 'p-limit';
import { z } from 'zod';
import { createLogger, errorMessage } from '@relayarr/utils';
import { PROTOCOL_STATES, type Job } from '../types/job.js';
import { MemoryJobStore } from './jobStore.js';

const logger = createLogger({ component: 'job-store' });

const stateSchema = z.enum(PROTOCOL_STATES);

const jobSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  label: z.string(),
  links: z.array(z.string()),
  destination: z.string(),
  handles: z.array(z.object({ id: z.string(), name: z.string() })),
  state: stateSchema,
  awaitingSubmission: z.boolean().default(false),
  sizeHint: z.number().nonnegative().default(0),
  progress: z.object({
    bytesLoaded: z.number(),
    bytesTotal: z.number(),
    speed: z.number(),
    eta: z.number(),
  }),
  storagePath: z.string().optional(),
  error: z.string().optional(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  completedAt: z.coerce.date().optional(),
  history: z.array(z.object({
    from: stateSchema,
    to: stateSchema,
    timestamp: z.coerce.date(),
    reason: z.string().optional(),
  })).default([]),
});

const fileSchema = z.object({
  version: z.literal(1),
  jobs: z.array(z.unknown()),
});

export class JsonFileJobStore extends MemoryJobStore {
  private readonly writer = pLimit(1);

  constructor(private readonly filePath: string) {
    super();
  }

  /**
   * Read the snapshot file. Entries that fail validation are skipped; a
   * missing file means an empty store.
   */
  override async load(): Promise<number> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info({ path: this.filePath }, 'No job snapshot found, starting empty');
        return 0;
      }
      throw error;
    }

    const file = fileSchema.parse(JSON.parse(raw));
    this.jobs.clear();

    for (const entry of file.jobs) {
      const parsed = jobSchema.safeParse(entry);
      if (!parsed.success) {
        logger.warn({ issues: parsed.error.issues.length }, 'Skipping invalid job entry');
        continue;
      }
      const job: Job = parsed.data;
      this.jobs.set(job.id, job);
    }

    logger.info({ path: this.filePath, count: this.jobs.size }, 'Jobs loaded');
    return this.jobs.size;
  }

  /** Resolves once every queued write has reached the disk */
  async flush(): Promise<void> {
    await this.writer(async () => undefined);
  }

  protected override async persist(): Promise<void> {
    const snapshot = JSON.stringify({ version: 1, jobs: this.all() }, null, 2);

    await this.writer(async () => {
      try {
        await mkdir(dirname(this.filePath), { recursive: true });
        const tmp = `${this.filePath}.tmp`;
        await writeFile(tmp, snapshot, 'utf8');
        await rename(tmp, this.filePath);
      } catch (error) {
        logger.error({ path: this.filePath, error: errorMessage(error) }, 'Failed to write job snapshot');
      }
    });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
