/**
 * SABnzbd Routes
 *
 * Queue-protocol emulation for media managers configured with relayarr
 * as their download client. One endpoint, dispatched on `mode`:
 *
 * - version: no key required
 * - addurl / addfile: create a job from a retrieval reference
 * - queue / history: job listings, `name=delete` removes jobs
 * - get_config / config / fullstatus: static client settings
 *
 * Unknown modes are acknowledged with `{ status: true }`.
 */

import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import {
  AuthenticationError,
  ExternalEngineUnavailableError,
  InvalidRequestError,
  NoValidLinksError,
  type Job,
  type ProtocolState,
} from '@relayarr/core';
import { decodeReference, referenceFromNzb, referenceFromUrl } from '@relayarr/indexer';
import { GIB, KIB, MIB, formatClock, formatSize, toMegabytes } from '@relayarr/utils';
import type { QueueService } from '../services/queueService.js';

export const SABNZBD_VERSION = '4.2.1';

export interface SabnzbdOptions {
  queue: QueueService;
  labels: readonly string[];
  downloadRoot: string;
}

export type SabnzbdHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;

const sabQuerySchema = z.object({
  mode: z.string().default(''),
  cat: z.string().optional(),
  category: z.string().optional(),
  name: z.string().default(''),
  value: z.string().default(''),
  start: z.coerce.number().int().min(0).catch(0),
  limit: z.coerce.number().int().min(0).catch(100),
}).passthrough();

type SabQuery = z.infer<typeof sabQuerySchema>;

const SLOT_STATUS: Record<ProtocolState, string> = {
  queued: 'Queued',
  downloading: 'Downloading',
  extracting: 'Extracting',
  completed: 'Completed',
  failed: 'Failed',
  deleted: 'Deleted',
};

// ============================================
// Slot formatting
// ============================================

function jobSize(job: Job): number {
  return job.progress.bytesTotal || job.sizeHint;
}

function bytesLeft(job: Job): number {
  return Math.max(jobSize(job) - job.progress.bytesLoaded, 0);
}

function speedText(bytesPerSecond: number): string {
  return bytesPerSecond > 0 ? `${(bytesPerSecond / MIB).toFixed(2)} MB/s` : '0 B/s';
}

export function queueSlot(job: Job, index: number) {
  const total = jobSize(job);
  const left = bytesLeft(job);
  const percentage = total > 0 ? Math.min(100, Math.floor((job.progress.bytesLoaded / total) * 100)) : 0;

  return {
    index,
    nzo_id: job.id,
    filename: job.title,
    cat: job.label,
    status: SLOT_STATUS[job.state],
    percentage: String(percentage),
    mb: toMegabytes(total),
    mbleft: toMegabytes(left),
    size: formatSize(total),
    sizeleft: formatSize(left),
    timeleft: formatClock(job.progress.eta),
    eta: formatClock(job.progress.eta),
  };
}

export function historySlot(job: Job) {
  const total = jobSize(job);
  const completed = job.completedAt ?? job.updatedAt;

  return {
    nzo_id: job.id,
    name: job.title,
    category: job.label,
    status: job.state === 'completed' ? 'Completed' : 'Failed',
    bytes: total,
    size: formatSize(total),
    completed: Math.floor(completed.getTime() / 1000),
    storage: job.storagePath ?? job.destination,
    fail_message: job.error ?? '',
  };
}

function page<T>(items: readonly T[], start: number, limit: number): T[] {
  return limit > 0 ? items.slice(start, start + limit) : items.slice(start);
}

// ============================================
// Handler
// ============================================

/** Submission failures the client sees as `status: false` */
function isRejection(error: unknown): error is Error {
  return error instanceof InvalidRequestError
    || error instanceof NoValidLinksError
    || error instanceof AuthenticationError
    || error instanceof ExternalEngineUnavailableError;
}

export function createSabnzbdHandler(options: SabnzbdOptions): SabnzbdHandler {
  const { queue, labels, downloadRoot } = options;

  const categories = () => [
    { name: '*', order: 0, pp: '', script: 'None', dir: '', priority: -100 },
    ...labels.map((name, i) => ({ name, order: i + 1, pp: '', script: 'None', dir: name, priority: -100 })),
  ];

  const add = async (request: FastifyRequest, params: SabQuery, source: () => string) => {
    const label = params.category ?? params.cat ?? '';
    try {
      const reference = decodeReference(source());
      const result = await queue.addDownload(reference, label);
      return { status: result.accepted, nzo_ids: [result.jobId] };
    } catch (error) {
      if (isRejection(error)) {
        request.log.warn({ mode: params.mode, label, err: error }, 'Download rejected');
        return { status: false, error: error.message };
      }
      throw error;
    }
  };

  const remove = async (value: string) => {
    if (value === 'all') {
      await queue.removeAll();
      return { status: true };
    }
    const ids = value.split(',').map(id => id.trim()).filter(Boolean);
    for (const id of ids) {
      await queue.removeJob(id);
    }
    return { status: true, nzo_ids: ids };
  };

  return async (request, _reply) => {
    const params = sabQuerySchema.parse(request.query);
    const label = params.category ?? params.cat;

    if (params.mode === 'version') {
      return { version: SABNZBD_VERSION };
    }
    if (!request.server.hasApiKey(request)) {
      return { status: false, error: 'API Key Incorrect' };
    }

    // delete goes before the listings it piggybacks on
    if ((params.mode === 'queue' || params.mode === 'history') && params.name === 'delete') {
      return remove(params.value);
    }

    switch (params.mode) {
      case 'queue': {
        const jobs = queue.queueStatus({ label });
        const total = jobs.reduce((sum, job) => sum + jobSize(job), 0);
        const left = jobs.reduce((sum, job) => sum + bytesLeft(job), 0);
        const speed = jobs.reduce((sum, job) => sum + job.progress.speed, 0);
        const slots = page(jobs, params.start, params.limit).map((job, i) => queueSlot(job, params.start + i));

        return {
          queue: {
            status: jobs.some(job => job.state === 'downloading') ? 'Downloading' : 'Idle',
            paused: false,
            speedlimit: '0',
            speedlimit_abs: '0',
            speed: speedText(speed),
            kbpersec: speed > 0 ? (speed / KIB).toFixed(2) : '0',
            mb: toMegabytes(total),
            mbleft: toMegabytes(left),
            sizeleft: `${(left / GIB).toFixed(2)} GB`,
            noofslots_total: jobs.length,
            noofslots: slots.length,
            start: params.start,
            limit: params.limit,
            slots,
          },
        };
      }

      case 'history': {
        const jobs = queue.historyStatus({ label });
        const slots = page(jobs, params.start, params.limit).map(historySlot);
        return { history: { noofslots: jobs.length, slots } };
      }

      case 'addurl':
        if (!params.name) {
          return { status: false, error: 'expects one parameter' };
        }
        return add(request, params, () => referenceFromUrl(params.name));

      case 'addfile':
        return add(request, params, () => referenceFromNzb(typeof request.body === 'string' ? request.body : ''));

      case 'config':
      case 'get_config':
        return {
          config: {
            misc: { complete_dir: downloadRoot, download_dir: downloadRoot },
            categories: categories(),
          },
        };

      case 'fullstatus': {
        const speed = queue.queueStatus().reduce((sum, job) => sum + job.progress.speed, 0);
        return {
          status: {
            paused: false,
            diskspace1: '100.00',
            diskspace2: '100.00',
            speedlimit: '0',
            speed: speedText(speed),
          },
        };
      }

      default:
        request.log.debug({ mode: params.mode }, 'Unsupported SABnzbd mode');
        return { status: true };
    }
  };
}

export const sabnzbdRoutes: FastifyPluginAsync<{ handler: SabnzbdHandler }> = async (fastify, options) => {
  fastify.route({
    method: ['GET', 'POST'],
    url: '/api',
    handler: options.handler,
  });
};
