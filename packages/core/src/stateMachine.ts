/**
 * Job State Machine
 * 
 * Legal moves between protocol states.
 * 
 * State Flow:
 * queued ⇄ downloading ⇄ extracting → completed
 *        ↘ failed (from any live state)
 * completed / failed → deleted (explicit removal only)
 * 
 * Rules:
 * - Live states move freely among themselves as engine observations change
 * - completed, failed and deleted are terminal
 * - The only way out of a terminal state is deletion from completed/failed
 */

import { StateTransitionError } from './errors/index.js';
import type { Job, JobStateTransition, ProtocolState } from './types/job.js';

const validTransitions: Record<ProtocolState, Set<ProtocolState>> = {
  queued: new Set<ProtocolState>([
    'downloading',
    'extracting',
    'completed',
    'failed',
    'deleted',
  ]),
  downloading: new Set<ProtocolState>([
    'queued',
    'extracting',
    'completed',
    'failed',
    'deleted',
  ]),
  extracting: new Set<ProtocolState>([
    'queued',
    'downloading',
    'completed',
    'failed',
    'deleted',
  ]),
  completed: new Set<ProtocolState>(['deleted']),
  failed: new Set<ProtocolState>(['deleted']),
  deleted: new Set<ProtocolState>([]),
};

const TERMINAL_STATES: ReadonlySet<ProtocolState> = new Set(['completed', 'failed', 'deleted']);

/** Keep the tail of the transition log bounded */
const MAX_HISTORY = 20;

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: ProtocolState, to: ProtocolState): boolean {
  return validTransitions[from].has(to);
}

export function isTerminal(state: ProtocolState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Return a copy of `job` moved to `to`, with the transition recorded.
 * Throws StateTransitionError when the move is not allowed.
 */
export function transitionJob(
  job: Job,
  to: ProtocolState,
  at: Date,
  reason?: string
): Job {
  if (!isValidTransition(job.state, to)) {
    throw new StateTransitionError(job.id, job.state, to);
  }

  const transition: JobStateTransition = {
    from: job.state,
    to,
    timestamp: at,
    reason,
  };

  return {
    ...job,
    state: to,
    updatedAt: at,
    completedAt: to === 'completed' ? at : job.completedAt,
    history: [...job.history, transition].slice(-MAX_HISTORY),
  };
}
