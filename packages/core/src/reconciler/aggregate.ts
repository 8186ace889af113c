/**
 * Link State Aggregation
 * 
 * The one mapping from a job's per-link state classes to its protocol
 * state. Rules apply in order:
 * 
 * 1. any active                                   → downloading
 * 2. any extracting                               → extracting
 * 3. every link success (at least one link)       → completed
 * 4. any failure and nothing active or pending    → failed
 * 5. anything else                                → queued
 * 
 * A mix of successes and permanent failures is `failed`, but only once
 * no link can still make progress.
 */

import type { LinkStateClass, ProtocolState } from '../types/job.js';

export function aggregateLinkStates(states: readonly LinkStateClass[]): ProtocolState {
  if (states.length === 0) {
    return 'queued';
  }

  if (states.includes('active')) {
    return 'downloading';
  }

  if (states.includes('extracting')) {
    return 'extracting';
  }

  if (states.every(state => state === 'success')) {
    return 'completed';
  }

  if (states.includes('failure') && !states.includes('pending')) {
    return 'failed';
  }

  return 'queued';
}
