import { describe, it, expect } from 'vitest';
import { aggregateLinkStates } from './aggregate.js';
import type { LinkStateClass, ProtocolState } from '../types/job.js';

describe('aggregateLinkStates', () => {
  const cases: Array<[LinkStateClass[], ProtocolState]> = [
    [[], 'queued'],
    [['active', 'pending'], 'downloading'],
    [['active', 'failure'], 'downloading'],
    [['extracting', 'success'], 'extracting'],
    [['extracting', 'active'], 'downloading'],
    [['success', 'success'], 'completed'],
    [['success'], 'completed'],
    [['failure', 'success'], 'failed'],
    [['failure', 'unknown'], 'failed'],
    [['failure', 'pending'], 'queued'],
    [['pending', 'unknown'], 'queued'],
    [['success', 'pending'], 'queued'],
    [['unknown'], 'queued'],
  ];

  it.each(cases)('%j aggregates to %s', (states, expected) => {
    expect(aggregateLinkStates(states)).toBe(expected);
  });
});
