/**
 * Job Types
 * 
 * A Job tracks one submitted release from hand-off to the download
 * engine until a client removes it.
 */

export const PROTOCOL_STATES = [
  'queued',
  'downloading',
  'extracting',
  'completed',
  'failed',
  'deleted',
] as const;

/** State vocabulary of the download-queue protocol */
export type ProtocolState = typeof PROTOCOL_STATES[number];

/** Closed alphabet every native engine status is normalized into */
export type LinkStateClass =
  | 'pending'
  | 'active'
  | 'extracting'
  | 'success'
  | 'failure'
  | 'unknown';

/**
 * Engine-side reference to a tracked package. Opaque to everything but
 * the bridge that issued it.
 */
export interface ExternalHandle {
  id: string;
  name: string;
}

export interface LinkProgress {
  bytesLoaded: number;
  bytesTotal: number;
  /** bytes per second */
  speed: number;
  /** seconds, 0 when unknown */
  eta: number;
  saveTo?: string;
}

export type ExternalLinkState =
  | {
      kind: 'observed';
      handle: ExternalHandle;
      /** status text exactly as the engine reported it */
      native: string;
      state: LinkStateClass;
      progress?: LinkProgress;
    }
  | {
      kind: 'stale';
      handle: ExternalHandle;
      reason: string;
    };

export interface JobStateTransition {
  from: ProtocolState;
  to: ProtocolState;
  timestamp: Date;
  reason?: string;
}

export interface JobProgress {
  bytesLoaded: number;
  bytesTotal: number;
  speed: number;
  eta: number;
}

export interface Job {
  readonly id: string;
  readonly title: string;
  readonly label: string;
  readonly links: readonly string[];
  readonly destination: string;
  readonly handles: readonly ExternalHandle[];
  readonly state: ProtocolState;
  /** created but not yet accepted by the engine */
  readonly awaitingSubmission: boolean;
  readonly sizeHint: number;
  readonly progress: JobProgress;
  readonly storagePath?: string;
  readonly error?: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly completedAt?: Date;
  readonly history: readonly JobStateTransition[];
}

export interface SubmissionRequest {
  /** synthetic release id the client grabbed */
  releaseId: string;
  title: string;
  label: string;
  links: readonly string[];
  sizeHint?: number;
}

export type SubmissionOutcome = 'created' | 'existing' | 'resubmitted';

export interface SubmissionResult {
  job: Job;
  outcome: SubmissionOutcome;
}

export interface JobFilter {
  /** queue = non-terminal jobs, history = terminal jobs */
  view?: 'queue' | 'history';
  label?: string;
  includeDeleted?: boolean;
}

export const EMPTY_PROGRESS: JobProgress = {
  bytesLoaded: 0,
  bytesTotal: 0,
  speed: 0,
  eta: 0,
};
