/**
 * @relayarr/core
 * 
 * Job reconciliation core containing:
 * - Data model (jobs, link states, releases)
 * - Protocol state machine and link-state aggregation
 * - Job Registry with per-job serialization
 * - Job stores (memory, JSON file)
 * - State Reconciler and its background poller
 * - Process health monitor
 * - Error taxonomy
 */

// State machine
export {
  isValidTransition,
  isTerminal,
  transitionJob,
} from './stateMachine.js';

// Types
export {
  PROTOCOL_STATES,
  EMPTY_PROGRESS,
} from './types/job.js';

export type {
  ProtocolState,
  LinkStateClass,
  ExternalHandle,
  ExternalLinkState,
  LinkProgress,
  Job,
  JobProgress,
  JobStateTransition,
  JobFilter,
  SubmissionRequest,
  SubmissionResult,
  SubmissionOutcome,
} from './types/job.js';

export type {
  MediaKind,
  LinkVerdict,
  CandidateLink,
  VerifiedCandidate,
  SyntheticRelease,
  QueryContext,
} from './types/release.js';

export type {
  DownloadBridge,
  BridgeSubmission,
} from './types/bridge.js';

// Identity
export { deriveReleaseId, normalizeLinks, isReleaseId } from './identity.js';

// Storage
export { MemoryJobStore, type JobStore } from './db/jobStore.js';
export { JsonFileJobStore } from './db/jsonFileJobStore.js';

// Services
export {
  JobRegistry,
  type JobRegistryOptions,
  type Observation,
  type CommitResult,
} from './services/jobRegistry.js';
export {
  HealthMonitor,
  type HealthComponent,
  type ComponentStatus,
  type ComponentHealth,
  type RecoveryProbe,
} from './services/healthMonitor.js';

// Reconciliation
export { aggregateLinkStates } from './reconciler/aggregate.js';
export {
  StateReconciler,
  type ReconcileOutcome,
  type StateReconcilerOptions,
} from './reconciler/stateReconciler.js';
export {
  ReconcilerPoller,
  type PollerOptions,
  type TickSummary,
} from './reconciler/poller.js';

// Errors
export {
  RelayError,
  TransientProviderError,
  DeadLinkError,
  NoValidLinksError,
  ExternalEngineUnavailableError,
  AuthenticationError,
  InvalidRequestError,
  StateTransitionError,
  NotFoundError,
} from './errors/index.js';
