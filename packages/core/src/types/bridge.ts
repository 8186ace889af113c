/**
 * Download Bridge contract
 * 
 * Everything the reconciliation engine knows about the external download
 * engine goes through this interface.
 */

import type { ExternalHandle, ExternalLinkState } from './job.js';

export interface BridgeSubmission {
  jobId: string;
  title: string;
  label: string;
  links: readonly string[];
  destination: string;
}

export interface DownloadBridge {
  /**
   * Register links with the engine. Throws ExternalEngineUnavailableError
   * once retries are exhausted, AuthenticationError on rejected credentials.
   */
  submit(submission: BridgeSubmission): Promise<ExternalHandle[]>;

  /**
   * One state per handle, in handle order. Never throws for transport
   * failures: unreachable handles come back as `stale`.
   */
  poll(handles: readonly ExternalHandle[]): Promise<ExternalLinkState[]>;

  cancel(handle: ExternalHandle): Promise<void>;
}
