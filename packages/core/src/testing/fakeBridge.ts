/**
 * In-process Download Bridge for tests
 */

import type { BridgeSubmission, DownloadBridge } from '../types/bridge.js';
import type { ExternalHandle, ExternalLinkState, LinkProgress, LinkStateClass } from '../types/job.js';

export type FakeLinkState = LinkStateClass | 'stale';

export class FakeBridge implements DownloadBridge {
  readonly submissions: BridgeSubmission[] = [];
  readonly cancelled: ExternalHandle[] = [];
  pollCount = 0;

  /** handles created per submission */
  handlesPerSubmit = 1;
  submitError: Error | null = null;
  cancelError: Error | null = null;
  submitDelayMs = 0;
  /** when set, poll waits for it before answering */
  pollGate: Promise<void> | null = null;
  /** when set, cancel waits for it before removing anything */
  cancelGate: Promise<void> | null = null;

  private readonly states = new Map<string, FakeLinkState>();
  private readonly progress = new Map<string, LinkProgress>();

  async submit(submission: BridgeSubmission): Promise<ExternalHandle[]> {
    if (this.submitDelayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.submitDelayMs));
    }
    if (this.submitError) {
      throw this.submitError;
    }

    this.submissions.push(submission);
    const handles: ExternalHandle[] = [];
    for (let i = 0; i < this.handlesPerSubmit; i++) {
      const handle = { id: `${submission.jobId}-${i}`, name: `[${submission.label}] ${submission.title}` };
      this.states.set(handle.id, 'pending');
      handles.push(handle);
    }
    return handles;
  }

  async poll(handles: readonly ExternalHandle[]): Promise<ExternalLinkState[]> {
    this.pollCount++;
    if (this.pollGate) {
      await this.pollGate;
    }

    return handles.map((handle): ExternalLinkState => {
      const state = this.states.get(handle.id) ?? 'unknown';
      if (state === 'stale') {
        return { kind: 'stale', handle, reason: 'engine unreachable' };
      }
      return {
        kind: 'observed',
        handle,
        native: state,
        state,
        progress: this.progress.get(handle.id),
      };
    });
  }

  async cancel(handle: ExternalHandle): Promise<void> {
    if (this.cancelGate) {
      await this.cancelGate;
    }
    if (this.cancelError) {
      throw this.cancelError;
    }
    this.cancelled.push(handle);
  }

  setState(handleId: string, state: FakeLinkState): void {
    this.states.set(handleId, state);
  }

  setProgress(handleId: string, progress: LinkProgress): void {
    this.progress.set(handleId, progress);
  }
}
