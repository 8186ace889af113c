/**
 * Custom Error Classes
 * 
 * Every failure the engine raises on purpose extends RelayError so the
 * protocol layers can map `code` onto their own error conventions.
 */

import type { ProtocolState } from '../types/job.js';

/**
 * Base error class for all relayarr errors
 */
export class RelayError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Provider or probe network failure; retried, then absorbed
 */
export class TransientProviderError extends RelayError {
  constructor(operation: string, cause?: string) {
    super(
      `Provider call failed: ${operation}${cause ? ` (${cause})` : ''}`,
      'TRANSIENT_PROVIDER_ERROR',
      503,
      { operation, cause }
    );
    this.name = 'TransientProviderError';
  }
}

export class DeadLinkError extends RelayError {
  constructor(url: string) {
    super(`Link is dead: ${url}`, 'DEAD_LINK', 410, { url });
    this.name = 'DeadLinkError';
  }
}

/**
 * Submission whose candidate links all failed verification
 */
export class NoValidLinksError extends RelayError {
  constructor(jobId: string, checked: number) {
    super(
      `No valid links for ${jobId} (${checked} checked)`,
      'NO_VALID_LINKS',
      422,
      { jobId, checked }
    );
    this.name = 'NoValidLinksError';
  }
}

/**
 * The download engine could not be reached after retries
 */
export class ExternalEngineUnavailableError extends RelayError {
  constructor(operation: string, cause?: string) {
    super(
      `Download engine unavailable during ${operation}${cause ? `: ${cause}` : ''}`,
      'ENGINE_UNAVAILABLE',
      503,
      { operation, cause }
    );
    this.name = 'ExternalEngineUnavailableError';
  }
}

/**
 * Credentials rejected by the provider or the download engine.
 * Never retried.
 */
export class AuthenticationError extends RelayError {
  constructor(component: string, reason: string) {
    super(
      `Authentication failed for ${component}: ${reason}`,
      'AUTHENTICATION_FAILED',
      401,
      { component, reason }
    );
    this.name = 'AuthenticationError';
  }
}

/**
 * Malformed protocol request
 */
export class InvalidRequestError extends RelayError {
  constructor(field: string, message: string) {
    super(
      `Invalid request (${field}): ${message}`,
      'INVALID_REQUEST',
      400,
      { field, message }
    );
    this.name = 'InvalidRequestError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends RelayError {
  constructor(
    jobId: string,
    fromState: ProtocolState,
    toState: ProtocolState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      409,
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends RelayError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      404,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}
