/**
 * Collaborator contracts
 * 
 * The search side depends on these interfaces only; concrete adapters
 * live under clients/.
 */

import type { CandidateLink, QueryContext, VerifiedCandidate } from '@relayarr/core';

/**
 * Finds candidate links for a query. Throws TransientProviderError for
 * network trouble and AuthenticationError for rejected credentials.
 */
export interface ContentDiscoveryClient {
  discover(context: QueryContext): Promise<CandidateLink[]>;
}

export type TitleIdentifier =
  | { kind: 'imdb'; id: string }
  | { kind: 'tmdb'; id: string; mediaKind: 'movie' | 'tv' }
  | { kind: 'tvdb'; id: string };

/**
 * Maps catalog identifiers to the canonical title the provider indexes.
 * Resolves to null when the identifier is unknown.
 */
export interface TitleResolver {
  resolve(identifier: TitleIdentifier): Promise<string | null>;
}

/**
 * Opaque authenticated session, consumed by the provider client
 */
export interface ProviderSession {
  /** value for the Cookie header */
  cookieHeader: string;
  /** extra headers the provider expects on API calls */
  headers: Record<string, string>;
  expiresAt: Date;
}

export interface SessionSupplier {
  /** current session, established or refreshed as needed */
  session(): Promise<ProviderSession>;
  /** drop the cached session so the next call starts over */
  invalidate(): void;
}

export interface CandidateVerifier {
  verifyAll(candidates: readonly CandidateLink[]): Promise<VerifiedCandidate[]>;
}
