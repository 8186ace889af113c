/**
 * Release Types
 * 
 * Candidates found at the provider, verified candidates, and the
 * synthetic releases built from them for the search protocol.
 */

export type MediaKind = 'movie' | 'tv' | 'music';

export type LinkVerdict = 'live' | 'dead' | 'unknown';

/**
 * One provider download link. Immutable once discovered.
 */
export interface CandidateLink {
  readonly url: string;
  /** links sharing a key belong to the same release (multi-part uploads) */
  readonly releaseKey: string;
  readonly source: string;
  readonly title: string;
  readonly year?: number;
  readonly quality: string;
  readonly audioLanguages: readonly string[];
  readonly subtitles: readonly string[];
  /** bytes as declared by the provider, 0 when unknown */
  readonly sizeEstimate: number;
  readonly nfo?: string;
  readonly season?: number;
  readonly episode?: number;
  readonly publishedAt?: Date;
  readonly providerLinkId?: string;
}

export interface VerifiedCandidate {
  readonly candidate: CandidateLink;
  readonly verdict: LinkVerdict;
  readonly verifiedAt: Date;
}

export interface SyntheticRelease {
  readonly id: string;
  /** title clients parse; carries no host */
  readonly title: string;
  /** title with the hosting service appended */
  readonly displayTitle: string;
  readonly category: number;
  readonly size: number;
  readonly publishedAt: Date;
  readonly links: readonly string[];
  readonly source: string;
}

export interface QueryContext {
  mediaKind: MediaKind;
  query: string;
  season?: number;
  episode?: number;
  /** categories requested by the client */
  categories?: readonly number[];
}
