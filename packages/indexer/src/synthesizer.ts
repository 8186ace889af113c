/**
 * Result Synthesizer
 * 
 * Turns verified candidates into protocol-facing releases. Candidates
 * sharing a release key form one release; only live links take part.
 * 
 * Everything here is deterministic so repeated searches yield the same
 * ids, titles, sizes and dates:
 * - id: hash of the sorted live link URLs
 * - title, category, size: from the first candidate of the group
 * - publication date: provider date, else the earliest verification time
 */

import {
  deriveReleaseId,
  normalizeLinks,
  type QueryContext,
  type SyntheticRelease,
  type VerifiedCandidate,
} from '@relayarr/core';
import { createLogger, type Logger } from '@relayarr/utils';
import { releaseCategory } from './categories.js';
import { buildReleaseTitle } from './releaseTitle.js';
import { releaseSize } from './size.js';

export class ResultSynthesizer {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger({ component: 'synthesizer' });
  }

  synthesize(context: QueryContext, verified: readonly VerifiedCandidate[]): SyntheticRelease[] {
    const groups = new Map<string, VerifiedCandidate[]>();
    for (const vc of verified) {
      if (vc.verdict !== 'live') {
        continue;
      }
      const group = groups.get(vc.candidate.releaseKey);
      if (group) {
        group.push(vc);
      } else {
        groups.set(vc.candidate.releaseKey, [vc]);
      }
    }

    const releases: SyntheticRelease[] = [];
    const seen = new Set<string>();

    for (const group of groups.values()) {
      const release = this.buildRelease(context, group);
      if (!release || seen.has(release.id)) {
        continue;
      }
      seen.add(release.id);
      releases.push(release);
    }

    this.logger.debug(
      { query: context.query, kind: context.mediaKind, candidates: verified.length, releases: releases.length },
      'Releases synthesized'
    );
    return releases;
  }

  private buildRelease(context: QueryContext, group: readonly VerifiedCandidate[]): SyntheticRelease | null {
    const [first] = group;
    if (!first) {
      return null;
    }

    const lead = first.candidate;
    const links = normalizeLinks(group.map(vc => vc.candidate.url));
    const { title, displayTitle } = buildReleaseTitle(lead, context.mediaKind);
    const verifiedAt = Math.min(...group.map(vc => vc.verifiedAt.getTime()));

    return {
      id: deriveReleaseId(links),
      title,
      displayTitle,
      category: releaseCategory(lead.quality, context.mediaKind),
      size: releaseSize(lead, context.mediaKind),
      publishedAt: lead.publishedAt ?? new Date(verifiedAt),
      links,
      source: lead.source,
    };
  }
}
