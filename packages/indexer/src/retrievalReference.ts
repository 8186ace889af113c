/**
 * Retrieval references
 * 
 * A release's download link carries everything the queue side needs to
 * create the job, so a grab never calls back into the provider. The
 * reference is base64url-encoded JSON.
 */

import { z } from 'zod';
import { InvalidRequestError, isReleaseId, type SyntheticRelease } from '@relayarr/core';

const referenceSchema = z.object({
  id: z.string().refine(isReleaseId, 'not a release id'),
  title: z.string().min(1),
  links: z.array(z.string().url()).min(1),
  size: z.number().int().nonnegative().default(0),
  source: z.string().optional(),
});

export type RetrievalReference = z.infer<typeof referenceSchema>;

export function referenceFor(release: SyntheticRelease): RetrievalReference {
  return {
    id: release.id,
    title: release.title,
    links: [...release.links],
    size: release.size,
    source: release.source,
  };
}

export function encodeReference(reference: RetrievalReference): string {
  return Buffer.from(JSON.stringify(reference), 'utf8').toString('base64url');
}

/**
 * Throws InvalidRequestError for anything that is not a reference we
 * issued
 */
export function decodeReference(encoded: string): RetrievalReference {
  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(encoded.trim(), 'base64url').toString('utf8'));
  } catch {
    throw new InvalidRequestError('reference', 'not a base64url JSON document');
  }

  const parsed = referenceSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidRequestError('reference', parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', '));
  }
  return parsed.data;
}

/**
 * Pull a reference out of an `addurl` name: either a URL carrying an
 * `id` query parameter, or the bare reference
 */
export function referenceFromUrl(value: string): string {
  const trimmed = value.trim();
  if (!/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }

  let id: string | null;
  try {
    id = new URL(trimmed).searchParams.get('id');
  } catch {
    throw new InvalidRequestError('name', 'malformed URL');
  }
  if (!id) {
    throw new InvalidRequestError('name', 'URL carries no id parameter');
  }
  return id;
}

const LINK_DATA_PATTERN = /<meta type="link_data">([^<]+)<\/meta>/;

/**
 * Pull a reference out of an uploaded NZB document
 */
export function referenceFromNzb(document: string): string {
  const match = LINK_DATA_PATTERN.exec(document);
  if (!match?.[1]) {
    throw new InvalidRequestError('nzbfile', 'no link_data in NZB');
  }
  return match[1].trim();
}
