/**
 * Release Identity
 * 
 * Synthetic ids are a content hash of the link set: order and duplicates
 * do not matter, any other difference changes the id.
 */

import { createHash } from 'node:crypto';

const ID_PREFIX = 'rly_';

/**
 * Trim, drop empties and duplicates, keep first-seen order
 */
export function normalizeLinks(links: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const link of links) {
    const url = link.trim();
    if (url.length === 0 || seen.has(url)) {
      continue;
    }
    seen.add(url);
    result.push(url);
  }

  return result;
}

export function deriveReleaseId(links: readonly string[]): string {
  const canonical = [...normalizeLinks(links)].sort().join('\n');
  const digest = createHash('sha256').update(canonical, 'utf8').digest('hex');
  return `${ID_PREFIX}${digest.slice(0, 32)}`;
}

export function isReleaseId(value: string): boolean {
  return /^rly_[0-9a-f]{32}$/.test(value);
}
