/**
 * Engine status normalization
 * 
 * Maps JDownloader package names and status text onto the engine-neutral
 * link-state alphabet.
 */

import type { LinkStateClass } from '@relayarr/core';
import type { JdPackage, PackageList } from '../clients/jdownloader.js';

/** characters JDownloader rewrites in package names */
const NAME_REPLACEMENTS: ReadonlyArray<[string, string]> = [
  [':', ';'],
  ['/', '⁄'],
  ['\\', ''],
  ['*', ''],
  ['?', ''],
  ['"', "'"],
  ['<', '('],
  ['>', ')'],
  ['|', '-'],
];

export function normalizePackageName(name: string): string {
  let normalized = name;
  for (const [from, to] of NAME_REPLACEMENTS) {
    normalized = normalized.split(from).join(to);
  }
  return normalized.trim();
}

const FAILURE_KEYWORDS = ['offline', 'error', 'fail', 'not found', 'abort'];

export interface ClassifiedPackage {
  native: string;
  state: LinkStateClass;
}

/**
 * Classify one package. Failure keywords win over flags, then extraction,
 * then the finished and running flags, then queue wording.
 */
export function classifyPackage(pkg: JdPackage, list: PackageList): ClassifiedPackage {
  const native = pkg.status ?? (pkg.finished ? 'Finished' : pkg.running ? 'Running' : '');
  const text = native.toLowerCase();

  if (list === 'linkgrabber') {
    return { native: native || 'Link grabber', state: 'pending' };
  }

  if (FAILURE_KEYWORDS.some(keyword => text.includes(keyword))) {
    return { native, state: 'failure' };
  }
  if (text.includes('extract') && !text.includes('ok')) {
    return { native, state: 'extracting' };
  }
  if (pkg.finished) {
    return { native, state: 'success' };
  }
  if (pkg.running) {
    return { native, state: 'active' };
  }
  if (text === '' || text.includes('queue') || text.includes('wait')) {
    return { native: native || 'Queued', state: 'pending' };
  }
  return { native, state: 'unknown' };
}
