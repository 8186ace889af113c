/**
 * Newznab wire format
 * 
 * XML documents served on the search side: capabilities, RSS result
 * feeds, error documents, and the NZB stub that carries a retrieval
 * reference to the queue side.
 */

import { formatRfc822 } from '@relayarr/utils';
import type { CategoryGroup } from './categories.js';

export const NEWZNAB_NAMESPACE = 'http://www.newznab.com/DTD/2010/feeds/attributes/';

export const NewznabErrorCode = {
  INCORRECT_CREDENTIALS: 100,
  MISSING_PARAMETER: 200,
  INCORRECT_PARAMETER: 201,
  NO_SUCH_FUNCTION: 203,
  NO_SUCH_ITEM: 300,
  UNKNOWN: 900,
} as const;

export type NewznabErrorCode = typeof NewznabErrorCode[keyof typeof NewznabErrorCode];

export interface SearchMode {
  name: 'search' | 'movie-search' | 'tv-search' | 'music-search';
  supportedParams: readonly string[];
}

export interface Capabilities {
  serverTitle: string;
  limits: { default: number; max: number };
  retentionDays: number;
  searchModes: readonly SearchMode[];
  categories: readonly CategoryGroup[];
}

export interface FeedItem {
  title: string;
  guid: string;
  link: string;
  publishedAt: Date;
  size: number;
  category: number;
  grabs?: number;
}

export interface Feed {
  title: string;
  description: string;
  link: string;
  offset: number;
  total: number;
  items: readonly FeedItem[];
}

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const XML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, ch => XML_ESCAPES[ch] ?? ch);
}

export function renderCaps(caps: Capabilities): string {
  const modes = caps.searchModes
    .map(mode => `    <${mode.name} available="yes" supportedParams="${mode.supportedParams.join(',')}"/>`)
    .join('\n');

  const categories = caps.categories
    .map(group => {
      const subcats = group.subcategories
        .map(sub => `      <subcat id="${sub.id}" name="${escapeXml(sub.name)}"/>`)
        .join('\n');
      return `    <category id="${group.id}" name="${escapeXml(group.name)}">\n${subcats}\n    </category>`;
    })
    .join('\n');

  return [
    XML_DECLARATION,
    '<caps>',
    `  <server title="${escapeXml(caps.serverTitle)}"/>`,
    `  <limits default="${caps.limits.default}" max="${caps.limits.max}"/>`,
    `  <retention days="${caps.retentionDays}"/>`,
    '  <registration available="no" open="no"/>',
    '  <searching>',
    modes,
    '  </searching>',
    '  <categories>',
    categories,
    '  </categories>',
    '</caps>',
  ].join('\n');
}

function renderItem(item: FeedItem): string {
  const link = escapeXml(item.link);
  return [
    '    <item>',
    `      <title>${escapeXml(item.title)}</title>`,
    `      <guid isPermaLink="false">${escapeXml(item.guid)}</guid>`,
    `      <link>${link}</link>`,
    `      <pubDate>${formatRfc822(item.publishedAt)}</pubDate>`,
    `      <enclosure url="${link}" length="${item.size}" type="application/x-nzb"/>`,
    `      <newznab:attr name="category" value="${item.category}"/>`,
    `      <newznab:attr name="size" value="${item.size}"/>`,
    `      <newznab:attr name="grabs" value="${item.grabs ?? 0}"/>`,
    '    </item>',
  ].join('\n');
}

export function renderFeed(feed: Feed): string {
  return [
    XML_DECLARATION,
    `<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom" xmlns:newznab="${NEWZNAB_NAMESPACE}">`,
    '  <channel>',
    `    <title>${escapeXml(feed.title)}</title>`,
    `    <description>${escapeXml(feed.description)}</description>`,
    `    <link>${escapeXml(feed.link)}</link>`,
    `    <newznab:response offset="${feed.offset}" total="${feed.total}"/>`,
    ...feed.items.map(renderItem),
    '  </channel>',
    '</rss>',
  ].join('\n');
}

export function renderError(code: NewznabErrorCode, description: string): string {
  return `${XML_DECLARATION}\n<error code="${code}" description="${escapeXml(description)}"/>`;
}

/**
 * NZB stub whose only payload is the retrieval reference
 */
export function renderNzb(reference: string, title: string): string {
  const ref = escapeXml(reference);
  return [
    XML_DECLARATION,
    '<!DOCTYPE nzb PUBLIC "-//newzBin//DTD NZB 1.1//EN" "http://www.newzbin.com/DTD/nzb/nzb-1.1.dtd">',
    '<nzb xmlns="http://www.newzbin.com/DTD/2003/nzb">',
    '  <head>',
    `    <meta type="name">${escapeXml(title)}</meta>`,
    `    <meta type="link_data">${ref}</meta>`,
    '  </head>',
    `  <file poster="relayarr" date="0" subject="${escapeXml(title)}">`,
    '    <groups><group>alt.binaries.relayarr</group></groups>',
    '    <segments>',
    `      <segment bytes="1" number="1">${ref}</segment>`,
    '    </segments>',
    '  </file>',
    '</nzb>',
  ].join('\n');
}
