/**
 * Link Extractor
 * Turns the anchors on a page into new frontier entries
 */

import * as cheerio from 'cheerio';
import { URL } from 'url';
import { isCrawlError } from './errors';
import { BUILDER_LINK_SELECTOR, FEW_LINKS_THRESHOLD } from './rules';
import { FrontierEntry } from './types';
import { extractDomain, normalizeUrl, UrlScope } from './url';

export interface LinkContext {
  maxDepth: number;
  ignoreQueryParams: boolean;
  scope: UrlScope;
  /** Visited or already queued */
  isKnown: (url: string) => boolean;
}

function isFollowableHref(href: string): boolean {
  return href !== '' && !href.toLowerCase().startsWith('javascript:') && !href.startsWith('#');
}

function collectHrefs($: cheerio.CheerioAPI): string[] {
  const hrefs: string[] = [];

  $('a[href]').each((_, el) => {
    hrefs.push(($(el).attr('href') ?? '').trim());
  });

  // Site builders put the href on a wrapper or on a nested anchor
  $(BUILDER_LINK_SELECTOR).each((_, el) => {
    const element = $(el);
    const href = element.attr('href') ?? element.find('a[href]').first().attr('href');
    if (href !== undefined) hrefs.push(href.trim());
  });

  return hrefs;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Absolute one-segment URLs on the page's own domain found anywhere in the
 * markup, inline scripts and data attributes included.
 */
export function scanForSiteUrls(html: string, pageUrl: string): string[] {
  const domain = extractDomain(pageUrl);
  if (domain === '') return [];

  const pattern = new RegExp(`https?://(?:www\\.)?${escapeRegExp(domain)}/[\\w-]+/?`, 'gi');
  return html.match(pattern) ?? [];
}

/**
 * Resolve a raw href against the page and canonicalize it.
 * Returns null for anything that is not a usable URL.
 */
export function resolveLink(href: string, pageUrl: string, ignoreQueryParams: boolean): string | null {
  if (!isFollowableHref(href)) return null;

  let absolute: URL;
  try {
    absolute = new URL(href, pageUrl);
  } catch {
    return null;
  }

  // mailto:, tel:, data: and friends
  if (absolute.protocol !== 'http:' && absolute.protocol !== 'https:') return null;

  try {
    return normalizeUrl(absolute.href, { ignoreQueryParams });
  } catch (e) {
    if (isCrawlError(e)) return null;
    throw e;
  }
}

export function extractLinks(
  $: cheerio.CheerioAPI,
  pageUrl: string,
  depth: number,
  context: LinkContext
): FrontierEntry[] {
  if (depth >= context.maxDepth) {
    return [];
  }

  const links: FrontierEntry[] = [];
  const seen = new Set<string>();

  const consider = (href: string): void => {
    const url = resolveLink(href, pageUrl, context.ignoreQueryParams);
    if (url === null || seen.has(url)) return;
    seen.add(url);

    if (!context.scope.isInScope(url) || context.isKnown(url)) return;

    links.push({ url, depth: depth + 1 });
  };

  collectHrefs($).forEach(consider);

  // Script-driven navigation leaves few anchors behind
  if (links.length < FEW_LINKS_THRESHOLD) {
    scanForSiteUrls($.html(), pageUrl).forEach(consider);
  }

  return links;
}
