/**
 * URL Normalization Utilities
 * Canonical keys for the frontier and the same-domain scope test
 */

import { URL } from 'url';
import { CrawlError, CrawlErrorType } from './errors';
import { EXCLUDED_URL_PATTERNS } from './rules';

export interface NormalizeOptions {
  ignoreQueryParams?: boolean;
}

const HAS_SCHEME = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Canonicalize a URL: default scheme, no trailing slash except for the root,
 * no fragment, and no query unless query parameters are respected.
 * Throws a MALFORMED_URL CrawlError when the input cannot be parsed.
 */
export function normalizeUrl(rawUrl: string, options: NormalizeOptions = {}): string {
  const ignoreQueryParams = options.ignoreQueryParams ?? true;
  let input = rawUrl.trim();

  if (!HAS_SCHEME.test(input)) {
    input = `http://${input}`;
  }

  let parsed: URL;
  try {
    parsed = new URL(input);
  } catch (e) {
    throw new CrawlError(CrawlErrorType.MALFORMED_URL, `Cannot parse URL: ${rawUrl}`, { url: rawUrl, cause: e });
  }

  if (!parsed.hostname) {
    throw new CrawlError(CrawlErrorType.MALFORMED_URL, `URL has no host: ${rawUrl}`, { url: rawUrl });
  }

  parsed.hash = '';
  if (ignoreQueryParams) {
    parsed.search = '';
  }

  let pathname = parsed.pathname;
  while (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }
  parsed.pathname = pathname || '/';

  return parsed.href;
}

/**
 * Host without a leading "www.", lower-cased. Empty for unparseable input.
 */
export function extractDomain(url: string): string {
  try {
    const host = new URL(url).host.toLowerCase();
    return host.startsWith('www.') ? host.substring(4) : host;
  } catch {
    return '';
  }
}

export function isSameDomain(url: string, rootUrl: string): boolean {
  const domain = extractDomain(url);
  return domain !== '' && domain === extractDomain(rootUrl);
}

/**
 * Decides which URLs belong to the crawl: http(s), same domain as the root,
 * and not matching any exclusion pattern.
 */
export class UrlScope {
  private patterns: RegExp[];

  constructor(
    private rootUrl: string,
    extraPatterns: readonly string[] = []
  ) {
    this.patterns = [...EXCLUDED_URL_PATTERNS, ...extraPatterns.map((p) => new RegExp(p, 'i'))];
  }

  isInScope(url: string): boolean {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;
    if (!isSameDomain(url, this.rootUrl)) return false;

    const target = `${parsed.pathname}${parsed.search}${parsed.hash}`;
    return !this.patterns.some((pattern) => pattern.test(target));
  }
}
