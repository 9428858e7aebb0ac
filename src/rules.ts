/**
 * Heuristic rule tables.
 * Ordered lists consulted by the extractors; earlier entries win.
 */

import { PageType } from './types';

export interface PageTypeRule {
  type: PageType;
  matches: (path: string) => boolean;
}

const pathMatches = (pattern: RegExp) => (path: string) => pattern.test(path);

export const PAGE_TYPE_RULES: readonly PageTypeRule[] = [
  { type: 'homepage', matches: (path) => path === '' || path === '/' },
  { type: 'about', matches: pathMatches(/\/(about|about-us)\/?$/i) },
  { type: 'contact', matches: pathMatches(/\/(contact|contact-us)\/?$/i) },
  { type: 'blog_index', matches: pathMatches(/\/blog\/?$/i) },
  { type: 'blog_post', matches: pathMatches(/\/blog\/|\/news\/|\/article\/|\/post\//i) },
  { type: 'product_index', matches: pathMatches(/\/(product|products)\/?$/i) },
  { type: 'product_detail', matches: pathMatches(/\/(product|products)\/[^/]+\/?$/i) },
];

// Tested against path + query of a normalized URL
export const EXCLUDED_URL_PATTERNS: readonly RegExp[] = [
  /\.(jpg|jpeg|png|gif|svg|webp|pdf|doc|docx|xls|xlsx|zip|tar|gz|mp3|mp4|avi|mov)$/i,
  /(logout|signout|login|signin|cart|checkout|wp-admin|wp-content|feed)/i,
  /(#.*$)/,
];

export const CONTENT_WRAPPER_SELECTORS: readonly string[] = [
  'main',
  'article',
  'section',
  'div.content',
  'div.main',
  'div.post',
  'div#content',
  'div#main',
  'div.entry',
  '.post-content',
  '.entry-content',
  '.article-content',
  '.content-area',
];

export const NOISE_TAGS = 'nav, header, footer';
export const NOISE_CLASS_PATTERN = /nav|menu|footer|header|sidebar|widget/i;
export const NAVIGATION_LIST_CLASS_PATTERN = /nav|menu/;

// Anchors some site builders wrap links in
export const BUILDER_LINK_SELECTOR = '[data-testid="linkElement"]';

// Below this many links the raw markup is also scanned for site URLs
export const FEW_LINKS_THRESHOLD = 5;

export const COMMON_PATHS: readonly string[] = ['about', 'about-us', 'contact', 'services', 'products', 'blog'];
