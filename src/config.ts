import * as dotenv from 'dotenv';
import { CrawlError, CrawlErrorType } from './errors';
import { CrawlRequest, ResolvedCrawlRequest } from './types';

dotenv.config();

export const env = {
  USER_AGENT:
    process.env.USER_AGENT ||
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
  HTTP_TIMEOUT: parseInt(process.env.HTTP_TIMEOUT || '15000', 10),
  BROWSER_TIMEOUT: parseInt(process.env.BROWSER_TIMEOUT || '30000', 10),
  PAGE_LOAD_WAIT: parseInt(process.env.PAGE_LOAD_WAIT || '3000', 10), // ms to let scripts settle
  AWS_REGION: process.env.AWS_REGION || 'eu-central-1',
};

export const DEFAULT_MAX_DEPTH = 10;
export const DEFAULT_MAX_PAGES = 1000;
export const DEFAULT_DELAY_MS = 1000;

function requireCount(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new CrawlError(CrawlErrorType.CONFIGURATION, `${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

/**
 * Fill in defaults and validate a crawl request before any crawling starts.
 */
export function resolveCrawlRequest(request: CrawlRequest): ResolvedCrawlRequest {
  if (!request.url || request.url.trim() === '') {
    throw new CrawlError(CrawlErrorType.CONFIGURATION, 'A root URL is required');
  }

  const excludePatterns = request.excludePatterns ?? [];
  for (const pattern of excludePatterns) {
    try {
      new RegExp(pattern);
    } catch (e) {
      throw new CrawlError(CrawlErrorType.CONFIGURATION, `Invalid exclude pattern: ${pattern}`, { cause: e });
    }
  }

  const delayMs = request.delayMs ?? DEFAULT_DELAY_MS;
  if (!Number.isFinite(delayMs) || delayMs < 0) {
    throw new CrawlError(CrawlErrorType.CONFIGURATION, `delay must be a non-negative number, got ${delayMs}`);
  }

  return {
    url: request.url.trim(),
    maxDepth: requireCount('maxDepth', request.maxDepth ?? DEFAULT_MAX_DEPTH),
    maxPages: requireCount('maxPages', request.maxPages ?? DEFAULT_MAX_PAGES),
    delayMs,
    respectRobots: request.respectRobots ?? true,
    ignoreQueryParams: request.ignoreQueryParams ?? true,
    useSitemap: request.useSitemap ?? true,
    userAgent: request.userAgent ?? env.USER_AGENT,
    excludePatterns,
    guessCommonPaths: request.guessCommonPaths ?? false,
    verbose: request.verbose ?? false,
  };
}
