import { URL } from 'url';
import { resolveCrawlRequest } from './config';
import { SitemapSeeder } from './discovery';
import { CrawlError, CrawlErrorType, describeError, isCrawlError, toCrawlError } from './errors';
import { extractContent, parseHtml } from './extractor';
import { Fetcher, FetchResult } from './fetcher';
import { Frontier } from './frontier';
import { extractLinks } from './links';
import { RobotsGate } from './robots';
import { COMMON_PATHS } from './rules';
import { ResultStore } from './store';
import { CrawlRequest, CrawlResult, FrontierEntry, ResolvedCrawlRequest } from './types';
import { normalizeUrl, UrlScope } from './url';

export interface CrawlerDependencies {
  fetcher: Fetcher; // pages
  resourceFetcher?: Fetcher; // robots.txt and sitemaps; defaults to fetcher
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface CrawlOptions {
  signal?: AbortSignal;
}

/**
 * Resolves after ms, or straight away once the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

function isHtml(response: FetchResult): boolean {
  return response.contentType.toLowerCase().includes('text/html');
}

/**
 * Breadth-first crawl of one site. A Crawler runs once; create a new one per run.
 */
export class Crawler {
  private request: ResolvedCrawlRequest;
  private rootUrl: string;
  private frontier = new Frontier();
  private store = new ResultStore();
  private scope: UrlScope;
  private robots: RobotsGate;
  private seeder: SitemapSeeder;
  private fetcher: Fetcher;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private pagesProcessed = 0;
  private started = false;

  constructor(request: CrawlRequest, deps: CrawlerDependencies) {
    this.request = resolveCrawlRequest(request);

    try {
      this.rootUrl = normalizeUrl(this.request.url, { ignoreQueryParams: this.request.ignoreQueryParams });
    } catch (e) {
      throw new CrawlError(CrawlErrorType.CONFIGURATION, `Invalid root URL: ${this.request.url}`, { cause: e });
    }

    const resourceFetcher = deps.resourceFetcher ?? deps.fetcher;
    this.fetcher = deps.fetcher;
    this.sleep = deps.sleep ?? sleep;
    this.scope = new UrlScope(this.rootUrl, this.request.excludePatterns);
    this.robots = new RobotsGate(this.rootUrl, resourceFetcher, {
      enabled: this.request.respectRobots,
      userAgent: this.request.userAgent,
    });
    this.seeder = new SitemapSeeder(this.rootUrl, resourceFetcher, this.scope, {
      ignoreQueryParams: this.request.ignoreQueryParams,
      verbose: this.request.verbose,
    });
  }

  get root(): string {
    return this.rootUrl;
  }

  async crawl(options: CrawlOptions = {}): Promise<CrawlResult> {
    if (this.started) {
      throw new Error('Crawler instances are single-use; create a new Crawler for another run');
    }
    this.started = true;

    const { signal } = options;
    const { maxPages, maxDepth } = this.request;

    console.log(`Starting crawl of ${this.rootUrl}`);
    console.log(`Max pages: ${maxPages}, Max depth: ${maxDepth}`);

    this.frontier.push(this.rootUrl, 0);
    await this.robots.load();
    if (this.request.useSitemap) {
      await this.seeder.seed(this.frontier);
    }

    const delayMs = Math.max(this.request.delayMs, this.robots.crawlDelayMs() ?? 0);

    while (!this.frontier.isEmpty() && this.pagesProcessed < maxPages && !signal?.aborted) {
      const current = this.frontier.pop();
      if (!current) break;

      if (this.frontier.isVisited(current.url)) {
        continue;
      }

      if (!this.robots.canFetch(current.url)) {
        this.frontier.markVisited(current.url);
        this.debug(`  ${CrawlErrorType.POLICY_DENIED}: robots.txt disallows ${current.url}`);
        continue;
      }

      this.frontier.markVisited(current.url);

      try {
        console.log(`Crawling: ${current.url} (Depth: ${current.depth})`);
        if (await this.processEntry(current)) {
          this.pagesProcessed++;
        }
      } catch (error) {
        const crawlError = toCrawlError(error, current.url);
        if (!crawlError.recoverable) throw crawlError;
        // Cancelled request, not a broken page
        if (signal?.aborted) break;
        console.error(`  Skipping ${current.url}: ${describeError(crawlError)}`);
      }

      if (!this.frontier.isEmpty() && this.pagesProcessed < maxPages) {
        await this.sleep(delayMs, signal);
      }
    }

    const interrupted = signal?.aborted ?? false;
    if (interrupted) {
      console.log('Crawling interrupted.');
    }

    const visited = this.frontier.visitedUrls();
    console.log(
      `Crawling completed. Visited ${visited.length} pages, extracted content from ${this.store.size} pages.`
    );
    if (this.store.size === 0) {
      console.warn(
        'No content was extracted. Try adjusting the crawler settings or check if the website is accessible.'
      );
    }

    return {
      rootUrl: this.rootUrl,
      pages: this.store.snapshot(),
      visited,
      processedPages: this.pagesProcessed,
      interrupted,
    };
  }

  /**
   * Fetch, extract and expand one URL.
   * Returns true when the page was parsed and counts against maxPages.
   */
  private async processEntry({ url, depth }: FrontierEntry): Promise<boolean> {
    const response = await this.fetcher.fetch(url);

    if (response.status < 200 || response.status >= 300) {
      throw new CrawlError(CrawlErrorType.FETCH_FAILURE, `HTTP ${response.status}`, {
        url,
        statusCode: response.status,
      });
    }

    if (!isHtml(response)) {
      throw new CrawlError(
        CrawlErrorType.UNSUPPORTED_CONTENT_TYPE,
        `Non-HTML content type: ${response.contentType || 'unknown'}`,
        { url, statusCode: response.status }
      );
    }

    const finalUrl = normalizeUrl(response.finalUrl, { ignoreQueryParams: this.request.ignoreQueryParams });
    if (finalUrl !== url) {
      // The target is crawled on its own turn; the original is never extracted.
      console.log(`  Redirected to: ${finalUrl}`);
      if (this.scope.isInScope(finalUrl) && this.frontier.push(finalUrl, depth)) {
        this.debug(`  Queued redirect target ${finalUrl} (depth: ${depth})`);
      }
      return false;
    }

    const $ = parseHtml(response.body);

    const page = extractContent($, url);
    if (page.elements.length > 0) {
      this.store.add(page);
      console.log(`  Extracted ${page.elements.length} elements`);
    } else {
      console.log('  No content extracted');
    }

    const links = extractLinks($, url, depth, {
      maxDepth: this.request.maxDepth,
      ignoreQueryParams: this.request.ignoreQueryParams,
      scope: this.scope,
      isKnown: (candidate) => this.frontier.isKnown(candidate),
    });
    for (const link of links) {
      if (this.frontier.push(link.url, link.depth)) {
        this.debug(`    ${link.url} (depth: ${link.depth})`);
      }
    }

    if (links.length === 0 && url === this.rootUrl && this.request.guessCommonPaths) {
      this.queueCommonPaths(depth);
    }

    return true;
  }

  private queueCommonPaths(depth: number): void {
    if (depth >= this.request.maxDepth) return;

    console.warn('  WARNING: No links found on the homepage, trying common paths...');
    for (const path of COMMON_PATHS) {
      let guess: string;
      try {
        guess = normalizeUrl(new URL(path, this.rootUrl).href, { ignoreQueryParams: this.request.ignoreQueryParams });
      } catch (e) {
        if (!isCrawlError(e)) throw e;
        continue;
      }
      if (this.scope.isInScope(guess) && this.frontier.push(guess, depth + 1)) {
        console.log(`  Added common path: ${guess}`);
      }
    }
  }

  private debug(message: string): void {
    if (this.request.verbose) console.log(message);
  }
}
