import { chromium, Browser, BrowserContext } from 'playwright-core';
import { env } from './config';
import { CrawlError, CrawlErrorType, describeError } from './errors';
import { Fetcher, FetchResult } from './fetcher';

export interface BrowserFetcherOptions {
  userAgent?: string;
  timeout?: number; // navigation timeout, ms
  pageLoadWait?: number; // extra settle time after DOMContentLoaded, ms
  executablePath?: string;
  fallback?: Fetcher; // used when rendering a page fails
  signal?: AbortSignal; // closes the page being rendered
}

/**
 * Renders pages in headless Chromium so script-built content is in the HTML.
 * The browser is launched on first use and released by close().
 */
export class BrowserFetcher implements Fetcher {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private options: BrowserFetcherOptions;

  constructor(options: BrowserFetcherOptions = {}) {
    this.options = options;
  }

  private async getContext(): Promise<BrowserContext> {
    if (this.context) return this.context;

    console.log('Launching headless browser for JavaScript rendering...');
    this.browser = await chromium.launch({
      headless: true,
      timeout: this.options.timeout ?? env.BROWSER_TIMEOUT,
      ...(this.options.executablePath !== undefined ? { executablePath: this.options.executablePath } : {}),
    });
    this.context = await this.browser.newContext({ userAgent: this.options.userAgent ?? env.USER_AGENT });
    return this.context;
  }

  async fetch(url: string): Promise<FetchResult> {
    try {
      return await this.render(url);
    } catch (error) {
      if (!this.options.fallback || this.options.signal?.aborted) {
        throw error;
      }
      console.warn(`  Browser fetch failed (${describeError(error)}), falling back to request`);
      return this.options.fallback.fetch(url);
    }
  }

  private async render(url: string): Promise<FetchResult> {
    const { signal } = this.options;
    if (signal?.aborted) {
      throw new CrawlError(CrawlErrorType.FETCH_FAILURE, 'Rendering aborted', { url });
    }

    const context = await this.getContext();
    const page = await context.newPage();
    // Closing the page makes a pending navigation reject
    const onAbort = (): void => {
      page.close().catch((e: unknown) => console.warn(`  Error closing page: ${describeError(e)}`));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const response = await page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.options.timeout ?? env.BROWSER_TIMEOUT,
      });
      if (!response) {
        throw new CrawlError(CrawlErrorType.FETCH_FAILURE, 'Browser returned no response', { url });
      }

      await page.waitForTimeout(this.options.pageLoadWait ?? env.PAGE_LOAD_WAIT);

      const html = await page.content();
      return {
        status: response.status(),
        finalUrl: page.url(),
        contentType: response.headers()['content-type'] ?? 'text/html',
        body: html,
      };
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await page.close();
    }
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.context = null;
    if (browser) {
      await browser.close();
      console.log('Browser closed successfully.');
    }
    await this.options.fallback?.close?.();
  }
}
