import robotsParser from 'robots-parser';
import { URL } from 'url';
import { describeError } from './errors';
import { Fetcher } from './fetcher';

type RobotsPolicy = ReturnType<typeof robotsParser>;

export interface RobotsGateOptions {
  enabled: boolean;
  userAgent: string;
}

/**
 * robots.txt gate. Loaded once per crawl; a missing or unreachable
 * robots.txt means everything is allowed.
 */
export class RobotsGate {
  private policy: RobotsPolicy | null = null;
  private loaded = false;

  constructor(
    private rootUrl: string,
    private fetcher: Fetcher,
    private options: RobotsGateOptions
  ) {}

  get robotsUrl(): string {
    return new URL('/robots.txt', this.rootUrl).href;
  }

  async load(): Promise<void> {
    if (this.loaded || !this.options.enabled) return;
    this.loaded = true;

    try {
      const response = await this.fetcher.fetch(this.robotsUrl);
      if (response.status !== 200) {
        console.log(`No robots.txt at ${this.robotsUrl} (status code: ${response.status}), allowing all`);
        return;
      }
      this.policy = robotsParser(this.robotsUrl, response.body);
    } catch (e) {
      console.warn(`Warning: Could not read robots.txt: ${describeError(e)}`);
    }
  }

  canFetch(url: string): boolean {
    if (!this.options.enabled || !this.policy) return true;

    // Scope already limits the crawl to one site; an http/https or www. hop
    // must still be matched against the same rules.
    let target: string;
    try {
      const { pathname, search } = new URL(url);
      target = new URL(pathname + search, this.robotsUrl).href;
    } catch {
      return true;
    }
    return this.policy.isAllowed(target, this.options.userAgent) ?? true;
  }

  /**
   * Crawl-delay for our agent in milliseconds, if the policy sets one.
   */
  crawlDelayMs(): number | undefined {
    if (!this.options.enabled || !this.policy) return undefined;
    const seconds = this.policy.getCrawlDelay(this.options.userAgent);
    return seconds === undefined ? undefined : seconds * 1000;
  }
}
