import { XMLParser } from 'fast-xml-parser';
import { URL } from 'url';
import { describeError, isCrawlError } from './errors';
import { Fetcher } from './fetcher';
import { Frontier } from './frontier';
import { normalizeUrl, UrlScope } from './url';

export interface SitemapSeederOptions {
  ignoreQueryParams: boolean;
  verbose?: boolean;
}

const URL_IN_TEXT = /https?:\/\/[^\s<>"']+/g;

/**
 * Collect every <loc> value in a parsed sitemap tree, whatever the nesting
 * (urlset/url/loc, sitemapindex/sitemap/loc, namespaced variants).
 */
function collectLocs(node: unknown, out: string[]): void {
  if (Array.isArray(node)) {
    for (const item of node) collectLocs(item, out);
    return;
  }
  if (node === null || typeof node !== 'object') return;

  const entries: [string, unknown][] = Object.entries(node);
  for (const [key, value] of entries) {
    if (key === 'loc' || key.endsWith(':loc')) {
      const values = Array.isArray(value) ? value : [value];
      for (const v of values) {
        if (typeof v === 'string' && v.trim() !== '') out.push(v.trim());
      }
    } else {
      collectLocs(value, out);
    }
  }
}

export function extractSitemapUrls(xml: string, parser: XMLParser = new XMLParser()): string[] {
  const urls: string[] = [];
  try {
    collectLocs(parser.parse(xml), urls);
  } catch (e) {
    console.warn(`Failed to parse sitemap XML: ${describeError(e)}`);
  }

  if (urls.length === 0) {
    // Not a well-formed sitemap; take anything URL-shaped
    urls.push(...(xml.match(URL_IN_TEXT) ?? []));
  }
  return urls;
}

/**
 * Seeds the frontier from /sitemap.xml before crawling begins.
 * Nothing here is allowed to fail the crawl.
 */
export class SitemapSeeder {
  private parser = new XMLParser({ parseTagValue: false });

  constructor(
    private rootUrl: string,
    private fetcher: Fetcher,
    private scope: UrlScope,
    private options: SitemapSeederOptions
  ) {}

  async seed(frontier: Frontier): Promise<number> {
    const sitemapUrl = new URL('/sitemap.xml', this.rootUrl).href;
    let added = 0;

    try {
      console.log(`Checking for sitemap at ${sitemapUrl}`);
      const response = await this.fetcher.fetch(sitemapUrl);

      if (response.status === 200) {
        const urls = extractSitemapUrls(response.body, this.parser);
        console.log(`Found ${urls.length} URLs in sitemap`);
        added = this.pushUrls(urls, frontier);
      } else {
        console.log(`No sitemap found at ${sitemapUrl} (status code: ${response.status})`);
      }
    } catch (e) {
      console.warn(`Warning: Could not process sitemap: ${describeError(e)}`);
    }

    if (added === 0) {
      await this.checkSitemapIndex();
    }
    return added;
  }

  private pushUrls(urls: string[], frontier: Frontier): number {
    let added = 0;
    for (const url of urls) {
      let normalized: string;
      try {
        normalized = normalizeUrl(url, { ignoreQueryParams: this.options.ignoreQueryParams });
      } catch (e) {
        if (!isCrawlError(e)) throw e;
        continue;
      }

      if (!this.scope.isInScope(normalized)) continue;

      if (frontier.push(normalized, 0)) {
        added++;
        if (this.options.verbose) console.log(`Added from sitemap: ${normalized}`);
      }
    }
    return added;
  }

  // Index contents are not expanded; we only report that one exists.
  private async checkSitemapIndex(): Promise<void> {
    const indexUrl = new URL('/sitemap_index.xml', this.rootUrl).href;
    try {
      console.log(`Checking for sitemap index at ${indexUrl}`);
      const response = await this.fetcher.fetch(indexUrl);
      if (response.status === 200) {
        console.log(`Found sitemap index at ${indexUrl}; index contents are not processed.`);
      }
    } catch (e) {
      console.warn(`Warning: Could not check sitemap index: ${describeError(e)}`);
    }
  }
}
