/**
 * Crawler Tests
 * End-to-end crawl loop over an in-memory site
 */

import { Crawler, sleep } from '../crawler';
import { CrawlError, CrawlErrorType } from '../errors';
import { CrawlRequest } from '../types';
import { FakeFetcher } from './helpers/fake-fetcher';
import { footerOnlyPage, page, ROOT, welcomePage } from './helpers/fixtures';

const ROBOTS_URL = 'http://example.com/robots.txt';

function noSleep() {
  return jest.fn((_ms: number, _signal?: AbortSignal) => Promise.resolve());
}

function createCrawler(
  fetcher: FakeFetcher,
  request: Partial<CrawlRequest> = {},
  pause: (ms: number, signal?: AbortSignal) => Promise<void> = noSleep()
): Crawler {
  return new Crawler(
    { url: ROOT, delayMs: 0, useSitemap: false, userAgent: 'TestBot/1.0', ...request },
    { fetcher, sleep: pause }
  );
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

describe('Crawler', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('basic crawl', () => {
    it('should extract the root page and follow its navigation links', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: welcomePage,
        'http://example.com/x': page('<p>X marks the spot</p>', 'X'),
      });

      const result = await createCrawler(fetcher).crawl();

      expect(result.rootUrl).toBe(ROOT);
      expect(fetcher.requests).toEqual([ROBOTS_URL, ROOT, 'http://example.com/x']);
      expect(result.pages.get(ROOT)).toEqual({
        url: ROOT,
        title: 'Home',
        pageType: 'homepage',
        metaDescription: '',
        elements: [
          { type: 'heading', level: 1, text: 'Welcome' },
          { type: 'paragraph', text: 'Hello' },
        ],
      });
      expect(result.pages.get('http://example.com/x')?.elements).toEqual([
        { type: 'paragraph', text: 'X marks the spot' },
      ]);
      expect(result.visited).toEqual([ROOT, 'http://example.com/x']);
      expect(result.processedPages).toBe(2);
      expect(result.interrupted).toBe(false);
    });

    it('should normalize the root URL', () => {
      const fetcher = new FakeFetcher({ [ROOT]: welcomePage });

      const crawler = createCrawler(fetcher, { url: 'example.com' });

      expect(crawler.root).toBe(ROOT);
    });

    it('should visit every page of a cyclic site exactly once', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('<p>Root</p><a href="/a">A</a>'),
        'http://example.com/a': page('<p>A</p><a href="/">Home</a><a href="/b">B</a>'),
        'http://example.com/b': page('<p>B</p><a href="/a/">A</a><a href="/b#again">B</a>'),
      });

      const result = await createCrawler(fetcher).crawl();

      expect(result.visited).toEqual([ROOT, 'http://example.com/a', 'http://example.com/b']);
      expect(fetcher.requests).toEqual([ROBOTS_URL, ROOT, 'http://example.com/a', 'http://example.com/b']);
      expect(Array.from(result.pages.keys())).toEqual(result.visited);
    });

    it('should keep pages without extractable content out of the results', async () => {
      const fetcher = new FakeFetcher({ [ROOT]: footerOnlyPage });

      const result = await createCrawler(fetcher).crawl();

      expect(result.pages.size).toBe(0);
      // The footer link is still followed even though its text is not extracted
      expect(result.visited).toEqual([ROOT, 'http://example.com/terms']);
      expect(console.warn).toHaveBeenCalledWith(
        'No content was extracted. Try adjusting the crawler settings or check if the website is accessible.'
      );
    });
  });

  describe('redirects', () => {
    it('should crawl the redirect target on its own turn', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('<p>Start</p><a href="/old">Old</a>'),
        'http://example.com/old': { body: page('<p>Moved</p>'), finalUrl: 'http://example.com/new/' },
        'http://example.com/new': page('<p>New home</p>'),
      });

      const result = await createCrawler(fetcher).crawl();

      expect(fetcher.requests).toEqual([
        ROBOTS_URL,
        ROOT,
        'http://example.com/old',
        'http://example.com/new',
      ]);
      expect(Array.from(result.pages.keys())).toEqual([ROOT, 'http://example.com/new']);
      expect(result.visited).toContain('http://example.com/old');
      expect(result.processedPages).toBe(2);
    });

    it('should not fetch a redirect target that is already queued twice', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('<p>Start</p><a href="/old">Old</a><a href="/new">New</a>'),
        'http://example.com/old': { body: page('<p>Moved</p>'), finalUrl: 'http://example.com/new' },
        'http://example.com/new': page('<p>New home</p>'),
      });

      await createCrawler(fetcher).crawl();

      expect(fetcher.requestCount('http://example.com/new')).toBe(1);
    });

    it('should drop redirect targets outside the site', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('<p>Start</p><a href="/out">Out</a>'),
        'http://example.com/out': { body: page('<p>Elsewhere</p>'), finalUrl: 'http://other.com/' },
      });

      const result = await createCrawler(fetcher).crawl();

      expect(fetcher.requests).toEqual([ROBOTS_URL, ROOT, 'http://example.com/out']);
      expect(Array.from(result.pages.keys())).toEqual([ROOT]);
    });
  });

  describe('robots.txt', () => {
    const robots = { body: 'User-agent: *\nDisallow: /private\n', contentType: 'text/plain' };

    it('should never request disallowed URLs', async () => {
      const fetcher = new FakeFetcher({
        [ROBOTS_URL]: robots,
        [ROOT]: page('<p>Start</p><a href="/private">Private</a><a href="/public">Public</a>'),
        'http://example.com/public': page('<p>Public</p>'),
      });

      const result = await createCrawler(fetcher).crawl();

      expect(fetcher.requests).toEqual([ROBOTS_URL, ROOT, 'http://example.com/public']);
      expect(result.visited).toEqual([ROOT, 'http://example.com/private', 'http://example.com/public']);
      expect(result.pages.has('http://example.com/private')).toBe(false);
    });

    it('should fetch everything when robots.txt is ignored', async () => {
      const fetcher = new FakeFetcher({
        [ROBOTS_URL]: robots,
        [ROOT]: page('<p>Start</p><a href="/private">Private</a>'),
        'http://example.com/private': page('<p>Private</p>'),
      });

      await createCrawler(fetcher, { respectRobots: false }).crawl();

      expect(fetcher.requests).toEqual([ROOT, 'http://example.com/private']);
    });

    it('should keep honouring robots.txt after a redirect to https', async () => {
      const fetcher = new FakeFetcher({
        [ROBOTS_URL]: robots,
        [ROOT]: { body: page('<p>Moved</p>'), finalUrl: 'https://example.com/' },
        'https://example.com/': page('<p>Start</p><a href="/private">Private</a><a href="/public">Public</a>'),
        'https://example.com/public': page('<p>Public</p>'),
      });

      const result = await createCrawler(fetcher).crawl();

      expect(fetcher.requests).toEqual([ROBOTS_URL, ROOT, 'https://example.com/', 'https://example.com/public']);
      expect(fetcher.requestCount('https://example.com/private')).toBe(0);
      expect(result.pages.has('https://example.com/private')).toBe(false);
    });
  });

  describe('limits', () => {
    const chain = {
      [ROOT]: page('<p>Root</p><a href="/p1">1</a>'),
      'http://example.com/p1': page('<p>One</p><a href="/p2">2</a>'),
      'http://example.com/p2': page('<p>Two</p><a href="/p3">3</a>'),
      'http://example.com/p3': page('<p>Three</p><a href="/p4">4</a>'),
    };

    it('should not expand pages beyond the depth limit', async () => {
      const fetcher = new FakeFetcher(chain);

      const result = await createCrawler(fetcher, { maxDepth: 1 }).crawl();

      expect(result.visited).toEqual([ROOT, 'http://example.com/p1']);
    });

    it('should only crawl the root at depth 0', async () => {
      const fetcher = new FakeFetcher(chain);

      const result = await createCrawler(fetcher, { maxDepth: 0 }).crawl();

      expect(fetcher.requests).toEqual([ROBOTS_URL, ROOT]);
      expect(result.pages.size).toBe(1);
    });

    it('should stop at the page cap', async () => {
      const fetcher = new FakeFetcher(chain);

      const result = await createCrawler(fetcher, { maxPages: 3 }).crawl();

      expect(result.processedPages).toBe(3);
      expect(result.visited).toEqual([ROOT, 'http://example.com/p1', 'http://example.com/p2']);
      expect(fetcher.requestCount('http://example.com/p3')).toBe(0);
    });

    it('should not count failed pages against the cap', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('<p>Root</p><a href="/gone">Gone</a><a href="/here">Here</a>'),
        'http://example.com/here': page('<p>Here</p>'),
      });

      const result = await createCrawler(fetcher, { maxPages: 2 }).crawl();

      expect(result.processedPages).toBe(2);
      expect(Array.from(result.pages.keys())).toEqual([ROOT, 'http://example.com/here']);
    });
  });

  describe('error handling', () => {
    it('should log and skip pages that fail', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page(
          '<p>Root</p><a href="/broken">1</a><a href="/image">2</a><a href="/missing">3</a><a href="/ok">4</a>'
        ),
        'http://example.com/broken': { error: new Error('connection refused') },
        'http://example.com/image': { body: 'PNG', contentType: 'image/png' },
        'http://example.com/ok': page('<p>Fine</p>'),
      });

      const result = await createCrawler(fetcher).crawl();

      expect(result.visited).toEqual([
        ROOT,
        'http://example.com/broken',
        'http://example.com/image',
        'http://example.com/missing',
        'http://example.com/ok',
      ]);
      expect(Array.from(result.pages.keys())).toEqual([ROOT, 'http://example.com/ok']);
      expect(result.processedPages).toBe(2);
      expect(console.error).toHaveBeenCalledWith(
        '  Skipping http://example.com/broken: FETCH_FAILURE: connection refused'
      );
      expect(console.error).toHaveBeenCalledWith(
        '  Skipping http://example.com/image: UNSUPPORTED_CONTENT_TYPE: Non-HTML content type: image/png (status 200)'
      );
      expect(console.error).toHaveBeenCalledWith(
        '  Skipping http://example.com/missing: FETCH_FAILURE: HTTP 404 (status 404)'
      );
    });

    it('should reject an unusable root URL before crawling', () => {
      const fetcher = new FakeFetcher();

      expect(thrownBy(() => createCrawler(fetcher, { url: 'http://' }))).toMatchObject({
        type: CrawlErrorType.CONFIGURATION,
      });
      expect(thrownBy(() => createCrawler(fetcher, { maxPages: -1 }))).toMatchObject({
        type: CrawlErrorType.CONFIGURATION,
      });
      expect(fetcher.requests).toEqual([]);
    });

    it('should only run once', async () => {
      const crawler = createCrawler(new FakeFetcher({ [ROOT]: welcomePage }), { maxDepth: 0 });

      await crawler.crawl();

      await expect(crawler.crawl()).rejects.toThrow('Crawler instances are single-use');
    });
  });

  describe('politeness', () => {
    const site = {
      [ROOT]: page('<p>Root</p><a href="/a">A</a><a href="/b">B</a>'),
      'http://example.com/a': page('<p>A</p>'),
      'http://example.com/b': page('<p>B</p>'),
    };

    it('should pause between requests while work remains', async () => {
      const pause = noSleep();

      await createCrawler(new FakeFetcher(site), { delayMs: 250 }, pause).crawl();

      expect(pause).toHaveBeenCalledTimes(2);
      expect(pause).toHaveBeenNthCalledWith(1, 250, undefined);
      expect(pause).toHaveBeenNthCalledWith(2, 250, undefined);
    });

    it('should use the robots.txt crawl delay when it is longer', async () => {
      const pause = noSleep();
      const fetcher = new FakeFetcher({
        ...site,
        [ROBOTS_URL]: { body: 'User-agent: *\nCrawl-delay: 1\n', contentType: 'text/plain' },
      });

      await createCrawler(fetcher, { delayMs: 250 }, pause).crawl();

      expect(pause).toHaveBeenCalledWith(1000, undefined);
    });

    it('should stop and keep partial results when aborted', async () => {
      const controller = new AbortController();
      const pause = jest.fn((_ms: number, _signal?: AbortSignal) => {
        controller.abort();
        return Promise.resolve();
      });

      const result = await createCrawler(new FakeFetcher(site), { delayMs: 250 }, pause).crawl({
        signal: controller.signal,
      });

      expect(pause).toHaveBeenCalledWith(250, controller.signal);
      expect(result.interrupted).toBe(true);
      expect(result.visited).toEqual([ROOT]);
      expect(Array.from(result.pages.keys())).toEqual([ROOT]);
    });

    it('should stop quietly when a request is cancelled by the abort', async () => {
      const controller = new AbortController();
      const fetcher = new FakeFetcher({
        [ROOT]: page('<p>Start</p><a href="/slow">Slow</a><a href="/next">Next</a>'),
        'http://example.com/next': page('<p>Next</p>'),
      });
      const fetchPage = fetcher.fetch.bind(fetcher);
      jest.spyOn(fetcher, 'fetch').mockImplementation(async (url: string) => {
        if (url === 'http://example.com/slow') {
          controller.abort();
          throw new CrawlError(CrawlErrorType.FETCH_FAILURE, 'Request failed: canceled', { url });
        }
        return fetchPage(url);
      });

      const result = await createCrawler(fetcher).crawl({ signal: controller.signal });

      expect(result.interrupted).toBe(true);
      expect(result.visited).toEqual([ROOT, 'http://example.com/slow']);
      expect(fetcher.requestCount('http://example.com/next')).toBe(0);
      expect(console.error).not.toHaveBeenCalled();
    });
  });

  describe('seeding', () => {
    it('should queue sitemap URLs before crawling', async () => {
      const fetcher = new FakeFetcher({
        'http://example.com/sitemap.xml': {
          body: '<urlset><url><loc>http://example.com/from-sitemap</loc></url></urlset>',
          contentType: 'application/xml',
        },
        [ROOT]: page('<p>Root</p>'),
        'http://example.com/from-sitemap': page('<p>Listed</p>'),
      });

      const result = await createCrawler(fetcher, { useSitemap: true }).crawl();

      expect(fetcher.requests).toEqual([
        ROBOTS_URL,
        'http://example.com/sitemap.xml',
        ROOT,
        'http://example.com/from-sitemap',
      ]);
      expect(result.pages.has('http://example.com/from-sitemap')).toBe(true);
    });

    it('should try common paths when the root has no links', async () => {
      const fetcher = new FakeFetcher({
        [ROOT]: page('<p>Lonely</p>'),
        'http://example.com/about': page('<p>About us</p>'),
      });

      const result = await createCrawler(fetcher, { guessCommonPaths: true }).crawl();

      expect(fetcher.requests).toEqual([
        ROBOTS_URL,
        ROOT,
        'http://example.com/about',
        'http://example.com/about-us',
        'http://example.com/contact',
        'http://example.com/services',
        'http://example.com/products',
        'http://example.com/blog',
      ]);
      expect(Array.from(result.pages.keys())).toEqual([ROOT, 'http://example.com/about']);
    });

    it('should not guess paths unless asked', async () => {
      const fetcher = new FakeFetcher({ [ROOT]: page('<p>Lonely</p>') });

      await createCrawler(fetcher).crawl();

      expect(fetcher.requests).toEqual([ROBOTS_URL, ROOT]);
    });
  });

  describe('query parameters', () => {
    const listing = page('<p>List</p><a href="/list?page=1">1</a><a href="/list?page=2#top">2</a>');

    it('should treat URLs differing only by query as one page by default', async () => {
      const fetcher = new FakeFetcher({ [ROOT]: listing });

      const result = await createCrawler(fetcher).crawl();

      expect(result.visited).toEqual([ROOT, 'http://example.com/list']);
    });

    it('should keep queries when they are respected', async () => {
      const fetcher = new FakeFetcher({ [ROOT]: listing });

      const result = await createCrawler(fetcher, { ignoreQueryParams: false }).crawl();

      expect(result.visited).toEqual([
        ROOT,
        'http://example.com/list?page=1',
        'http://example.com/list?page=2',
      ]);
    });
  });
});

describe('sleep', () => {
  it('should resolve at once when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(60_000, controller.signal)).resolves.toBeUndefined();
  });

  it('should resolve early when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeUndefined();
  });
});
