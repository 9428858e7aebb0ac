export interface CrawlRequest {
  url: string;
  maxDepth?: number; // Link hops from the root. 0 = only the root (and sitemap seeds).
  maxPages?: number; // Max pages to process to avoid infinite crawls.
  delayMs?: number; // Politeness pause between requests.
  respectRobots?: boolean;
  ignoreQueryParams?: boolean; // Treat ?a=1 and ?a=2 as the same page
  useSitemap?: boolean;
  userAgent?: string;
  excludePatterns?: string[]; // Extra regex patterns to exclude.
  guessCommonPaths?: boolean; // Try /about, /contact, ... when the root has no links
  verbose?: boolean;
}

export type ResolvedCrawlRequest = Required<CrawlRequest>;

export type PageType =
  | 'homepage'
  | 'about'
  | 'contact'
  | 'blog_index'
  | 'blog_post'
  | 'product_index'
  | 'product_detail'
  | 'unknown';

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type ContentElement =
  | { readonly type: 'heading'; readonly level: HeadingLevel; readonly text: string }
  | { readonly type: 'paragraph'; readonly text: string }
  | { readonly type: 'list'; readonly ordered: boolean; readonly items: readonly string[] }
  | { readonly type: 'blockquote'; readonly text: string };

export interface PageContent {
  readonly url: string;
  readonly title: string;
  readonly pageType: PageType;
  readonly metaDescription: string;
  readonly elements: readonly ContentElement[];
}

export interface FrontierEntry {
  url: string;
  depth: number;
}

export interface CrawlResult {
  rootUrl: string;
  pages: ReadonlyMap<string, PageContent>;
  visited: string[];
  processedPages: number;
  interrupted: boolean;
}
