import { ContentElement, PageContent } from './types';

function freezePage(page: PageContent): PageContent {
  const elements = page.elements.map((element): ContentElement => {
    if (element.type === 'list') {
      return Object.freeze({ ...element, items: Object.freeze([...element.items]) });
    }
    return Object.freeze({ ...element });
  });
  return Object.freeze({ ...page, elements: Object.freeze(elements) });
}

/**
 * Extracted pages keyed by URL, in the order they were crawled.
 */
export class ResultStore {
  private pages: Map<string, PageContent> = new Map();

  /**
   * Record a page. A URL is only ever stored once; later calls are ignored.
   */
  add(page: PageContent): boolean {
    if (this.pages.has(page.url)) {
      return false;
    }
    this.pages.set(page.url, freezePage(page));
    return true;
  }

  get(url: string): PageContent | undefined {
    return this.pages.get(url);
  }

  has(url: string): boolean {
    return this.pages.has(url);
  }

  get size(): number {
    return this.pages.size;
  }

  snapshot(): ReadonlyMap<string, PageContent> {
    return new Map(this.pages);
  }
}
