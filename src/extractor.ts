/**
 * Content Extractor
 * Finds the main content region of a page and turns it into typed elements.
 *
 * Elements are appended pass by pass (headings h1-h6, then paragraphs, then
 * lists, then blockquotes), so the output is grouped by kind and does not
 * follow source order.
 */

import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import { URL } from 'url';
import { CrawlError, CrawlErrorType, describeError } from './errors';
import {
  CONTENT_WRAPPER_SELECTORS,
  NAVIGATION_LIST_CLASS_PATTERN,
  NOISE_CLASS_PATTERN,
  NOISE_TAGS,
  PAGE_TYPE_RULES,
} from './rules';
import { cleanText } from './text';
import { ContentElement, HeadingLevel, PageContent, PageType } from './types';

const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

/**
 * Parse HTML with parse5, retrying once with htmlparser2 if that throws.
 */
export function parseHtml(html: string): cheerio.CheerioAPI {
  try {
    return cheerio.load(html);
  } catch (e) {
    console.warn(`  Error parsing HTML with parse5: ${describeError(e)}`);
  }

  try {
    return cheerio.load(html, { xml: { xmlMode: false } });
  } catch (e) {
    throw new CrawlError(CrawlErrorType.PARSE_FAILURE, `Failed to parse HTML: ${describeError(e)}`, { cause: e });
  }
}

export function classifyPageType(url: string): PageType {
  let path: string;
  try {
    path = new URL(url).pathname;
  } catch {
    return 'unknown';
  }
  const rule = PAGE_TYPE_RULES.find((candidate) => candidate.matches(path));
  return rule ? rule.type : 'unknown';
}

function insideNoise($: cheerio.CheerioAPI, el: AnyNode): boolean {
  const ancestors = $(el).parents();
  return (
    ancestors.is(NOISE_TAGS) ||
    ancestors.filter((_, parent) => NOISE_CLASS_PATTERN.test($(parent).attr('class') ?? '')).length > 0
  );
}

/**
 * First content wrapper with visible text that is not nested in navigation
 * chrome, else <body>, else the document.
 */
export function findMainContent($: cheerio.CheerioAPI): cheerio.Cheerio<AnyNode> {
  for (const selector of CONTENT_WRAPPER_SELECTORS) {
    const match = $(selector)
      .filter((_, el) => $(el).text().trim() !== '' && !insideNoise($, el))
      .first();
    if (match.length > 0) {
      return match;
    }
  }

  const body = $('body').first();
  return body.length > 0 ? body : $.root();
}

/**
 * Copy of the region with navigation chrome taken out. The parsed document
 * itself is left intact for link extraction.
 */
export function removeNoise($: cheerio.CheerioAPI, region: cheerio.Cheerio<AnyNode>): cheerio.Cheerio<AnyNode> {
  const working = region.clone();
  working.find(NOISE_TAGS).remove();
  working
    .find('[class]')
    .filter((_, el) => NOISE_CLASS_PATTERN.test($(el).attr('class') ?? ''))
    .remove();
  return working;
}

function extractElements($: cheerio.CheerioAPI, root: cheerio.Cheerio<AnyNode>): ContentElement[] {
  const elements: ContentElement[] = [];

  for (const level of HEADING_LEVELS) {
    root.find(`h${level}`).each((_, el) => {
      const text = cleanText($(el).text());
      if (text) elements.push({ type: 'heading', level, text });
    });
  }

  root.find('p').each((_, el) => {
    const text = cleanText($(el).text());
    if (text) elements.push({ type: 'paragraph', text });
  });

  root.find('ul, ol').each((_, el) => {
    const list = $(el);
    // Menus that survived noise removal
    const classes = (list.attr('class') ?? '').split(/\s+/);
    if (classes.some((cls) => NAVIGATION_LIST_CLASS_PATTERN.test(cls))) return;

    const items: string[] = [];
    list.children('li').each((_, li) => {
      const text = cleanText($(li).text());
      if (text) items.push(text);
    });

    if (items.length > 0) {
      elements.push({ type: 'list', ordered: el.name === 'ol', items });
    }
  });

  root.find('blockquote').each((_, el) => {
    const text = cleanText($(el).text());
    if (text) elements.push({ type: 'blockquote', text });
  });

  return elements;
}

export function extractContent($: cheerio.CheerioAPI, url: string): PageContent {
  const titleTag = $('title').first();
  const title = titleTag.length > 0 ? cleanText(titleTag.text()) : 'No Title';
  const metaDescription = cleanText($('meta[name="description"]').first().attr('content'));

  const region = removeNoise($, findMainContent($));

  return {
    url,
    title,
    pageType: classifyPageType(url),
    metaDescription,
    elements: extractElements($, region),
  };
}
