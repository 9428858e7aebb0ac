/**
 * Test Fixtures
 * Reusable pages and results
 */

import { PageContent } from '../../types';

export const ROOT = 'http://example.com/';

export function page(body: string, title = 'Test Page'): string {
  return `<!DOCTYPE html>
<html>
<head>
  <title>${title}</title>
</head>
<body>
${body}
</body>
</html>`;
}

export const welcomePage = page('<h1>Welcome</h1><p>Hello</p><nav><a href="/x">X</a></nav>', 'Home');

export const footerOnlyPage = page('<footer><p>Only footer text</p><a href="/terms">Terms</a></footer>', 'Footer');

export const homePage: PageContent = {
  url: 'http://example.com/',
  title: 'Home',
  pageType: 'homepage',
  metaDescription: 'Welcome site',
  elements: [
    { type: 'heading', level: 1, text: 'Welcome' },
    { type: 'paragraph', text: 'Hello there' },
    { type: 'list', ordered: false, items: ['One', 'Two'] },
    { type: 'blockquote', text: 'Be kind' },
  ],
};

export const blogPostPage: PageContent = {
  url: 'http://example.com/blog/first-post',
  title: 'First Post',
  pageType: 'blog_post',
  metaDescription: '',
  elements: [
    { type: 'heading', level: 2, text: 'Intro' },
    { type: 'list', ordered: true, items: ['Step A', 'Step B'] },
  ],
};

export function pageMap(...pages: PageContent[]): ReadonlyMap<string, PageContent> {
  return new Map(pages.map((p): [string, PageContent] => [p.url, p]));
}
