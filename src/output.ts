/**
 * Output renderers
 * Each format turns the crawl results into a list of files. Renderers only
 * read the page map; writing the files is left to a sink (disk or S3).
 */

import * as fs from 'fs';
import * as path from 'path';
import { URL } from 'url';
import { CrawlError, CrawlErrorType } from './errors';
import { titleCase } from './text';
import { ContentElement, PageContent, PageType } from './types';

export const OUTPUT_FORMATS = ['json', 'txt', 'markdown', 'readable'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface OutputFile {
  path: string; // relative to the output root, "/" separated
  body: string;
  contentType: string;
}

export interface RenderOptions {
  generatedAt?: Date;
}

type PageMap = ReadonlyMap<string, PageContent>;

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function groupByType(pages: PageMap): [PageType, PageContent[]][] {
  const groups = new Map<PageType, PageContent[]>();
  for (const page of pages.values()) {
    const group = groups.get(page.pageType) ?? [];
    group.push(page);
    groups.set(page.pageType, group);
  }

  return Array.from(groups.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([type, group]): [PageType, PageContent[]] => [
      type,
      [...group].sort((a, b) => a.title.localeCompare(b.title)),
    ]);
}

/**
 * "/blog/my-post/" -> "blog_my-post.md", "/" -> "index.md". Pages on a host
 * other than `domain` (a www. variant, say) get the host as a prefix.
 */
export function pageFileName(url: string, domain?: string): string {
  const parsed = new URL(url);
  let name = parsed.pathname.replace(/^\/+|\/+$/g, '').replace(/\//g, '_');
  if (name === '') name = 'index';
  if (parsed.search) name += `_${parsed.search.slice(1).replace(/[^\w-]+/g, '_')}`;
  if (domain !== undefined && parsed.hostname !== domain) name = `${parsed.hostname}_${name}`;
  return `${name}.md`;
}

export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function renderJson(pages: PageMap, domain: string): OutputFile[] {
  return [
    {
      path: `${domain}_content.json`,
      body: JSON.stringify(Array.from(pages.values()), null, 2),
      contentType: 'application/json',
    },
  ];
}

function textElement(element: ContentElement): string {
  switch (element.type) {
    case 'heading':
      // One level below the page title
      return `${'#'.repeat(element.level + 1)} ${element.text}\n\n`;
    case 'paragraph':
      return `${element.text}\n\n`;
    case 'list':
      return (
        element.items.map((item, i) => (element.ordered ? `${i + 1}. ${item}` : `* ${item}`)).join('\n') + '\n\n'
      );
    case 'blockquote':
      return element.text
        .split('\n')
        .map((line) => `> ${line}\n`)
        .join('') + '\n';
  }
}

export function renderText(pages: PageMap, domain: string): OutputFile[] {
  const rule = '='.repeat(80);
  let body = `# ${domain} Website Content\n\n## Table of Contents\n\n`;

  for (const [type, group] of groupByType(pages)) {
    body += `* ${titleCase(type)}\n`;
    for (const page of group) {
      body += `  - ${page.title}\n`;
    }
  }
  body += `\n${rule}\n\n`;

  for (const page of pages.values()) {
    body += `# ${page.title}\n\n`;
    body += `URL: ${page.url}\n`;
    body += `Type: ${titleCase(page.pageType)}\n`;
    if (page.metaDescription) {
      body += `Description: ${page.metaDescription}\n`;
    }
    body += '\n';
    body += page.elements.map(textElement).join('');
    body += `\n${rule}\n\n`;
  }

  return [{ path: `${domain}_content.txt`, body, contentType: 'text/plain' }];
}

function markdownElement(element: ContentElement): string {
  switch (element.type) {
    case 'heading':
      return `${'#'.repeat(Math.min(element.level + 1, 6))} ${element.text}\n\n`;
    case 'paragraph':
      return `${element.text}\n\n`;
    case 'list':
      return element.items.map((item) => `${element.ordered ? '1.' : '*'} ${item}\n`).join('') + '\n';
    case 'blockquote':
      return `> ${element.text}\n\n`;
  }
}

export function renderMarkdown(pages: PageMap, domain: string): OutputFile[] {
  const files: OutputFile[] = [];
  const usedPaths = new Set<string>();
  let index = `# ${domain} Content\n\n## Contents\n\n`;

  for (const [type, group] of groupByType(pages)) {
    index += `### ${titleCase(type)}\n\n`;
    for (const page of group) {
      // http and https copies of a page share a name
      const baseName = pageFileName(page.url, domain).replace(/\.md$/, '');
      let filePath = `${type}/${baseName}.md`;
      for (let n = 2; usedPaths.has(filePath); n++) {
        filePath = `${type}/${baseName}_${n}.md`;
      }
      usedPaths.add(filePath);
      index += `* [${page.title}](${filePath})\n`;

      let body = `# ${page.title}\n\n`;
      if (page.metaDescription) {
        body += `_${page.metaDescription}_\n\n`;
      }
      body += `URL: ${page.url}\n\n`;
      body += page.elements.map(markdownElement).join('');
      files.push({ path: filePath, body, contentType: 'text/markdown' });
    }
    index += '\n';
  }

  files.push({ path: 'index.md', body: index, contentType: 'text/markdown' });
  return files;
}

function readableElement(element: ContentElement): string {
  switch (element.type) {
    case 'heading':
      return element.level <= 2
        ? `\n${element.text}\n${'-'.repeat(element.text.length)}\n`
        : `\n${element.text}\n`;
    case 'paragraph':
      return `${element.text}\n\n`;
    case 'list':
      return (
        '\n' +
        element.items.map((item, i) => (element.ordered ? `${i + 1}. ${item}\n` : `• ${item}\n`)).join('') +
        '\n'
      );
    case 'blockquote':
      return `\n    ${element.text.replace(/\n/g, '\n    ')}\n\n`;
  }
}

export function renderReadable(pages: PageMap, domain: string, options: RenderOptions = {}): OutputFile[] {
  const heading = `${domain} Website Content`;
  let body = `${heading}\n${'='.repeat(heading.length)}\n\n`;
  body += `Generated on ${formatTimestamp(options.generatedAt ?? new Date())}\n\n`;

  for (const [type, group] of groupByType(pages)) {
    const section = titleCase(type);
    body += `\n\n${section}\n${'-'.repeat(section.length)}\n\n`;

    for (const page of group) {
      body += `${page.title}\n${'.'.repeat(page.title.length)}\n\n`;
      if (page.metaDescription) {
        body += `${page.metaDescription}\n\n`;
      }
      body += page.elements.map(readableElement).join('');
      body += `\n${'-'.repeat(80)}\n\n`;
    }
  }

  return [{ path: `${domain}_content_readable.txt`, body, contentType: 'text/plain' }];
}

export function renderOutput(
  format: OutputFormat,
  pages: PageMap,
  domain: string,
  options: RenderOptions = {}
): OutputFile[] {
  switch (format) {
    case 'json':
      return renderJson(pages, domain);
    case 'txt':
      return renderText(pages, domain);
    case 'markdown':
      return renderMarkdown(pages, domain);
    case 'readable':
      return renderReadable(pages, domain, options);
  }
}

/**
 * Create the output directory up front; failing here is fatal.
 */
export function ensureOutputDir(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (e) {
    throw new CrawlError(CrawlErrorType.CONFIGURATION, `Cannot create output directory ${dir}`, { cause: e });
  }
}

export function writeOutputFiles(dir: string, files: OutputFile[]): string[] {
  const written: string[] = [];
  for (const file of files) {
    const filePath = path.join(dir, ...file.path.split('/'));
    const fileDir = path.dirname(filePath);
    if (!fs.existsSync(fileDir)) fs.mkdirSync(fileDir, { recursive: true });
    fs.writeFileSync(filePath, file.body, 'utf-8');
    written.push(filePath);
  }
  return written;
}
