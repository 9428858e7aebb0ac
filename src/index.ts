#!/usr/bin/env node
import { URL } from "url";
import { env } from "./config";
import { Crawler } from "./crawler";
import { CrawlError, CrawlErrorType, describeError } from "./errors";
import { Fetcher, HttpFetcher } from "./fetcher";
import { ensureOutputDir, isOutputFormat, OutputFormat, renderOutput, writeOutputFiles } from "./output";
import { BrowserFetcher } from "./renderer";
import { uploadOutputFiles } from "./s3";
import { CrawlRequest, CrawlResult } from "./types";

export { Crawler, sleep } from "./crawler";
export type { CrawlerDependencies, CrawlOptions } from "./crawler";
export { SitemapSeeder, extractSitemapUrls } from "./discovery";
export { CrawlError, CrawlErrorType, isCrawlError } from "./errors";
export { classifyPageType, extractContent, findMainContent, parseHtml } from "./extractor";
export { HttpFetcher } from "./fetcher";
export type { Fetcher, FetchResult } from "./fetcher";
export { Frontier } from "./frontier";
export { extractLinks } from "./links";
export { renderOutput, writeOutputFiles } from "./output";
export type { OutputFile, OutputFormat } from "./output";
export { BrowserFetcher } from "./renderer";
export { RobotsGate } from "./robots";
export { ResultStore } from "./store";
export { cleanText } from "./text";
export * from "./types";
export { normalizeUrl, isSameDomain, UrlScope } from "./url";

export const USAGE =
  "Usage: site-crawler --url=<url> [--output-dir=<dir> | --bucket=<bucket>] [--format=json|txt|markdown|readable] " +
  "[--depth=<depth>] [--max-pages=<number>] [--delay=<seconds>] [--ignore-robots] [--respect-params] [--skip-sitemap] " +
  "[--render] [--page-load-wait=<seconds>] [--exclude=<regex>] [--guess-paths] [--profile=<profile>] [--verbose]";

export interface CliOptions {
  request: CrawlRequest;
  outputDir: string;
  format: OutputFormat;
  bucket: string | null;
  profile: string | null;
  render: boolean;
  pageLoadWaitMs: number;
}

function getArg(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg === undefined ? undefined : arg.slice(prefix.length);
}

function secondsToMs(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Math.round(parseFloat(value) * 1000);
}

export function parseArgs(args: string[]): CliOptions {
  const url = getArg(args, "url") ?? args.find((arg) => !arg.startsWith("-"));
  if (!url) {
    throw new CrawlError(CrawlErrorType.CONFIGURATION, "A root URL is required");
  }

  const format = getArg(args, "format") ?? "readable";
  if (!isOutputFormat(format)) {
    throw new CrawlError(CrawlErrorType.CONFIGURATION, `Unknown output format: ${format}`);
  }

  const depthArg = getArg(args, "depth");
  const maxPagesArg = getArg(args, "max-pages");

  return {
    request: {
      url,
      maxDepth: depthArg !== undefined ? parseInt(depthArg, 10) : undefined,
      maxPages: maxPagesArg !== undefined ? parseInt(maxPagesArg, 10) : undefined,
      delayMs: secondsToMs(getArg(args, "delay"), 1000),
      respectRobots: !args.includes("--ignore-robots"),
      ignoreQueryParams: !args.includes("--respect-params"),
      useSitemap: !args.includes("--skip-sitemap"),
      excludePatterns: args.filter((a) => a.startsWith("--exclude=")).map((a) => a.slice("--exclude=".length)),
      guessCommonPaths: args.includes("--guess-paths"),
      verbose: args.includes("--verbose"),
    },
    outputDir: getArg(args, "output-dir") ?? "output",
    format,
    bucket: getArg(args, "bucket") ?? null,
    profile: getArg(args, "profile") ?? null,
    render: args.includes("--render"),
    pageLoadWaitMs: secondsToMs(getArg(args, "page-load-wait"), env.PAGE_LOAD_WAIT),
  };
}

async function main() {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (e) {
    console.error(describeError(e));
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  if (options.profile) {
    process.env.AWS_PROFILE = options.profile;
    console.log(`Using AWS Profile: ${options.profile}`);
  }

  // Fail before any crawling if results cannot be saved
  if (!options.bucket) {
    ensureOutputDir(options.outputDir);
  }

  const controller = new AbortController();
  const httpFetcher = new HttpFetcher({ userAgent: options.request.userAgent, signal: controller.signal });
  const fetcher: Fetcher = options.render
    ? new BrowserFetcher({
        userAgent: options.request.userAgent,
        pageLoadWait: options.pageLoadWaitMs,
        fallback: httpFetcher,
        signal: controller.signal,
      })
    : httpFetcher;

  const crawler = new Crawler(options.request, { fetcher, resourceFetcher: httpFetcher });
  console.log(`JavaScript rendering: ${options.render ? "enabled" : "disabled"}`);
  console.log(`Output format: ${options.format}`);

  const onInterrupt = () => {
    console.log("\nCrawling interrupted by user.");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  let result: CrawlResult;
  try {
    result = await crawler.crawl({ signal: controller.signal });
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    await fetcher.close?.();
  }

  if (result.pages.size === 0) {
    return;
  }

  const domain = new URL(result.rootUrl).hostname;
  const files = renderOutput(options.format, result.pages, domain);

  if (options.bucket) {
    console.log(`Uploading to S3 bucket ${options.bucket}...`);
    await uploadOutputFiles(options.bucket, domain, files);
  } else {
    const written = writeOutputFiles(options.outputDir, files);
    console.log(`Content saved as ${options.format} to ${written.length === 1 ? written[0] : options.outputDir}`);
  }
  console.log("All operations completed.");
}

if (require.main === module) {
  main().catch((error) => {
    console.error(`Error during crawling: ${describeError(error)}`);
    process.exitCode = 1;
  });
}
