/**
 * Fetch layer
 * The crawler only talks to the Fetcher interface; how the HTML is obtained
 * (plain request or rendered browser session) is up to the implementation.
 */

import axios, { AxiosResponse } from 'axios';
import { env } from './config';
import { CrawlError, CrawlErrorType } from './errors';

export interface FetchResult {
  status: number;
  finalUrl: string;
  contentType: string;
  body: string;
}

export interface Fetcher {
  /**
   * Resolves for any HTTP status; rejects only when no response was obtained.
   */
  fetch(url: string): Promise<FetchResult>;
  close?(): Promise<void>;
}

export interface HttpFetcherOptions {
  userAgent?: string;
  timeout?: number;
  maxRedirects?: number;
  signal?: AbortSignal; // cancels in-flight requests
}

const BINARY_SIGNATURES: readonly Buffer[] = [
  Buffer.from('%PDF-'),
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a]),
  Buffer.from('GIF8'),
  Buffer.from([0xff, 0xd8, 0xff]),
];

/**
 * Sniff for file signatures or a high share of non-text bytes.
 */
export function isBinaryContent(content: Buffer): boolean {
  if (BINARY_SIGNATURES.some((signature) => content.subarray(0, signature.length).equals(signature))) {
    return true;
  }

  const sample = content.subarray(0, 4000);
  if (sample.length === 0) return false;

  let binaryBytes = 0;
  for (const byte of sample) {
    if (byte < 9 || (byte > 13 && byte < 32) || byte > 126) binaryBytes++;
  }
  return binaryBytes > sample.length * 0.1;
}

export function charsetFromContentType(contentType: string): string | undefined {
  const match = contentType.match(/charset=["']?([^\s;"']+)/i);
  return match ? match[1].toLowerCase() : undefined;
}

export function decodeBody(content: Buffer, contentType: string): string {
  const charset = charsetFromContentType(contentType) ?? 'utf-8';
  try {
    return new TextDecoder(charset).decode(content);
  } catch {
    // Unknown label
    return new TextDecoder('utf-8').decode(content);
  }
}

function headerValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.join(', ');
  return value === undefined || value === null ? '' : String(value);
}

export class HttpFetcher implements Fetcher {
  private headers: Record<string, string>;
  private timeout: number;
  private maxRedirects: number;
  private signal?: AbortSignal;

  constructor(options: HttpFetcherOptions = {}) {
    this.timeout = options.timeout ?? env.HTTP_TIMEOUT;
    this.maxRedirects = options.maxRedirects ?? 10;
    this.signal = options.signal;
    this.headers = {
      'User-Agent': options.userAgent ?? env.USER_AGENT,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.5',
      'Upgrade-Insecure-Requests': '1',
    };
  }

  async fetch(url: string): Promise<FetchResult> {
    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await axios.get<ArrayBuffer>(url, {
        headers: this.headers,
        timeout: this.timeout,
        maxRedirects: this.maxRedirects,
        responseType: 'arraybuffer',
        validateStatus: () => true,
        signal: this.signal,
      });
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new CrawlError(CrawlErrorType.FETCH_FAILURE, `Request failed: ${message}`, { url, cause: e });
    }

    const contentType = headerValue(response.headers['content-type']).toLowerCase();
    const content = Buffer.from(response.data);

    // Node's http adapter records where the redirect chain ended
    const responseUrl: unknown = response.request?.res?.responseUrl;
    const finalUrl = typeof responseUrl === 'string' && responseUrl !== '' ? responseUrl : url;

    if (contentType.includes('text/html') && isBinaryContent(content)) {
      throw new CrawlError(CrawlErrorType.UNSUPPORTED_CONTENT_TYPE, 'Binary content served as HTML', {
        url,
        statusCode: response.status,
      });
    }

    return {
      status: response.status,
      finalUrl,
      contentType,
      body: decodeBody(content, contentType),
    };
  }
}
