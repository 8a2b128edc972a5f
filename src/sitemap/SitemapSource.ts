import * as fs from 'fs';

import axios from 'axios';
import robotsParser from 'robots-parser';
import { parseStringPromise } from 'xml2js';

import { NoUrlsFoundError, SitemapError, errorMessage } from '../core/errors';
import { CookieConfig } from '../types/config';
import { LogLevel } from '../types/enums';
import { Sleeper, sleep } from '../utils/helpers/cancellation';
import { dedupeUrls, ensureProtocol, isSitemapUrl, originOf, sanitizeUrl } from '../utils/helpers/network-helpers';
import { Logger } from '../utils/logger/Logger';
import { isPlainObject } from '../utils/validators/config-validator';

/**
 * Resolves the input of a scan to the list of page URLs
 */
export interface ISitemapSource {
  /** Ordered, de-duplicated absolute URLs. Throws NoUrlsFoundError when empty. */
  resolve(start: string): Promise<string[]>;
}

export interface FetchResponse {
  status: number;
  body: string;
}

export type TextFetcher = (url: string) => Promise<FetchResponse>;

export interface HttpSitemapSourceOptions {
  userAgent?: string;
  cookies?: CookieConfig[];
  timeoutMs?: number;
  /** Attempts per sitemap document */
  maxAttempts?: number;
  baseDelayMs?: number;
  fetcher?: TextFetcher;
  sleep?: Sleeper;
  logger?: Logger;
}

/** Probed in this order when robots.txt names no sitemap */
export const COMMON_SITEMAP_PATHS = [
  '/sitemap.xml',
  '/sitemap_index.xml',
  '/sitemap/sitemap.xml',
  '/sitemapindex.xml',
  '/sitemap/index.xml',
];

const MAX_INDEX_DEPTH = 3;
const XML_SIGNATURE = /<\s*(\?xml|urlset|sitemapindex)[\s>]/i;

interface ParsedSitemap {
  pages: string[];
  sitemaps: string[];
}

export function createAxiosFetcher(options: { userAgent?: string; cookies?: CookieConfig[]; timeoutMs?: number }): TextFetcher {
  const headers: Record<string, string> = {};
  if (options.userAgent) {
    headers['User-Agent'] = options.userAgent;
  }
  if (options.cookies && options.cookies.length > 0) {
    headers.Cookie = options.cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ');
  }
  return async (url) => {
    const response = await axios.get<string>(url, {
      timeout: options.timeoutMs ?? 30000,
      maxRedirects: 5,
      responseType: 'text',
      validateStatus: () => true,
      headers,
    });
    return { status: response.status, body: typeof response.data === 'string' ? response.data : String(response.data) };
  };
}

/**
 * Sitemap source over HTTP and local files.
 *
 * Accepts a sitemap URL, a local XML file or a bare domain. Domains are
 * searched through robots.txt first, then a list of well-known paths.
 * Sitemap indexes are followed up to three levels deep.
 */
export class HttpSitemapSource implements ISitemapSource {
  private readonly fetcher: TextFetcher;
  private readonly sleep: Sleeper;
  private readonly logger: Logger;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;

  constructor(options: HttpSitemapSourceOptions = {}) {
    this.fetcher = options.fetcher ?? createAxiosFetcher(options);
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger?.child('Sitemap') ?? new Logger(LogLevel.INFO, 'Sitemap');
    this.maxAttempts = options.maxAttempts ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 5000;
  }

  async resolve(start: string): Promise<string[]> {
    const input = start.trim();
    let urls: string[];

    if (await isLocalFile(input)) {
      this.logger.info(`Reading sitemap file ${input}`);
      const content = await readLocalFile(input);
      urls = await this.expand(await parseSitemapXml(content, input), 0);
    } else {
      const target = ensureProtocol(input);
      const sitemapUrl = isSitemapUrl(target) ? target : await this.discover(target);
      urls = await this.collect(sitemapUrl, 0);
    }

    const unique = dedupeUrls(urls);
    if (unique.length === 0) {
      throw new NoUrlsFoundError(`No URLs found in sitemap for ${input}`);
    }
    this.logger.info(`Found ${unique.length} URL(s)`);
    return unique;
  }

  /**
   * Sitemap URL of a domain: robots.txt entries, then well-known paths
   */
  async discover(baseUrl: string): Promise<string> {
    const origin = originOf(baseUrl);
    if (!origin) {
      throw new SitemapError(`Invalid URL: ${baseUrl}`);
    }

    const robotsUrl = `${origin}/robots.txt`;
    this.logger.info(`Looking for a sitemap in ${robotsUrl}`);
    try {
      const response = await this.fetcher(robotsUrl);
      if (response.status === 200) {
        for (const candidate of robotsParser(robotsUrl, response.body).getSitemaps()) {
          this.logger.debug(`robots.txt names ${candidate}`);
          if (await this.isSitemap(candidate)) {
            this.logger.info(`Sitemap found: ${candidate}`);
            return candidate;
          }
        }
      }
    } catch (error) {
      this.logger.info(`robots.txt not reachable: ${errorMessage(error)}`);
    }

    for (const sitemapPath of COMMON_SITEMAP_PATHS) {
      const candidate = `${origin}${sitemapPath}`;
      this.logger.debug(`Trying ${candidate}`);
      if (await this.isSitemap(candidate)) {
        this.logger.info(`Sitemap found: ${candidate}`);
        return candidate;
      }
    }

    throw new SitemapError(
      `No sitemap found for ${baseUrl} (checked robots.txt and ${COMMON_SITEMAP_PATHS.length} common paths). ` +
        `Pass the sitemap URL directly, e.g. ${origin}/path/to/sitemap.xml`
    );
  }

  private async isSitemap(url: string): Promise<boolean> {
    try {
      const response = await this.fetcher(url);
      return response.status === 200 && XML_SIGNATURE.test(response.body.slice(0, 512));
    } catch (error) {
      this.logger.debug(`${url}: ${errorMessage(error)}`);
      return false;
    }
  }

  private async collect(sitemapUrl: string, depth: number): Promise<string[]> {
    const xml = await this.fetchWithRetry(sitemapUrl);
    return this.expand(await parseSitemapXml(xml, sitemapUrl), depth);
  }

  private async expand(parsed: ParsedSitemap, depth: number): Promise<string[]> {
    const urls = parsed.pages.map(sanitizeUrl);
    if (parsed.sitemaps.length === 0) {
      return urls;
    }
    if (depth >= MAX_INDEX_DEPTH) {
      this.logger.warn(`Sitemap index nesting deeper than ${MAX_INDEX_DEPTH} levels, ${parsed.sitemaps.length} sitemap(s) skipped`);
      return urls;
    }
    for (const child of parsed.sitemaps) {
      try {
        urls.push(...(await this.collect(child, depth + 1)));
      } catch (error) {
        this.logger.warn(`Skipping sitemap ${child}: ${errorMessage(error)}`);
      }
    }
    return urls;
  }

  private async fetchWithRetry(url: string): Promise<string> {
    let lastError = '';
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const response = await this.fetcher(url);
        if (response.status >= 200 && response.status < 300) {
          return response.body;
        }
        lastError = `HTTP ${response.status}`;
      } catch (error) {
        lastError = errorMessage(error);
      }
      if (attempt < this.maxAttempts) {
        const delay = this.baseDelayMs * 2 ** (attempt - 1);
        this.logger.warn(`Fetching ${url} failed (${lastError}), retry in ${delay}ms`);
        await this.sleep(delay);
      }
    }
    throw new SitemapError(`Sitemap could not be loaded after ${this.maxAttempts} attempts: ${url} (${lastError})`);
  }
}

/**
 * Page and child sitemap locations of a sitemap or sitemap index document
 */
export async function parseSitemapXml(xml: string, source: string): Promise<ParsedSitemap> {
  let document: unknown;
  try {
    document = await parseStringPromise(xml, { explicitArray: true, trim: true });
  } catch (error) {
    throw new SitemapError(`Sitemap XML could not be parsed (${source}): ${errorMessage(error)}`);
  }
  if (!isPlainObject(document)) {
    return { pages: [], sitemaps: [] };
  }
  return {
    pages: locations(document.urlset, 'url'),
    sitemaps: locations(document.sitemapindex, 'sitemap'),
  };
}

function locations(root: unknown, entryName: string): string[] {
  if (!isPlainObject(root)) return [];
  const entries = root[entryName];
  if (!Array.isArray(entries)) return [];

  const result: string[] = [];
  for (const entry of entries) {
    if (!isPlainObject(entry) || !Array.isArray(entry.loc)) continue;
    const loc = textOf(entry.loc[0]);
    if (loc) result.push(loc);
  }
  return result;
}

/** xml2js yields plain strings, or `{ _: text }` when the element has attributes */
function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') return node.trim() || undefined;
  if (isPlainObject(node) && typeof node._ === 'string') return node._.trim() || undefined;
  return undefined;
}

async function isLocalFile(input: string): Promise<boolean> {
  if (/^https?:\/\//i.test(input)) return false;
  try {
    return (await fs.promises.stat(input)).isFile();
  } catch {
    return false;
  }
}

async function readLocalFile(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SitemapError(`File could not be read: ${filePath} (${errorMessage(error)})`);
  }
}
