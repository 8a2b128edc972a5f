import axios from 'axios';

import { CancellationToken } from './cancellation';

/**
 * Parse URL and extract components
 */
export function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}

/**
 * Extract hostname from URL
 */
export function extractDomain(url: string): string | null {
  const parsed = parseUrl(url);
  return parsed ? parsed.hostname : null;
}

/**
 * Scheme + host, without path
 */
export function originOf(url: string): string | null {
  const parsed = parseUrl(url);
  return parsed ? parsed.origin : null;
}

/**
 * Case-insensitive substring filter; an empty filter matches everything
 */
export function matchesUrlFilter(url: string, filter?: string): boolean {
  if (!filter) {
    return true;
  }
  return url.toLowerCase().includes(filter.toLowerCase());
}

/**
 * Encode parentheses so terminals keep them part of a clickable URL
 */
export function sanitizeUrl(url: string): string {
  return url.replace(/\(/g, '%28').replace(/\)/g, '%29');
}

/**
 * True when the URL path points at an XML document
 */
export function isSitemapUrl(url: string): boolean {
  const parsed = parseUrl(url);
  return parsed ? parsed.pathname.toLowerCase().endsWith('.xml') : false;
}

/**
 * Prefix https:// when no scheme was given
 */
export function ensureProtocol(input: string): string {
  const trimmed = input.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  return `https://${trimmed}`;
}

/**
 * Remove duplicates, keeping first occurrence order
 */
export function dedupeUrls(urls: readonly string[]): string[] {
  return Array.from(new Set(urls));
}

export interface ReachabilityResult {
  reachable: boolean;
  status?: number;
  error?: string;
  durationMs: number;
}

export type ReachabilityProbe = (
  url: string,
  timeoutMs: number,
  token?: CancellationToken
) => Promise<ReachabilityResult>;

/**
 * Lightweight HEAD request against the target. Any answer below 500 counts
 * as reachable; never throws.
 */
export const probeReachability: ReachabilityProbe = async (url, timeoutMs, token) => {
  const started = Date.now();
  try {
    const response = await axios.head(url, {
      timeout: timeoutMs,
      maxRedirects: 5,
      validateStatus: () => true,
      signal: token?.signal,
    });
    return {
      reachable: response.status < 500,
      status: response.status,
      durationMs: Date.now() - started,
    };
  } catch (error) {
    return {
      reachable: false,
      error: error instanceof Error ? error.message : String(error),
      durationMs: Date.now() - started,
    };
  }
};
