import { ScanConfiguration } from '../../types/config';
import { ErrorKind, PageStatus, ScanStatus } from '../../types/enums';
import { ScanResult, ScanSummary, TopError } from '../../types/scan-result';

const TOP_ERRORS_PER_KIND = 10;
const MAX_TOP_MESSAGE_LENGTH = 120;

export interface SummaryInput {
  scanId: string;
  status: ScanStatus;
  /** Unique input URLs, including filtered ones */
  totalUrls: number;
  skippedUrls: number;
  results: readonly ScanResult[];
  startTime: number;
  endTime: number;
}

export function emptyStatusCounts(): Record<PageStatus, number> {
  return { ok: 0, warn: 0, error: 0, ignored: 0, failed: 0 };
}

export function emptyKindCounts(): Record<ErrorKind, number> {
  return {
    console_error: 0,
    console_warn: 0,
    console_info: 0,
    console_log: 0,
    console_debug: 0,
    page_error: 0,
    csp_violation: 0,
    request_failed: 0,
    http_error: 0,
  };
}

/**
 * Scan-wide counters. Error kinds count distinct records, not occurrences.
 */
export function buildSummary(input: SummaryInput): ScanSummary {
  const byStatus = emptyStatusCounts();
  const byKind = emptyKindCounts();

  for (const result of input.results) {
    byStatus[result.status] += 1;
    for (const error of result.errors) {
      byKind[error.kind] += 1;
    }
  }

  return {
    scanId: input.scanId,
    status: input.status,
    totalUrls: input.totalUrls,
    scannedUrls: input.results.length,
    skippedUrls: input.skippedUrls,
    notScannedUrls: Math.max(0, input.totalUrls - input.skippedUrls - input.results.length),
    byStatus,
    byKind,
    topErrors: collectTopErrors(input.results),
    startTime: input.startTime,
    endTime: input.endTime,
    duration: Math.max(0, input.endTime - input.startTime),
  };
}

/**
 * Group non-whitelisted diagnostics by kind and first message line. Each kind
 * keeps its `limit` most frequent messages; ties keep the order first seen.
 */
export function collectTopErrors(results: readonly ScanResult[], limit = TOP_ERRORS_PER_KIND): TopError[] {
  const counts = new Map<ErrorKind, Map<string, number>>();
  for (const result of results) {
    for (const error of result.errors) {
      if (error.whitelisted) continue;
      const message = headline(error.message);
      const byMessage = counts.get(error.kind) ?? new Map<string, number>();
      byMessage.set(message, (byMessage.get(message) ?? 0) + 1);
      counts.set(error.kind, byMessage);
    }
  }

  return Object.values(ErrorKind).flatMap((kind) =>
    Array.from(counts.get(kind) ?? new Map<string, number>(), ([message, count]): TopError => ({ kind, message, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, limit)
  );
}

/**
 * First line of a message, trimmed; long lines end in "..."
 */
export function headline(message: string): string {
  const firstLine = message.split(/\r?\n/)[0].trim();
  if (!firstLine) {
    return '(empty)';
  }
  return firstLine.length > MAX_TOP_MESSAGE_LENGTH
    ? `${firstLine.slice(0, MAX_TOP_MESSAGE_LENGTH - 3)}...`
    : firstLine;
}

/**
 * Configuration as it may appear in exported reports: cookie values are replaced
 */
export function redactConfig(config: ScanConfiguration): ScanConfiguration {
  return {
    ...config,
    cookies: config.cookies.map((cookie) => ({ ...cookie, value: '***' })),
  };
}

/**
 * Deep-frozen copy of a configuration, used as the snapshot of one scan
 */
export function freezeConfig(config: ScanConfiguration): Readonly<ScanConfiguration> {
  const snapshot: ScanConfiguration = {
    ...config,
    browser: { ...config.browser, args: config.browser.args ? [...config.browser.args] : undefined },
    cookies: config.cookies.map((cookie) => Object.freeze({ ...cookie })),
    retry: { ...config.retry },
    reporting: { ...config.reporting, formats: [...config.reporting.formats] },
  };
  Object.freeze(snapshot.cookies);
  Object.freeze(snapshot.browser);
  Object.freeze(snapshot.retry);
  Object.freeze(snapshot.reporting.formats);
  Object.freeze(snapshot.reporting);
  return Object.freeze(snapshot);
}
