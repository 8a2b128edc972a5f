import { ScanConfiguration } from './config';
import { AttemptFailureType, ErrorKind, PageStatus, ScanStatus } from './enums';

/**
 * Where a diagnostic came from
 */
export interface SourceLocation {
  url: string;
  line?: number;
  column?: number;
}

/**
 * One observed diagnostic on a page
 */
export interface PageError {
  kind: ErrorKind;
  message: string;
  sourceLocation?: SourceLocation;
  /** Epoch ms of the first observation */
  timestamp: number;
  /** Number of times the same (kind, message) was seen on the page */
  occurrenceCount: number;
  /** Matched by a whitelist pattern */
  whitelisted: boolean;
}

/**
 * Result of scanning a single URL
 */
export interface ScanResult {
  url: string;
  status: PageStatus;

  /** Diagnostics in observation order, duplicates collapsed */
  errors: PageError[];

  /** Attempts consumed, including the successful one */
  attemptCount: number;

  /** Time from the first attempt to the terminal state (ms) */
  duration: number;

  /** Navigation time of the last attempt (ms) */
  loadTimeMs?: number;

  /** HTTP status of the root document on the last attempt */
  finalHttpStatus?: number;

  /** Why the URL failed, when status is failed */
  failureReason?: AttemptFailureType;
  failureMessage?: string;
}

/**
 * A diagnostic message that recurs across the scan
 */
export interface TopError {
  kind: ErrorKind;
  /** First line of the message, trimmed and shortened */
  message: string;
  /** Distinct records with this message, at most one per page and message variant */
  count: number;
}

/**
 * Scan-wide counters
 */
export interface ScanSummary {
  scanId: string;
  status: ScanStatus;
  totalUrls: number;
  scannedUrls: number;
  skippedUrls: number;
  notScannedUrls: number;
  byStatus: Record<PageStatus, number>;
  byKind: Record<ErrorKind, number>;
  /** Most frequent non-whitelisted messages, up to ten per kind, kinds in enum order */
  topErrors: TopError[];
  startTime: number;
  endTime: number;
  duration: number;
}

/**
 * Everything an exporter needs. May be produced while a scan is running.
 */
export interface ScanReport {
  scanId: string;
  generatedAt: string;
  status: ScanStatus;
  startTime: number;
  endTime?: number;
  duration: number;
  config: ScanConfiguration;
  summary: ScanSummary;
  results: ScanResult[];
}
