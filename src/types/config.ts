import { BrowserType, ConsentMode, ConsoleLevel, LogLevel, ReportFormat } from './enums';

/**
 * Main scan configuration. Frozen for the duration of a scan.
 */
export interface ScanConfiguration {
  /** Max concurrently active page sessions */
  concurrency: number;

  /** Per-attempt navigation timeout (ms) */
  timeoutMs: number;

  /** Browser configuration */
  browser: BrowserConfig;

  /** Which console messages are recorded */
  consoleLevel: ConsoleLevel;

  /** Cookie banner handling */
  consentMode: ConsentMode;

  /** User agent sent by every session */
  userAgent: string;

  /** Cookies set on the target host before navigation */
  cookies: CookieConfig[];

  /** Only URLs containing this substring (case-insensitive) are scanned */
  urlFilter?: string;

  /** Known diagnostics to mark as whitelisted */
  whitelist?: WhitelistSet;

  /** Navigation wait strategy */
  waitUntil: WaitStrategy;

  /** Passive observation time after load and consent handling (ms) */
  settleMs: number;

  /** How long in-flight attempts may run after cancellation (ms) */
  cancelGraceMs: number;

  /** Retry configuration */
  retry: RetryConfig;

  /** Timeout of the reachability probe before retries (ms) */
  probeTimeoutMs: number;

  /** Log level */
  logLevel: LogLevel;

  /** Reporting configuration */
  reporting: ReportingConfig;
}

export type WaitStrategy = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';

/**
 * Browser launch configuration
 */
export interface BrowserConfig {
  type: BrowserType;
  headless: boolean;
  /** Extra launch arguments */
  args?: string[];
}

/**
 * Cookie configuration. Domain defaults to the host of the scanned URL.
 */
export interface CookieConfig {
  name: string;
  value: string;
  domain?: string;
  path?: string;
}

export interface RetryConfig {
  /** Attempts per URL, including the first */
  maxAttempts: number;
  /** Delay after the first failed attempt; doubles afterwards (ms) */
  baseDelayMs: number;
}

/**
 * Reporting configuration
 */
export interface ReportingConfig {
  formats: ReportFormat[];
  outputDir: string;
  /** File name with a {{scanId}} placeholder and no extension */
  fileNameTemplate?: string;
}

/**
 * Loaded whitelist. Patterns use `*` and `?` wildcards and match case-insensitively.
 */
export interface WhitelistSet {
  readonly description: string;
  readonly patterns: readonly string[];
  /** File the whitelist was loaded from */
  readonly source?: string;
}
