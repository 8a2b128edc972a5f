/**
 * Kind of a single observed diagnostic
 */
export enum ErrorKind {
  CONSOLE_ERROR = 'console_error',
  CONSOLE_WARN = 'console_warn',
  CONSOLE_INFO = 'console_info',
  CONSOLE_LOG = 'console_log',
  CONSOLE_DEBUG = 'console_debug',
  PAGE_ERROR = 'page_error',
  CSP_VIOLATION = 'csp_violation',
  REQUEST_FAILED = 'request_failed',
  HTTP_ERROR = 'http_error',
}

/**
 * Status of a scanned page
 */
export enum PageStatus {
  OK = 'ok',
  WARN = 'warn',
  ERROR = 'error',
  IGNORED = 'ignored',
  FAILED = 'failed',
}

/**
 * Overall scan status
 */
export enum ScanStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
  HALTED = 'halted',
}

/**
 * Which console.* messages are captured
 */
export enum ConsoleLevel {
  ERROR = 'error',
  WARN = 'warn',
  ALL = 'all',
}

/**
 * How cookie banners are handled
 */
export enum ConsentMode {
  ACCEPT = 'accept',
  HIDE_ONLY = 'hide-only',
}

/**
 * Typed reasons a single page attempt can fail
 */
export enum AttemptFailureType {
  TIMEOUT = 'timeout',
  NAVIGATION_ERROR = 'navigation_error',
  BROWSER_DISCONNECTED = 'browser_disconnected',
  HTTP_ERROR = 'http_error',
  CANCELLED = 'cancelled',
  BROWSER_UNAVAILABLE = 'browser_unavailable',
}

/**
 * Browser engines
 */
export enum BrowserType {
  CHROMIUM = 'chromium',
  FIREFOX = 'firefox',
  WEBKIT = 'webkit',
}

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

/**
 * Report formats
 */
export enum ReportFormat {
  JSON = 'json',
  HTML = 'html',
  CONSOLE = 'console',
}
