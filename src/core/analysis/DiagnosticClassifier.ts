import { ConsoleLevel, ErrorKind } from '../../types/enums';
import { SourceLocation } from '../../types/scan-result';
import { RawDiagnostic } from '../interfaces/IBrowserDriver';

/**
 * A raw diagnostic after classification, not yet deduplicated
 */
export interface ClassifiedDiagnostic {
  kind: ErrorKind;
  message: string;
  sourceLocation?: SourceLocation;
}

/** Chromium repeats every failing sub-resource on the console; the response listener already has them */
const FAILED_RESOURCE_PREFIX = 'Failed to load resource:';

/** Requests cancelled by navigation */
const ABORTED_REQUEST = 'net::ERR_ABORTED';

const CONSOLE_KINDS: Record<string, ErrorKind> = {
  error: ErrorKind.CONSOLE_ERROR,
  assert: ErrorKind.CONSOLE_ERROR,
  warning: ErrorKind.CONSOLE_WARN,
  warn: ErrorKind.CONSOLE_WARN,
  info: ErrorKind.CONSOLE_INFO,
  log: ErrorKind.CONSOLE_LOG,
  debug: ErrorKind.CONSOLE_DEBUG,
  trace: ErrorKind.CONSOLE_DEBUG,
};

/**
 * Whether a diagnostic of this kind is recorded at the given console level.
 * Only console kinds are filtered; errors, CSP and network diagnostics are always kept.
 */
export function isCapturedAtLevel(kind: ErrorKind, level: ConsoleLevel): boolean {
  switch (kind) {
    case ErrorKind.CONSOLE_WARN:
      return level === ConsoleLevel.WARN || level === ConsoleLevel.ALL;
    case ErrorKind.CONSOLE_INFO:
    case ErrorKind.CONSOLE_LOG:
    case ErrorKind.CONSOLE_DEBUG:
      return level === ConsoleLevel.ALL;
    default:
      return true;
  }
}

function location(url: string | undefined, line?: number, column?: number): SourceLocation | undefined {
  if (!url) {
    return undefined;
  }
  const loc: SourceLocation = { url };
  if (line) loc.line = line;
  if (column) loc.column = column;
  return loc;
}

/**
 * Map a raw page event to a PageError candidate, or null when it is dropped
 */
export function classifyDiagnostic(event: RawDiagnostic, level: ConsoleLevel): ClassifiedDiagnostic | null {
  let classified: ClassifiedDiagnostic | null = null;

  switch (event.type) {
    case 'console': {
      if (event.text.startsWith(FAILED_RESOURCE_PREFIX)) {
        return null;
      }
      classified = {
        kind: CONSOLE_KINDS[event.level] ?? ErrorKind.CONSOLE_LOG,
        message: event.text,
        sourceLocation: location(event.location?.url, event.location?.line, event.location?.column),
      };
      break;
    }

    case 'pageerror':
      classified = { kind: ErrorKind.PAGE_ERROR, message: event.message || '(unknown error)' };
      break;

    case 'response':
      if (event.status < 400) {
        return null;
      }
      classified = {
        kind: ErrorKind.HTTP_ERROR,
        message: `HTTP ${event.status}: ${event.url}`,
        sourceLocation: location(event.url),
      };
      break;

    case 'requestfailed':
      if (event.errorText.includes(ABORTED_REQUEST)) {
        return null;
      }
      classified = {
        kind: ErrorKind.REQUEST_FAILED,
        message: `Request failed: ${event.errorText} - ${event.url}`,
        sourceLocation: location(event.url),
      };
      break;

    case 'csp': {
      const prefix = event.reportOnly ? 'CSP report-only' : 'CSP violation';
      let message = `${prefix}: '${event.directive}'`;
      if (event.blockedUrl) {
        message += ` blocked ${event.blockedUrl}`;
      }
      classified = {
        kind: ErrorKind.CSP_VIOLATION,
        message,
        sourceLocation: location(event.sourceUrl || event.blockedUrl, event.line),
      };
      break;
    }

    case 'browserlog':
      classified = classifyBrowserLog(event.source, event.text, event.url, event.line, level);
      break;
  }

  if (classified && !isCapturedAtLevel(classified.kind, level)) {
    return null;
  }
  return classified;
}

function classifyBrowserLog(
  source: string,
  text: string,
  url: string | undefined,
  line: number | undefined,
  level: ConsoleLevel
): ClassifiedDiagnostic | null {
  const sourceLocation = location(url, line);
  switch (source) {
    case 'security':
    case 'violation':
      return { kind: ErrorKind.CSP_VIOLATION, message: `CSP violation: ${text}`, sourceLocation };
    case 'intervention':
      return { kind: ErrorKind.CONSOLE_WARN, message: `Intervention: ${text}`, sourceLocation };
    case 'deprecation':
      return level === ConsoleLevel.ALL
        ? { kind: ErrorKind.CONSOLE_WARN, message: `Deprecation: ${text}`, sourceLocation }
        : null;
    default:
      return null;
  }
}
