import { ErrorKind, PageStatus } from '../../types/enums';
import { PageError } from '../../types/scan-result';
import { isWhitelisted } from '../../utils/patterns/whitelist-matcher';

import { ClassifiedDiagnostic } from './DiagnosticClassifier';

/**
 * Kinds that turn a page red when not whitelisted
 */
export const ERROR_CLASS_KINDS: ReadonlySet<ErrorKind> = new Set([
  ErrorKind.CONSOLE_ERROR,
  ErrorKind.PAGE_ERROR,
  ErrorKind.CSP_VIOLATION,
  ErrorKind.HTTP_ERROR,
]);

export function isErrorClass(kind: ErrorKind): boolean {
  return ERROR_CLASS_KINDS.has(kind);
}

/**
 * Trim and collapse whitespace runs
 */
export function normalizeMessage(message: string): string {
  return message.trim().replace(/\s+/g, ' ');
}

export function dedupKey(kind: ErrorKind, message: string): string {
  return `${kind}\u0000${normalizeMessage(message)}`;
}

/**
 * Page status from its diagnostics. `failed` is never derived here.
 */
export function deriveStatus(errors: readonly PageError[]): PageStatus {
  if (errors.length === 0) {
    return PageStatus.OK;
  }

  let hasWarning = false;
  for (const error of errors) {
    if (error.whitelisted) continue;
    if (isErrorClass(error.kind)) {
      return PageStatus.ERROR;
    }
    hasWarning = true;
  }

  return hasWarning ? PageStatus.WARN : PageStatus.IGNORED;
}

/**
 * Collects the diagnostics of one page attempt.
 * Repeats of (kind, normalized message) increment the occurrence count of the
 * first record; new records are tagged against the whitelist on insertion.
 */
export class ErrorCollector {
  private readonly errors: PageError[] = [];
  private readonly byKey = new Map<string, PageError>();
  private status: PageStatus = PageStatus.OK;

  constructor(
    private readonly whitelistPatterns: readonly string[] = [],
    private readonly now: () => number = Date.now
  ) {}

  add(diagnostic: ClassifiedDiagnostic): { error: PageError; isNew: boolean } {
    const key = dedupKey(diagnostic.kind, diagnostic.message);
    const existing = this.byKey.get(key);
    if (existing) {
      existing.occurrenceCount += 1;
      return { error: existing, isNew: false };
    }

    const error: PageError = {
      kind: diagnostic.kind,
      message: diagnostic.message,
      timestamp: this.now(),
      occurrenceCount: 1,
      whitelisted: isWhitelisted(diagnostic.message, this.whitelistPatterns),
    };
    if (diagnostic.sourceLocation) {
      error.sourceLocation = diagnostic.sourceLocation;
    }

    this.byKey.set(key, error);
    this.errors.push(error);
    this.status = deriveStatus(this.errors);
    return { error, isNew: true };
  }

  getStatus(): PageStatus {
    return this.status;
  }

  /**
   * Copies of the collected errors in observation order
   */
  getErrors(): PageError[] {
    return this.errors.map((error) => ({ ...error }));
  }

  get size(): number {
    return this.errors.length;
  }
}
