import { AttemptFailureType } from '../types/enums';
import { AttemptFailure, ScanFatalReason } from '../types/events';

/**
 * A single page attempt failed in a typed, retryable way
 */
export class AttemptError extends Error {
  readonly type: AttemptFailureType;
  readonly httpStatus?: number;

  constructor(type: AttemptFailureType, message: string, httpStatus?: number) {
    super(message);
    this.name = 'AttemptError';
    this.type = type;
    this.httpStatus = httpStatus;
  }

  toFailure(): AttemptFailure {
    return { type: this.type, message: this.message, httpStatus: this.httpStatus };
  }
}

/**
 * The browser process behind a handle crashed or the connection dropped
 */
export class BrowserDisconnectedError extends Error {
  constructor(message = 'Browser disconnected') {
    super(message);
    this.name = 'BrowserDisconnectedError';
  }
}

/**
 * The browser pool could not be recovered; no new sessions can start
 */
export class SupervisorHaltedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SupervisorHaltedError';
  }
}

/**
 * The wait was interrupted by scan cancellation
 */
export class CancelledError extends Error {
  constructor(message = 'Scan cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Condition that stops the whole scan
 */
export class ScanFatalError extends Error {
  readonly reason: ScanFatalReason;

  constructor(reason: ScanFatalReason, message: string) {
    super(message);
    this.name = 'ScanFatalError';
    this.reason = reason;
  }
}

export class NoUrlsFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NoUrlsFoundError';
  }
}

/**
 * A sitemap could not be found, fetched or parsed
 */
export class SitemapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SitemapError';
  }
}

export class ConfigurationError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`);
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

export class WhitelistError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WhitelistError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
