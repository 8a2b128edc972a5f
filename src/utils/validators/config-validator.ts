import { ScanConfiguration } from '../../types/config';
import { BrowserType, ConsentMode, ConsoleLevel, LogLevel, ReportFormat } from '../../types/enums';

const WAIT_STRATEGIES = ['load', 'domcontentloaded', 'networkidle', 'commit'];

/**
 * Validate scan configuration
 */
export function validateScanConfiguration(config: Partial<ScanConfiguration>): {
  valid: boolean;
  errors: string[];
} {
  const errors: string[] = [];

  if (config.concurrency !== undefined && !isPositiveInteger(config.concurrency)) {
    errors.push('Concurrency must be a positive integer');
  }
  if (config.timeoutMs !== undefined && !isPositiveInteger(config.timeoutMs)) {
    errors.push('Timeout must be a positive number of milliseconds');
  }

  // Validate browser config
  if (config.browser) {
    if (!isOneOf(config.browser.type, Object.values(BrowserType))) {
      errors.push('Invalid browser type');
    }
    if (typeof config.browser.headless !== 'boolean') {
      errors.push('Browser headless flag must be a boolean');
    }
  }

  if (config.consoleLevel !== undefined && !isOneOf(config.consoleLevel, Object.values(ConsoleLevel))) {
    errors.push(`Console level must be one of ${Object.values(ConsoleLevel).join(', ')}`);
  }
  if (config.consentMode !== undefined && !isOneOf(config.consentMode, Object.values(ConsentMode))) {
    errors.push(`Consent mode must be one of ${Object.values(ConsentMode).join(', ')}`);
  }
  if (config.logLevel !== undefined && !isOneOf(config.logLevel, Object.values(LogLevel))) {
    errors.push('Invalid log level');
  }
  if (config.waitUntil !== undefined && !WAIT_STRATEGIES.includes(config.waitUntil)) {
    errors.push(`Wait strategy must be one of ${WAIT_STRATEGIES.join(', ')}`);
  }
  if (config.userAgent !== undefined && config.userAgent.trim().length === 0) {
    errors.push('User agent cannot be empty');
  }

  if (config.cookies) {
    config.cookies.forEach((cookie, index) => {
      if (!cookie.name || cookie.name.trim().length === 0) {
        errors.push(`Cookie #${index + 1} has no name`);
      }
      if (typeof cookie.value !== 'string') {
        errors.push(`Cookie '${cookie.name}' has no value`);
      }
    });
  }

  for (const key of ['settleMs', 'cancelGraceMs', 'probeTimeoutMs'] as const) {
    const value = config[key];
    if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
      errors.push(`${key} cannot be negative`);
    }
  }

  if (config.retry) {
    if (!isPositiveInteger(config.retry.maxAttempts)) {
      errors.push('Max attempts must be at least 1');
    }
    if (!Number.isFinite(config.retry.baseDelayMs) || config.retry.baseDelayMs < 0) {
      errors.push('Retry delay cannot be negative');
    }
  }

  // Validate reporting config
  if (config.reporting) {
    if (!config.reporting.outputDir || !isValidPath(config.reporting.outputDir)) {
      errors.push('Output directory is required');
    }
    if (config.reporting.formats.length === 0) {
      errors.push('At least one report format must be specified');
    }
    for (const format of config.reporting.formats) {
      if (!isOneOf(format, Object.values(ReportFormat))) {
        errors.push(`Unknown report format '${format}'`);
      }
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validate URL format
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return ['http:', 'https:'].includes(parsed.protocol);
  } catch {
    return false;
  }
}

/**
 * Validate file path
 */
export function isValidPath(path: string): boolean {
  // Basic validation - check for null bytes and invalid characters
  if (path.includes('\0')) return false;
  if (path.trim().length === 0) return false;
  return true;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

function isOneOf<T extends string>(value: string, allowed: readonly T[]): value is T {
  const values: readonly string[] = allowed;
  return values.includes(value);
}

/**
 * Non-null, non-array object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
