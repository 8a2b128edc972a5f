import * as fs from 'fs';
import * as path from 'path';

import { BrowserConfig, CookieConfig, ReportingConfig, RetryConfig, ScanConfiguration, WaitStrategy } from '../../types/config';
import { BrowserType, ConsentMode, ConsoleLevel, LogLevel, ReportFormat } from '../../types/enums';
import { Logger } from '../../utils/logger/Logger';
import { isPlainObject, validateScanConfiguration } from '../../utils/validators/config-validator';
import { loadWhitelist, parseWhitelist } from '../../utils/whitelist/Whitelist';
import { ConfigurationError, errorMessage } from '../errors';

/** Desktop Chrome; headless markers in the default UA trip bot detection on some sites */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

export const DEFAULT_CONFIG: ScanConfiguration = {
  concurrency: 8,
  timeoutMs: 30000,
  browser: { type: BrowserType.CHROMIUM, headless: true },
  consoleLevel: ConsoleLevel.WARN,
  consentMode: ConsentMode.ACCEPT,
  userAgent: DEFAULT_USER_AGENT,
  cookies: [],
  waitUntil: 'networkidle',
  settleMs: 1000,
  cancelGraceMs: 2000,
  retry: { maxAttempts: 3, baseDelayMs: 5000 },
  probeTimeoutMs: 5000,
  logLevel: LogLevel.INFO,
  reporting: { formats: [ReportFormat.CONSOLE, ReportFormat.JSON], outputDir: 'reports' },
};

/**
 * Partial configuration as it comes from a file or the command line
 */
export type ConfigOverrides = Partial<Omit<ScanConfiguration, 'browser' | 'retry' | 'reporting'>> & {
  browser?: Partial<BrowserConfig>;
  retry?: Partial<RetryConfig>;
  reporting?: Partial<ReportingConfig>;
};

/**
 * Builds the scan configuration: defaults, then a JSON file, then command line overrides.
 */
export class ConfigurationManager {
  private config: ScanConfiguration;
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger?.child('Config') ?? new Logger(LogLevel.INFO, 'Config');
    this.config = cloneConfig(DEFAULT_CONFIG);
  }

  /**
   * Merge a JSON configuration file. A `whitelist` entry may be a path
   * (relative to the file) or an inline whitelist object.
   */
  async loadFromFile(filePath: string): Promise<ScanConfiguration> {
    const resolved = path.resolve(filePath);
    let data: unknown;
    try {
      data = JSON.parse(await fs.promises.readFile(resolved, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError([`Cannot read configuration file ${resolved}: ${errorMessage(error)}`]);
    }
    if (!isPlainObject(data)) {
      throw new ConfigurationError([`Configuration file ${resolved} must contain a JSON object`]);
    }

    const overrides = parseOverrides(data);
    if (typeof data.whitelist === 'string') {
      overrides.whitelist = await loadWhitelist(path.resolve(path.dirname(resolved), data.whitelist), this.logger);
    } else if (data.whitelist !== undefined) {
      overrides.whitelist = parseWhitelist(data.whitelist, resolved, this.logger);
    }

    this.logger.info(`Loaded configuration from ${resolved}`);
    return this.loadFromObject(overrides);
  }

  /**
   * Merge overrides onto the current configuration and validate the result
   */
  loadFromObject(overrides: ConfigOverrides): ScanConfiguration {
    const merged = mergeConfig(this.config, overrides);
    const { valid, errors } = validateScanConfiguration(merged);
    if (!valid) {
      throw new ConfigurationError(errors);
    }
    this.config = merged;
    return this.getConfig();
  }

  getConfig(): ScanConfiguration {
    return cloneConfig(this.config);
  }

  reset(): void {
    this.config = cloneConfig(DEFAULT_CONFIG);
  }
}

export function mergeConfig(base: ScanConfiguration, overrides: ConfigOverrides): ScanConfiguration {
  return cloneConfig({
    concurrency: overrides.concurrency ?? base.concurrency,
    timeoutMs: overrides.timeoutMs ?? base.timeoutMs,
    browser: {
      type: overrides.browser?.type ?? base.browser.type,
      headless: overrides.browser?.headless ?? base.browser.headless,
      args: overrides.browser?.args ?? base.browser.args,
    },
    consoleLevel: overrides.consoleLevel ?? base.consoleLevel,
    consentMode: overrides.consentMode ?? base.consentMode,
    userAgent: overrides.userAgent ?? base.userAgent,
    cookies: overrides.cookies ?? base.cookies,
    urlFilter: overrides.urlFilter ?? base.urlFilter,
    whitelist: overrides.whitelist ?? base.whitelist,
    waitUntil: overrides.waitUntil ?? base.waitUntil,
    settleMs: overrides.settleMs ?? base.settleMs,
    cancelGraceMs: overrides.cancelGraceMs ?? base.cancelGraceMs,
    retry: {
      maxAttempts: overrides.retry?.maxAttempts ?? base.retry.maxAttempts,
      baseDelayMs: overrides.retry?.baseDelayMs ?? base.retry.baseDelayMs,
    },
    probeTimeoutMs: overrides.probeTimeoutMs ?? base.probeTimeoutMs,
    logLevel: overrides.logLevel ?? base.logLevel,
    reporting: {
      formats: overrides.reporting?.formats ?? base.reporting.formats,
      outputDir: overrides.reporting?.outputDir ?? base.reporting.outputDir,
      fileNameTemplate: overrides.reporting?.fileNameTemplate ?? base.reporting.fileNameTemplate,
    },
  });
}

function cloneConfig(config: ScanConfiguration): ScanConfiguration {
  return {
    ...config,
    browser: { ...config.browser, args: config.browser.args ? [...config.browser.args] : undefined },
    cookies: config.cookies.map((cookie) => ({ ...cookie })),
    retry: { ...config.retry },
    reporting: { ...config.reporting, formats: [...config.reporting.formats] },
  };
}

/**
 * Pick the known keys of a parsed JSON object. Values of the wrong type are
 * reported together in one ConfigurationError.
 */
export function parseOverrides(data: Record<string, unknown>): ConfigOverrides {
  const errors: string[] = [];
  const reader = new FieldReader(data, errors, '');
  const overrides: ConfigOverrides = {
    concurrency: reader.number('concurrency'),
    timeoutMs: reader.number('timeoutMs'),
    consoleLevel: reader.oneOf('consoleLevel', Object.values(ConsoleLevel)),
    consentMode: reader.oneOf('consentMode', Object.values(ConsentMode)),
    userAgent: reader.string('userAgent'),
    urlFilter: reader.string('urlFilter'),
    waitUntil: reader.oneOf<WaitStrategy>('waitUntil', ['load', 'domcontentloaded', 'networkidle', 'commit']),
    settleMs: reader.number('settleMs'),
    cancelGraceMs: reader.number('cancelGraceMs'),
    probeTimeoutMs: reader.number('probeTimeoutMs'),
    logLevel: reader.oneOf('logLevel', Object.values(LogLevel)),
    cookies: parseCookies(data.cookies, errors),
  };

  const browser = reader.object('browser');
  if (browser) {
    overrides.browser = {
      type: browser.oneOf('type', Object.values(BrowserType)),
      headless: browser.boolean('headless'),
      args: browser.stringArray('args'),
    };
  }

  const retry = reader.object('retry');
  if (retry) {
    overrides.retry = { maxAttempts: retry.number('maxAttempts'), baseDelayMs: retry.number('baseDelayMs') };
  }

  const reporting = reader.object('reporting');
  if (reporting) {
    const formats = reporting.stringArray('formats');
    overrides.reporting = {
      formats: formats ? parseFormats(formats, errors) : undefined,
      outputDir: reporting.string('outputDir'),
      fileNameTemplate: reporting.string('fileNameTemplate'),
    };
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  return overrides;
}

export function parseFormats(values: readonly string[], errors: string[]): ReportFormat[] {
  const known = Object.values(ReportFormat);
  const formats: ReportFormat[] = [];
  for (const value of values) {
    const format = known.find((candidate) => candidate === value.trim().toLowerCase());
    if (format) {
      formats.push(format);
    } else {
      errors.push(`Unknown report format '${value}'`);
    }
  }
  return formats;
}

function parseCookies(value: unknown, errors: string[]): CookieConfig[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    errors.push("'cookies' must be an array");
    return undefined;
  }
  const cookies: CookieConfig[] = [];
  value.forEach((entry: unknown, index: number) => {
    if (!isPlainObject(entry) || typeof entry.name !== 'string' || typeof entry.value !== 'string') {
      errors.push(`Cookie #${index + 1} needs a string name and value`);
      return;
    }
    const cookie: CookieConfig = { name: entry.name, value: entry.value };
    if (typeof entry.domain === 'string') cookie.domain = entry.domain;
    if (typeof entry.path === 'string') cookie.path = entry.path;
    cookies.push(cookie);
  });
  return cookies;
}

class FieldReader {
  constructor(
    private readonly data: Record<string, unknown>,
    private readonly errors: string[],
    private readonly scope: string
  ) {}

  string(key: string): string | undefined {
    const value = this.data[key];
    if (value === undefined) return undefined;
    if (typeof value === 'string') return value;
    this.errors.push(`'${this.scope}${key}' must be a string`);
    return undefined;
  }

  number(key: string): number | undefined {
    const value = this.data[key];
    if (value === undefined) return undefined;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    this.errors.push(`'${this.scope}${key}' must be a number`);
    return undefined;
  }

  boolean(key: string): boolean | undefined {
    const value = this.data[key];
    if (value === undefined) return undefined;
    if (typeof value === 'boolean') return value;
    this.errors.push(`'${this.scope}${key}' must be true or false`);
    return undefined;
  }

  stringArray(key: string): string[] | undefined {
    const value = this.data[key];
    if (value === undefined) return undefined;
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      return value;
    }
    this.errors.push(`'${this.scope}${key}' must be a list of strings`);
    return undefined;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[]): T | undefined {
    const value = this.data[key];
    if (value === undefined) return undefined;
    const match = allowed.find((candidate) => candidate === value);
    if (match !== undefined) return match;
    this.errors.push(`'${this.scope}${key}' must be one of ${allowed.join(', ')}`);
    return undefined;
  }

  object(key: string): FieldReader | undefined {
    const value = this.data[key];
    if (value === undefined) return undefined;
    if (isPlainObject(value)) return new FieldReader(value, this.errors, `${this.scope}${key}.`);
    this.errors.push(`'${this.scope}${key}' must be an object`);
    return undefined;
  }
}
