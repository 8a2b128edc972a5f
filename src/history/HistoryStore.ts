import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { errorMessage } from '../core/errors';
import { CookieConfig } from '../types/config';
import { ConsentMode, ConsoleLevel, LogLevel } from '../types/enums';
import { extractDomain } from '../utils/helpers/network-helpers';
import { Logger } from '../utils/logger/Logger';
import { isPlainObject } from '../utils/validators/config-validator';

export const DEFAULT_STATE_DIR = path.join(os.homedir(), '.console-error-scanner');

/**
 * Parameters of a past scan, enough to run it again
 */
export interface HistoryEntry {
  source: string;
  /** ISO timestamp, seconds precision */
  timestamp: string;
  user: string;
  concurrency: number;
  timeoutMs: number;
  consoleLevel: ConsoleLevel;
  urlFilter?: string;
  userAgent?: string;
  cookies: CookieConfig[];
  whitelistPath?: string;
  consentMode: ConsentMode;
}

export interface HistoryStoreOptions {
  dir?: string;
  maxEntries?: number;
  logger?: Logger;
  now?: () => Date;
  currentUser?: () => string;
}

/**
 * Scan history in `<dir>/history.json`, newest first
 */
export class HistoryStore {
  readonly filePath: string;
  private readonly maxEntries: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly currentUser: () => string;

  constructor(options: HistoryStoreOptions = {}) {
    this.filePath = path.join(options.dir ?? DEFAULT_STATE_DIR, 'history.json');
    this.maxEntries = options.maxEntries ?? 50;
    this.logger = options.logger?.child('History') ?? new Logger(LogLevel.INFO, 'History');
    this.now = options.now ?? (() => new Date());
    this.currentUser = options.currentUser ?? osUser;
  }

  /**
   * Stored entries; an unreadable file yields an empty list
   */
  async load(): Promise<HistoryEntry[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return [];
      this.logger.warn(`History could not be read: ${errorMessage(error)}`);
      return [];
    }

    try {
      const data: unknown = JSON.parse(raw);
      if (!Array.isArray(data)) return [];
      return data.flatMap((item: unknown) => {
        const entry = toEntry(item);
        return entry ? [entry] : [];
      });
    } catch (error) {
      this.logger.warn(`History could not be parsed: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Prepend an entry, filling in timestamp and user, and trim to the maximum
   */
  async add(entry: Omit<HistoryEntry, 'timestamp' | 'user'> & Partial<Pick<HistoryEntry, 'timestamp' | 'user'>>): Promise<HistoryEntry> {
    const complete: HistoryEntry = {
      ...entry,
      timestamp: entry.timestamp || this.now().toISOString().slice(0, 19),
      user: entry.user || this.currentUser(),
    };
    const entries = [complete, ...(await this.load())].slice(0, this.maxEntries);
    await this.save(entries);
    return complete;
  }

  async save(entries: HistoryEntry[]): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(this.filePath, JSON.stringify(entries, null, 2), 'utf-8');
    } catch (error) {
      this.logger.warn(`History could not be saved: ${errorMessage(error)}`);
    }
  }
}

/**
 * One-line description: `2026-02-13 14:30 | www.example.com | --cookie session | --no-consent`
 */
export function label(entry: HistoryEntry): string {
  const datePart = entry.timestamp ? entry.timestamp.slice(0, 16).replace('T', ' ') : '?';
  const parts = [datePart, extractDomain(entry.source) || entry.source];
  if (entry.cookies.length > 0) {
    parts.push(`--cookie ${entry.cookies.map((cookie) => cookie.name).join(', ')}`);
  }
  if (entry.whitelistPath) parts.push(`--whitelist ${entry.whitelistPath}`);
  if (entry.urlFilter) parts.push(`--filter ${entry.urlFilter}`);
  if (entry.userAgent) parts.push('--user-agent ...');
  if (entry.consentMode === ConsentMode.HIDE_ONLY) parts.push('--no-consent');
  return parts.join(' | ');
}

function toEntry(item: unknown): HistoryEntry | undefined {
  if (!isPlainObject(item) || typeof item.source !== 'string') {
    return undefined;
  }
  const cookies = Array.isArray(item.cookies)
    ? item.cookies.flatMap((cookie: unknown): CookieConfig[] =>
        isPlainObject(cookie) && typeof cookie.name === 'string' && typeof cookie.value === 'string'
          ? [{ name: cookie.name, value: cookie.value }]
          : []
      )
    : [];
  return {
    source: item.source,
    timestamp: typeof item.timestamp === 'string' ? item.timestamp : '',
    user: typeof item.user === 'string' ? item.user : '',
    concurrency: typeof item.concurrency === 'number' ? item.concurrency : 8,
    timeoutMs: typeof item.timeoutMs === 'number' ? item.timeoutMs : 30000,
    consoleLevel: Object.values(ConsoleLevel).find((level) => level === item.consoleLevel) ?? ConsoleLevel.WARN,
    urlFilter: typeof item.urlFilter === 'string' ? item.urlFilter : undefined,
    userAgent: typeof item.userAgent === 'string' ? item.userAgent : undefined,
    cookies,
    whitelistPath: typeof item.whitelistPath === 'string' ? item.whitelistPath : undefined,
    consentMode: item.consentMode === ConsentMode.HIDE_ONLY ? ConsentMode.HIDE_ONLY : ConsentMode.ACCEPT,
  };
}

function osUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    return 'unknown';
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
