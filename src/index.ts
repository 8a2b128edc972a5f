/**
 * Console Error Scanner
 * Visits every page of a sitemap in a real browser and reports console errors,
 * uncaught exceptions, CSP violations and failing requests.
 *
 * @packageDocumentation
 */

export * from './types';
export * from './core/errors';

export { ScanEngine, type ScanEngineOptions } from './core/engine/ScanEngine';
export { RetryPolicy, DEFAULT_RETRY, type RetryDecision } from './core/engine/RetryPolicy';
export { BrowserPoolSupervisor } from './core/browser/BrowserPoolSupervisor';
export { PlaywrightDriver } from './core/browser/PlaywrightDriver';
export { PageSession, type AttemptOutcome } from './core/session/PageSession';
export { ConsentHandler } from './core/consent/ConsentHandler';
export { ConfigurationManager, DEFAULT_CONFIG, type ConfigOverrides } from './core/config/ConfigurationManager';
export type {
  IBrowserDriver,
  IBrowserProcess,
  BrowserHandle,
  HandleOptions,
  RawDiagnostic,
} from './core/interfaces/IBrowserDriver';

export { HttpSitemapSource, parseSitemapXml, type ISitemapSource } from './sitemap/SitemapSource';
export { HistoryStore, label as historyLabel, type HistoryEntry } from './history/HistoryStore';
export { SettingsStore, type Settings } from './history/SettingsStore';

export { loadWhitelist, parseWhitelist } from './utils/whitelist/Whitelist';
export { Logger, createLogger, type LogSink } from './utils/logger/Logger';

export { ConsoleReporter, JsonReporter, HtmlReporter, BaseReporter, createReporter, bindReporters } from './reporters';
export type { IReporter, ReporterInitOptions } from './reporters';
