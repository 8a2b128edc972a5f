import { EventEmitter } from 'events';

import { v4 as uuidv4 } from 'uuid';

import { ScanConfiguration } from '../../types/config';
import { AttemptFailureType, ConsentMode, LogLevel, PageStatus, ScanStatus } from '../../types/enums';
import { AttemptFailure, ScanEventName, ScanEvents, ScanFatalReason } from '../../types/events';
import { PageError, ScanReport, ScanResult, ScanSummary } from '../../types/scan-result';
import { CancellationToken, Sleeper, raceWithCancellation, sleep } from '../../utils/helpers/cancellation';
import { ReachabilityProbe, matchesUrlFilter, probeReachability } from '../../utils/helpers/network-helpers';
import { Logger } from '../../utils/logger/Logger';
import { isValidUrl, validateScanConfiguration } from '../../utils/validators/config-validator';
import { BrowserPoolSupervisor } from '../browser/BrowserPoolSupervisor';
import { PlaywrightDriver } from '../browser/PlaywrightDriver';
import { ConsentHandler } from '../consent/ConsentHandler';
import { CancelledError, ScanFatalError, SupervisorHaltedError, errorMessage } from '../errors';
import { BrowserHandle, IBrowserDriver } from '../interfaces/IBrowserDriver';
import { AttemptOutcome, PageSession, toFailure } from '../session/PageSession';

import { RetryDecision, RetryPolicy } from './RetryPolicy';
import { buildSummary, freezeConfig, redactConfig } from './summary';

export interface ScanEngineOptions {
  /** Browser binding used when no supervisor is given; Playwright by default */
  driver?: IBrowserDriver;
  /** Pre-built pool; the engine starts it but does not close it after a scan */
  supervisor?: BrowserPoolSupervisor;
  consentHandler?: ConsentHandler;
  sleep?: Sleeper;
  probe?: ReachabilityProbe;
  logger?: Logger;
}

interface ActivePage {
  url: string;
  startTime: number;
  attempt: number;
  session?: PageSession;
}

interface ScanState {
  scanId: string;
  config: Readonly<ScanConfiguration>;
  status: ScanStatus;
  startTime: number;
  endTime?: number;
  totalUrls: number;
  skippedUrls: number;
  queue: string[];
  total: number;
  started: number;
  results: ScanResult[];
  active: Map<string, ActivePage>;
  /** Stops dequeuing and interrupts lease, probe and backoff waits */
  dequeue: CancellationToken;
  /** Aborts in-flight attempts once the grace period is over */
  abort: CancellationToken;
  graceTimer?: NodeJS.Timeout;
  halted: boolean;
  fatalEmitted: boolean;
}

/**
 * ScanEngine - orchestrates a console error scan over a list of URLs.
 *
 * Up to `concurrency` URLs are scanned at once. Each URL runs through the retry
 * policy until it succeeds or fails for good, and `pageFinished` is emitted once
 * per started URL. Progress is published as events (see ScanEvents).
 */
export class ScanEngine extends EventEmitter {
  private readonly logger: Logger;
  private readonly driver: IBrowserDriver;
  private readonly sleep: Sleeper;
  private readonly probe: ReachabilityProbe;
  private logEventsMuted = false;
  private supervisor: BrowserPoolSupervisor | null = null;
  private consentMode: ConsentMode | null = null;
  private state: ScanState | null = null;
  private running = false;

  constructor(private readonly options: ScanEngineOptions = {}) {
    super();
    this.logger = (options.logger ?? new Logger(LogLevel.INFO)).child('ScanEngine');
    this.logger.addSink((level, line) => {
      this.emitEvent('log', { level, message: line });
    });
    this.driver = options.driver ?? new PlaywrightDriver(this.logger);
    this.sleep = options.sleep ?? sleep;
    this.probe = options.probe ?? probeReachability;
  }

  /**
   * Scan the given URLs. Resolves with the summary once every URL is terminal,
   * filtered, or left out because of cancellation or a halted browser pool.
   * Rejects with ScanFatalError when the scan cannot start.
   */
  async startScan(urls: readonly string[], config: ScanConfiguration): Promise<ScanSummary> {
    if (this.running) {
      throw new Error('A scan is already running');
    }
    this.running = true;

    try {
      const snapshot = this.prepare(urls, config);
      this.logger.setLevel(snapshot.config.logLevel);
      return await this.run(snapshot);
    } finally {
      this.running = false;
    }
  }

  /**
   * Stop dequeuing now; in-flight attempts are aborted after the grace period
   */
  cancelScan(): void {
    const state = this.state;
    if (!this.running || !state || state.dequeue.isCancelled) {
      return;
    }
    this.logger.warn(`Cancelling scan; in-flight pages get ${state.config.cancelGraceMs}ms to finish`);
    state.dequeue.cancel();
    state.graceTimer = setTimeout(() => state.abort.cancel(), state.config.cancelGraceMs);
    state.graceTimer.unref();
  }

  /**
   * Finalized results plus the partial result of every page in progress
   */
  getCurrentResults(): ScanResult[] {
    const state = this.state;
    if (!state) {
      return [];
    }
    const now = Date.now();
    const partial = Array.from(state.active.values()).map((page): ScanResult => {
      const snapshot = page.session?.snapshot() ?? { errors: [], status: PageStatus.OK };
      return {
        url: page.url,
        status: snapshot.status,
        errors: snapshot.errors,
        attemptCount: page.attempt,
        duration: now - page.startTime,
      };
    });
    return [...state.results.map(copyResult), ...partial];
  }

  /**
   * Report of the current or last scan, safe to export while scanning
   */
  getReport(): ScanReport {
    const state = this.state;
    if (!state) {
      throw new Error('No scan has been started');
    }
    const results = this.getCurrentResults();
    const endTime = state.endTime ?? Date.now();
    return {
      scanId: state.scanId,
      generatedAt: new Date().toISOString(),
      status: state.status,
      startTime: state.startTime,
      endTime: state.endTime,
      duration: endTime - state.startTime,
      config: redactConfig(state.config),
      summary: this.summarize(state, endTime, results),
      results,
    };
  }

  /**
   * Consent mode for the next scan; a running scan keeps its configuration
   */
  setConsentMode(mode: ConsentMode): void {
    this.consentMode = mode;
    this.logger.info(`Consent mode set to '${mode}'${this.running ? ' (applies to the next scan)' : ''}`);
  }

  isRunning(): boolean {
    return this.running;
  }

  async dispose(): Promise<void> {
    this.cancelScan();
    const supervisor = this.options.supervisor ?? this.supervisor;
    this.supervisor = null;
    if (supervisor) {
      await supervisor.close();
    }
  }

  override on<K extends ScanEventName>(event: K, listener: (payload: ScanEvents[K]) => void): this {
    return super.on(event, listener);
  }

  override once<K extends ScanEventName>(event: K, listener: (payload: ScanEvents[K]) => void): this {
    return super.once(event, listener);
  }

  /**
   * Listener failures are logged and never reach the scan. While a failing
   * `log` listener is reported, log lines are not re-emitted to it.
   */
  private emitEvent<K extends ScanEventName>(event: K, payload: ScanEvents[K]): void {
    if (event === 'log' && this.logEventsMuted) return;
    try {
      this.emit(event, payload);
    } catch (error) {
      this.logEventsMuted = event === 'log';
      try {
        this.logger.warn(`'${event}' listener failed: ${errorMessage(error)}`);
      } finally {
        this.logEventsMuted = false;
      }
    }
  }

  /**
   * Validate input, apply filter and de-duplication, freeze the configuration
   */
  private prepare(urls: readonly string[], config: ScanConfiguration): ScanState {
    const { valid, errors } = validateScanConfiguration(config);
    if (!valid) {
      throw this.fatal('invalid_input', `Invalid configuration: ${errors.join('; ')}`);
    }
    if (!Array.isArray(urls)) {
      throw this.fatal('invalid_input', 'URL list must be an array');
    }
    const invalid = urls.filter((url) => typeof url !== 'string' || !isValidUrl(url));
    if (invalid.length > 0) {
      throw this.fatal('invalid_input', `Invalid URL(s): ${invalid.slice(0, 5).join(', ')}`);
    }
    if (urls.length === 0) {
      throw this.fatal('no_urls', 'No URLs to scan');
    }

    const frozen = freezeConfig(this.consentMode ? { ...config, consentMode: this.consentMode } : config);
    const unique: string[] = [];
    const seen = new Set<string>();
    let skipped = 0;
    for (const url of urls) {
      if (seen.has(url)) {
        this.emitEvent('urlSkipped', { url, reason: 'duplicate' });
        continue;
      }
      seen.add(url);
      unique.push(url);
    }

    const queue: string[] = [];
    for (const url of unique) {
      if (matchesUrlFilter(url, frozen.urlFilter)) {
        queue.push(url);
      } else {
        skipped += 1;
        this.emitEvent('urlSkipped', { url, reason: 'filtered' });
      }
    }
    if (queue.length === 0) {
      throw this.fatal('no_urls', `No URLs match filter '${frozen.urlFilter ?? ''}'`);
    }

    return {
      scanId: uuidv4(),
      config: frozen,
      status: ScanStatus.PENDING,
      startTime: Date.now(),
      totalUrls: unique.length,
      skippedUrls: skipped,
      queue,
      total: queue.length,
      started: 0,
      results: [],
      active: new Map(),
      dequeue: new CancellationToken(),
      abort: new CancellationToken(),
      halted: false,
      fatalEmitted: false,
    };
  }

  private async run(state: ScanState): Promise<ScanSummary> {
    const { config } = state;
    const supervisor =
      this.options.supervisor ??
      new BrowserPoolSupervisor(this.driver, {
        concurrency: config.concurrency,
        browser: config.browser,
        logger: this.logger,
      });
    const ownsSupervisor = !this.options.supervisor;
    const consentHandler = this.options.consentHandler ?? new ConsentHandler({}, this.logger.child('Consent'));
    const retryPolicy = new RetryPolicy(config.retry);

    this.state = state;
    this.supervisor = supervisor;
    state.status = ScanStatus.RUNNING;
    this.emitEvent('scanStarted', { scanId: state.scanId, total: state.total, config: redactConfig(config) });
    this.logger.info(`Scan ${state.scanId} started: ${state.total} URL(s), concurrency ${config.concurrency}`);

    const onRestarted = (payload: { generation: number }): void => {
      this.emitEvent('browserRestarted', payload);
    };
    const onFatal = (error: SupervisorHaltedError): void => {
      state.halted = true;
      if (!state.fatalEmitted) {
        state.fatalEmitted = true;
        this.emitEvent('scanFatal', { reason: 'browser_restart_failed', message: error.message });
      }
    };
    supervisor.on('restarted', onRestarted);
    supervisor.on('fatal', onFatal);

    try {
      try {
        await supervisor.start();
      } catch (error) {
        state.status = ScanStatus.HALTED;
        state.endTime = Date.now();
        throw this.fatal('browser_launch_failed', `Browser could not be launched: ${errorMessage(error)}`);
      }

      const workers = Math.min(config.concurrency, state.queue.length);
      await Promise.all(
        Array.from({ length: workers }, () => this.worker(state, supervisor, consentHandler, retryPolicy))
      );

      if (state.halted) {
        state.status = ScanStatus.HALTED;
      } else if (state.dequeue.isCancelled) {
        state.status = ScanStatus.CANCELLED;
      } else {
        state.status = ScanStatus.COMPLETED;
      }
      state.endTime = Date.now();

      const summary = this.summarize(state, state.endTime, state.results);
      this.logger.info(
        `Scan ${state.scanId} ${state.status}: ${summary.scannedUrls}/${summary.totalUrls} scanned in ${summary.duration}ms`
      );
      this.emitEvent('scanCompleted', summary);
      return summary;
    } finally {
      clearTimeout(state.graceTimer);
      supervisor.off('restarted', onRestarted);
      supervisor.off('fatal', onFatal);
      if (ownsSupervisor) {
        this.supervisor = null;
        await supervisor.close();
      }
    }
  }

  private async worker(
    state: ScanState,
    supervisor: BrowserPoolSupervisor,
    consentHandler: ConsentHandler,
    retryPolicy: RetryPolicy
  ): Promise<void> {
    while (!state.dequeue.isCancelled && !state.halted) {
      const url = state.queue.shift();
      if (url === undefined) {
        return;
      }
      state.started += 1;
      const result = await this.scanUrl(url, state.started, state, supervisor, consentHandler, retryPolicy);
      this.finalize(state, result);
    }
  }

  /**
   * Retry loop for one URL. Always resolves with a terminal result.
   */
  private async scanUrl(
    url: string,
    index: number,
    state: ScanState,
    supervisor: BrowserPoolSupervisor,
    consentHandler: ConsentHandler,
    retryPolicy: RetryPolicy
  ): Promise<ScanResult> {
    const { config } = state;
    const page: ActivePage = { url, startTime: Date.now(), attempt: 0 };
    state.active.set(url, page);
    this.emitEvent('pageStarted', { url, index, total: state.total });
    this.logger.info(`Scanning (${index}/${state.total}): ${url}`);

    let lastErrors: PageError[] = [];
    let lastStatus: number | undefined;

    const failed = (failure: AttemptFailure): ScanResult => ({
      url,
      status: PageStatus.FAILED,
      errors: lastErrors,
      attemptCount: page.attempt,
      duration: Date.now() - page.startTime,
      finalHttpStatus: failure.httpStatus ?? lastStatus,
      failureReason: failure.type,
      failureMessage: failure.message,
    });

    for (;;) {
      page.attempt += 1;
      page.session = undefined;

      let handle: BrowserHandle;
      try {
        handle = await supervisor.lease(
          { targetUrl: url, userAgent: config.userAgent, cookies: config.cookies },
          state.dequeue
        );
      } catch (error) {
        if (error instanceof CancelledError) {
          page.attempt -= 1;
          return failed({ type: AttemptFailureType.CANCELLED, message: error.message });
        }
        if (error instanceof SupervisorHaltedError) {
          page.attempt -= 1;
          return failed({ type: AttemptFailureType.BROWSER_UNAVAILABLE, message: error.message });
        }
        lastErrors = [];
        lastStatus = undefined;
        const terminal = await this.afterFailure(url, page, { ok: false, failure: toFailure(error), errors: [] }, state, retryPolicy);
        if (terminal) {
          return failed(terminal);
        }
        continue;
      }

      const session = new PageSession(url, handle, {
        config,
        consentHandler,
        logger: this.logger.child('PageSession'),
        onObserved: (error, status) => this.emitEvent('errorObserved', { url, error, status }),
      });
      page.session = session;

      const outcome = await session.run(state.abort);
      const healthy =
        handle.isConnected() && (outcome.ok || outcome.failure.type !== AttemptFailureType.BROWSER_DISCONNECTED);
      await supervisor.release(handle, healthy);

      lastErrors = outcome.errors;
      lastStatus = outcome.httpStatus;

      if (outcome.ok) {
        return {
          url,
          status: outcome.status,
          errors: outcome.errors,
          attemptCount: page.attempt,
          duration: Date.now() - page.startTime,
          loadTimeMs: outcome.loadTimeMs,
          finalHttpStatus: outcome.httpStatus,
        };
      }

      const terminal = await this.afterFailure(url, page, outcome, state, retryPolicy);
      if (terminal) {
        return failed(terminal);
      }
    }
  }

  /**
   * Report a failed attempt, then probe and back off. Returns the terminal
   * failure, or undefined when the URL should be attempted again.
   */
  private async afterFailure(
    url: string,
    page: ActivePage,
    outcome: Extract<AttemptOutcome, { ok: false }>,
    state: ScanState,
    retryPolicy: RetryPolicy
  ): Promise<AttemptFailure | undefined> {
    const { failure } = outcome;
    const decision: RetryDecision = state.dequeue.isCancelled
      ? { action: 'fail' }
      : retryPolicy.decide(page.attempt, failure);
    const retryInMs = decision.action === 'retry' ? decision.delayMs : undefined;
    this.emitEvent('attemptFailed', { url, attempt: page.attempt, failure, retryInMs });

    if (decision.action === 'fail') {
      if (state.dequeue.isCancelled && failure.type !== AttemptFailureType.CANCELLED) {
        this.logger.info(`${url}: not retried, scan cancelled`);
        return { type: AttemptFailureType.CANCELLED, message: `Cancelled after: ${failure.message}` };
      }
      this.logger.warn(`Failed after ${page.attempt} attempt(s): ${url} (${failure.message})`);
      return failure;
    }

    this.logger.warn(
      `Retry ${page.attempt}/${retryPolicy.maxAttempts} for ${url} in ${decision.delayMs}ms (${failure.message})`
    );

    try {
      const probe = await raceWithCancellation(this.probe(url, state.config.probeTimeoutMs, state.dequeue), state.dequeue);
      if (probe.reachable) {
        this.logger.debug(`${url} reachable (HTTP ${probe.status ?? '?'}, ${probe.durationMs}ms)`);
      } else {
        this.logger.warn(`${url} not reachable: ${probe.error ?? `HTTP ${probe.status ?? '?'}`}`);
      }
      await this.sleep(decision.delayMs, state.dequeue);
    } catch (error) {
      if (error instanceof CancelledError) {
        return { type: AttemptFailureType.CANCELLED, message: error.message };
      }
      throw error;
    }
    return undefined;
  }

  private finalize(state: ScanState, result: ScanResult): void {
    const frozen = Object.freeze(result);
    state.results.push(frozen);
    state.active.delete(result.url);
    if (result.status === PageStatus.FAILED) {
      this.logger.info(`  [failed] ${result.url}: ${result.failureReason ?? 'unknown'}`);
    } else {
      this.logger.info(`  [${result.status}] ${result.url} (${result.errors.length} distinct diagnostic(s))`);
    }
    this.emitEvent('pageFinished', {
      url: result.url,
      result: copyResult(frozen),
      completed: state.results.length,
      total: state.total,
    });
  }

  private summarize(state: ScanState, endTime: number, results: readonly ScanResult[]): ScanSummary {
    return buildSummary({
      scanId: state.scanId,
      status: state.status,
      totalUrls: state.totalUrls,
      skippedUrls: state.skippedUrls,
      results,
      startTime: state.startTime,
      endTime,
    });
  }

  /**
   * Emit scanFatal and build the error startScan rejects with
   */
  private fatal(reason: ScanFatalReason, message: string): ScanFatalError {
    this.logger.error(message);
    this.emitEvent('scanFatal', { reason, message });
    return new ScanFatalError(reason, message);
  }
}

function copyResult(result: ScanResult): ScanResult {
  return { ...result, errors: result.errors.map((error) => ({ ...error })) };
}
