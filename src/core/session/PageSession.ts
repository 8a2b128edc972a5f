import { ScanConfiguration } from '../../types/config';
import { AttemptFailureType, LogLevel, PageStatus } from '../../types/enums';
import { AttemptFailure } from '../../types/events';
import { PageError } from '../../types/scan-result';
import { CancellationToken, raceWithCancellation, withTimeout } from '../../utils/helpers/cancellation';
import { Logger } from '../../utils/logger/Logger';
import { classifyDiagnostic } from '../analysis/DiagnosticClassifier';
import { ErrorCollector } from '../analysis/ErrorCollector';
import { ConsentHandler } from '../consent/ConsentHandler';
import { AttemptError, BrowserDisconnectedError, CancelledError, errorMessage } from '../errors';
import { BrowserHandle, RawDiagnostic } from '../interfaces/IBrowserDriver';

import { DiagnosticChannel } from './DiagnosticChannel';

/** Extra time granted to the driver's own navigation timeout before the session gives up */
const NAVIGATION_MARGIN_MS = 1000;

/** Consent handling never blocks an attempt longer than this */
const CONSENT_BUDGET_MS = 15000;

export type AttemptOutcome =
  | { ok: true; errors: PageError[]; status: PageStatus; httpStatus?: number; loadTimeMs: number }
  | { ok: false; failure: AttemptFailure; errors: PageError[]; httpStatus?: number };

export interface PageSessionOptions {
  config: Readonly<ScanConfiguration>;
  consentHandler: ConsentHandler;
  /** Fires for every new (deduplicated) diagnostic */
  onObserved?: (error: PageError, status: PageStatus) => void;
  channelCapacity?: number;
  logger?: Logger;
}

/**
 * A single attempt to load one URL on one leased handle.
 *
 * Browser listeners push raw events into a bounded channel; the collection loop
 * classifies and deduplicates them. Diagnostics belong to this attempt only.
 */
export class PageSession {
  private readonly collector: ErrorCollector;
  private readonly channel: DiagnosticChannel<RawDiagnostic>;
  private readonly logger: Logger;

  constructor(
    private readonly url: string,
    private readonly handle: BrowserHandle,
    private readonly options: PageSessionOptions
  ) {
    this.collector = new ErrorCollector(options.config.whitelist?.patterns ?? []);
    this.channel = new DiagnosticChannel<RawDiagnostic>(options.channelCapacity);
    this.logger = options.logger ?? new Logger(LogLevel.INFO, 'PageSession');
  }

  /**
   * Diagnostics collected so far, for live snapshots
   */
  snapshot(): { errors: PageError[]; status: PageStatus } {
    return { errors: this.collector.getErrors(), status: this.collector.getStatus() };
  }

  /**
   * Run the attempt. Never throws: every failure is reported in the outcome.
   * `abort` is the token that interrupts the attempt itself.
   */
  async run(abort: CancellationToken): Promise<AttemptOutcome> {
    const { config } = this.options;
    const unsubscribe = this.handle.onDiagnostic((event) => {
      this.channel.push(event);
    });
    const consumer = this.consume();
    let httpStatus: number | undefined;

    try {
      abort.throwIfCancelled();

      const started = Date.now();
      const navigation = withTimeout(
        this.handle.navigate(this.url, { timeoutMs: config.timeoutMs, waitUntil: config.waitUntil }),
        config.timeoutMs + NAVIGATION_MARGIN_MS,
        () => new AttemptError(AttemptFailureType.TIMEOUT, `Navigation timed out after ${config.timeoutMs}ms`)
      );
      const result = await raceWithCancellation(navigation, abort);
      const loadTimeMs = Date.now() - started;
      httpStatus = result.status;

      if (httpStatus !== undefined && httpStatus >= 400) {
        throw new AttemptError(AttemptFailureType.HTTP_ERROR, `HTTP ${httpStatus}`, httpStatus);
      }

      await raceWithCancellation(
        withTimeout(
          this.options.consentHandler.handle(this.handle, config.consentMode),
          CONSENT_BUDGET_MS,
          () => new AttemptError(AttemptFailureType.TIMEOUT, 'Consent handling timed out')
        ),
        abort
      ).catch((error: unknown) => {
        // a slow banner is not a page failure
        if (error instanceof AttemptError) {
          this.logger.info(`${this.url}: ${error.message}`);
          return undefined;
        }
        throw error;
      });

      if (config.settleMs > 0) {
        await raceWithCancellation(this.handle.wait(config.settleMs), abort);
      }

      await this.finish(unsubscribe, consumer);
      return {
        ok: true,
        errors: this.collector.getErrors(),
        status: this.collector.getStatus(),
        httpStatus,
        loadTimeMs,
      };
    } catch (error) {
      await this.finish(unsubscribe, consumer);
      const failure = toFailure(error);
      this.logger.debug(`${this.url}: attempt failed (${failure.type}): ${failure.message}`);
      return { ok: false, failure, errors: this.collector.getErrors(), httpStatus };
    }
  }

  private async finish(unsubscribe: () => void, consumer: Promise<void>): Promise<void> {
    unsubscribe();
    this.channel.close();
    await consumer;
    if (this.channel.droppedCount > 0) {
      this.logger.debug(`${this.url}: dropped ${this.channel.droppedCount} diagnostic(s), channel full`);
    }
  }

  private async consume(): Promise<void> {
    for await (const event of this.channel) {
      const classified = classifyDiagnostic(event, this.options.config.consoleLevel);
      if (!classified) continue;
      const { error, isNew } = this.collector.add(classified);
      if (isNew && this.options.onObserved) {
        try {
          this.options.onObserved({ ...error }, this.collector.getStatus());
        } catch (listenerError) {
          this.logger.warn(`Diagnostic listener failed: ${errorMessage(listenerError)}`);
        }
      }
    }
  }
}

export function toFailure(error: unknown): AttemptFailure {
  if (error instanceof AttemptError) {
    return error.toFailure();
  }
  if (error instanceof BrowserDisconnectedError) {
    return { type: AttemptFailureType.BROWSER_DISCONNECTED, message: error.message };
  }
  if (error instanceof CancelledError) {
    return { type: AttemptFailureType.CANCELLED, message: error.message };
  }
  return { type: AttemptFailureType.NAVIGATION_ERROR, message: errorMessage(error) };
}
