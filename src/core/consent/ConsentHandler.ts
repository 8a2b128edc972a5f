import { ConsentMode, LogLevel } from '../../types/enums';
import { Logger } from '../../utils/logger/Logger';
import { BrowserDisconnectedError, errorMessage } from '../errors';
import { BrowserHandle } from '../interfaces/IBrowserDriver';

import { CONSENT_VENDORS, ConsentVendor, ConsentVendorName } from './vendors';

export type ConsentPhase = 'api' | 'click' | 'hide';

export interface ConsentOutcome {
  /** Phase that completed the pipeline */
  phase: ConsentPhase;
  /** Vendor detected on the page, if any */
  vendor?: ConsentVendorName;
  /** Button clicked by the click phase */
  selector?: string;
  /** Interaction errors; informational only */
  errors: string[];
}

export interface ConsentHandlerOptions {
  /** Wait after a successful accept so consent-gated scripts can run (ms) */
  acceptWaitMs: number;
  /** Wait after hiding banners (ms) */
  hideWaitMs: number;
  visibleTimeoutMs: number;
  clickTimeoutMs: number;
}

const DEFAULT_OPTIONS: ConsentHandlerOptions = {
  acceptWaitMs: 2000,
  hideWaitMs: 1000,
  visibleTimeoutMs: 500,
  clickTimeoutMs: 2000,
};

/**
 * Three-phase cookie banner handling: vendor API, button click, CSS hide.
 * Stops at the first phase that succeeds. A page without a banner ends in
 * the hide phase with no errors.
 */
export class ConsentHandler {
  private readonly options: ConsentHandlerOptions;
  private readonly logger: Logger;

  constructor(
    options: Partial<ConsentHandlerOptions> = {},
    logger?: Logger,
    private readonly vendors: readonly ConsentVendor[] = CONSENT_VENDORS
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = logger ?? new Logger(LogLevel.INFO, 'ConsentHandler');
  }

  async handle(handle: BrowserHandle, mode: ConsentMode): Promise<ConsentOutcome> {
    const errors: string[] = [];

    if (mode === ConsentMode.HIDE_ONLY) {
      await this.hideAll(handle, errors);
      this.logger.debug('Consent banners hidden, no consent granted');
      return { phase: 'hide', errors };
    }

    const vendor = await this.detectVendor(handle, errors);

    // Phase 1: vendor API
    if (vendor && vendor.name !== 'generic') {
      const accepted = await this.attempt(`${vendor.name} accept`, errors, () => vendor.accept(handle));
      if (accepted) {
        this.logger.debug(`Consent accepted via ${vendor.name} API`);
        await handle.wait(this.options.acceptWaitMs);
        await this.hideAll(handle, errors);
        return { phase: 'api', vendor: vendor.name, errors };
      }
    }

    // Phase 2: click an accept button
    const selector = await this.clickAcceptButton(handle, errors);
    if (selector) {
      this.logger.debug(`Consent button clicked: ${selector}`);
      await handle.wait(this.options.acceptWaitMs);
      await this.hideAll(handle, errors);
      return { phase: 'click', vendor: vendor?.name, selector, errors };
    }

    // Phase 3: hide only
    await this.hideAll(handle, errors);
    return { phase: 'hide', vendor: vendor?.name, errors };
  }

  /**
   * First vendor whose detect() succeeds
   */
  private async detectVendor(handle: BrowserHandle, errors: string[]): Promise<ConsentVendor | undefined> {
    for (const vendor of this.vendors) {
      const detected = await this.attempt(`${vendor.name} detect`, errors, () => vendor.detect(handle));
      if (detected) {
        return vendor;
      }
    }
    return undefined;
  }

  private async clickAcceptButton(handle: BrowserHandle, errors: string[]): Promise<string | undefined> {
    const selectors = this.vendors.flatMap((vendor) => vendor.acceptSelectors);
    for (const selector of selectors) {
      const visible = await this.attempt(`visibility of ${selector}`, errors, () =>
        handle.isVisible(selector, this.options.visibleTimeoutMs)
      );
      if (!visible) continue;

      const clicked = await this.attempt(`click on ${selector}`, errors, async () => {
        await handle.click(selector, this.options.clickTimeoutMs);
        return true;
      });
      if (clicked) {
        return selector;
      }
    }
    return undefined;
  }

  private async hideAll(handle: BrowserHandle, errors: string[]): Promise<void> {
    for (const vendor of this.vendors) {
      await this.attempt(`${vendor.name} hide`, errors, async () => {
        await vendor.hide(handle);
        return true;
      });
    }
    await handle.wait(this.options.hideWaitMs);
  }

  /**
   * Run one interaction. Failures are recorded and logged; a dead browser is not
   * a consent problem and propagates.
   */
  private async attempt<T>(label: string, errors: string[], action: () => Promise<T>): Promise<T | undefined> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof BrowserDisconnectedError) {
        throw error;
      }
      const message = `${label} failed: ${errorMessage(error)}`;
      errors.push(message);
      this.logger.info(`Consent interaction ${message}`);
      return undefined;
    }
  }
}
