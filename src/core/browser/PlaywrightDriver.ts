import {
  Browser,
  BrowserContext,
  BrowserType as PlaywrightBrowserType,
  CDPSession,
  ConsoleMessage,
  Page,
  chromium,
  errors,
  firefox,
  webkit,
} from 'playwright';
import { v4 as uuidv4 } from 'uuid';

import { BrowserConfig, CookieConfig } from '../../types/config';
import { AttemptFailureType, BrowserType, LogLevel } from '../../types/enums';
import { Logger } from '../../utils/logger/Logger';
import { AttemptError, BrowserDisconnectedError, errorMessage } from '../errors';
import {
  BrowserHandle,
  DiagnosticListener,
  HandleOptions,
  IBrowserDriver,
  IBrowserProcess,
  NavigateOptions,
  NavigationResult,
  RawDiagnostic,
} from '../interfaces/IBrowserDriver';

const DEFAULT_ARGS = ['--disable-gpu', '--disable-dev-shm-usage', '--no-sandbox'];

const ENGINES: Record<BrowserType, PlaywrightBrowserType> = {
  [BrowserType.CHROMIUM]: chromium,
  [BrowserType.FIREFOX]: firefox,
  [BrowserType.WEBKIT]: webkit,
};

/**
 * Launches Playwright browsers
 */
export class PlaywrightDriver implements IBrowserDriver {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger?.child('Playwright') ?? new Logger(LogLevel.INFO, 'Playwright');
  }

  async launch(config: BrowserConfig, generation: number): Promise<IBrowserProcess> {
    const engine = ENGINES[config.type];
    const args = config.type === BrowserType.CHROMIUM ? [...DEFAULT_ARGS, ...(config.args ?? [])] : config.args;
    this.logger.debug(`Launching ${config.type} (generation ${generation})`);
    const browser = await engine.launch({ headless: config.headless, args });
    return new PlaywrightProcess(browser, config.type, generation, this.logger);
  }
}

class PlaywrightProcess implements IBrowserProcess {
  private readonly disconnectListeners: Array<() => void> = [];

  constructor(
    private readonly browser: Browser,
    private readonly type: BrowserType,
    readonly generation: number,
    private readonly logger: Logger
  ) {
    browser.on('disconnected', () => {
      for (const listener of this.disconnectListeners) {
        listener();
      }
    });
  }

  isConnected(): boolean {
    return this.browser.isConnected();
  }

  onDisconnect(listener: () => void): void {
    this.disconnectListeners.push(listener);
  }

  async newHandle(options: HandleOptions): Promise<BrowserHandle> {
    if (!this.browser.isConnected()) {
      throw new BrowserDisconnectedError(`Browser generation ${this.generation} is gone`);
    }
    try {
      const context = await this.browser.newContext({
        ignoreHTTPSErrors: true,
        userAgent: options.userAgent,
      });
      if (options.cookies.length > 0) {
        await context.addCookies(toPlaywrightCookies(options.cookies, options.targetUrl));
      }
      const page = await context.newPage();
      const handle = new PlaywrightHandle(this.browser, context, page, this.generation, this.logger);
      if (this.type === BrowserType.CHROMIUM) {
        await handle.attachDevTools();
      }
      return handle;
    } catch (error) {
      if (!this.browser.isConnected()) {
        throw new BrowserDisconnectedError(errorMessage(error));
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.browser.isConnected()) {
      await this.browser.close();
    }
  }
}

function toPlaywrightCookies(cookies: CookieConfig[], targetUrl: string) {
  const host = new URL(targetUrl).hostname;
  return cookies.map((cookie) => ({
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain ?? host,
    path: cookie.path ?? '/',
  }));
}

/**
 * One context + page. Playwright events are translated to RawDiagnostic.
 */
class PlaywrightHandle implements BrowserHandle {
  readonly id = uuidv4();
  private readonly listeners = new Set<DiagnosticListener>();
  private crashed = false;
  private cdp: CDPSession | null = null;

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    readonly generation: number,
    private readonly logger: Logger
  ) {
    page.on('console', (message) => this.onConsole(message));
    page.on('pageerror', (error) => this.publish({ type: 'pageerror', message: error.message }));
    page.on('response', (response) => this.publish({ type: 'response', url: response.url(), status: response.status() }));
    page.on('requestfailed', (request) => {
      this.publish({ type: 'requestfailed', url: request.url(), errorText: request.failure()?.errorText ?? 'unknown' });
    });
    // process loss is read from browser.isConnected(); the Browser outlives this handle
    page.on('crash', () => {
      this.crashed = true;
    });
  }

  /**
   * CSP issues and browser log entries are only reported through the DevTools protocol
   */
  async attachDevTools(): Promise<void> {
    const cdp = await this.context.newCDPSession(this.page);
    cdp.on('Audits.issueAdded', ({ issue }) => {
      const details = issue.details.contentSecurityPolicyIssueDetails;
      if (issue.code !== 'ContentSecurityPolicyIssue' || !details) return;
      this.publish({
        type: 'csp',
        directive: details.violatedDirective,
        blockedUrl: details.blockedURL,
        reportOnly: details.isReportOnly,
        sourceUrl: details.sourceCodeLocation?.url,
        line: details.sourceCodeLocation?.lineNumber,
      });
    });
    cdp.on('Log.entryAdded', ({ entry }) => {
      this.publish({ type: 'browserlog', source: entry.source, text: entry.text, url: entry.url, line: entry.lineNumber });
    });
    await cdp.send('Log.enable');
    await cdp.send('Audits.enable');
    this.cdp = cdp;
  }

  onDiagnostic(listener: DiagnosticListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  isConnected(): boolean {
    return !this.crashed && this.browser.isConnected();
  }

  async navigate(url: string, options: NavigateOptions): Promise<NavigationResult> {
    try {
      const response = await this.page.goto(url, { timeout: options.timeoutMs, waitUntil: options.waitUntil });
      return response ? { status: response.status() } : {};
    } catch (error) {
      if (!this.isConnected()) {
        throw new BrowserDisconnectedError(errorMessage(error));
      }
      if (error instanceof errors.TimeoutError) {
        throw new AttemptError(AttemptFailureType.TIMEOUT, `Navigation timed out after ${options.timeoutMs}ms`);
      }
      throw new AttemptError(AttemptFailureType.NAVIGATION_ERROR, errorMessage(error));
    }
  }

  evaluate<T>(expression: string): Promise<T> {
    return this.guard(() => this.page.evaluate<T>(expression));
  }

  async isVisible(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.locator(selector).first().waitFor({ state: 'visible', timeout: timeoutMs });
      return true;
    } catch (error) {
      if (!this.isConnected()) {
        throw new BrowserDisconnectedError(errorMessage(error));
      }
      if (error instanceof errors.TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  click(selector: string, timeoutMs: number): Promise<void> {
    return this.guard(() => this.page.locator(selector).first().click({ timeout: timeoutMs }));
  }

  async addStyle(css: string): Promise<void> {
    await this.guard(() => this.page.addStyleTag({ content: css }));
  }

  wait(ms: number): Promise<void> {
    return this.guard(() => this.page.waitForTimeout(ms));
  }

  async close(): Promise<void> {
    this.listeners.clear();
    if (this.cdp) {
      await this.cdp.detach().catch((error: unknown) => {
        this.logger.debug(`CDP detach failed: ${errorMessage(error)}`);
      });
      this.cdp = null;
    }
    if (this.browser.isConnected()) {
      await this.context.close();
    }
  }

  private onConsole(message: ConsoleMessage): void {
    const location = message.location();
    this.publish({
      type: 'console',
      level: message.type(),
      text: message.text(),
      location: location.url
        ? { url: location.url, line: location.lineNumber, column: location.columnNumber }
        : undefined,
    });
  }

  private publish(event: RawDiagnostic): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private async guard<T>(action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (!this.isConnected()) {
        throw new BrowserDisconnectedError(errorMessage(error));
      }
      throw error;
    }
  }
}
