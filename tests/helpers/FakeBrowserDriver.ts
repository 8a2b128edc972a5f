/**
 * In-process browser driver for tests. Pages are scripted per URL and attempt.
 */

import { BrowserDisconnectedError } from '../../src/core/errors';
import {
  BrowserHandle,
  DiagnosticListener,
  HandleOptions,
  IBrowserDriver,
  IBrowserProcess,
  NavigateOptions,
  NavigationResult,
  RawDiagnostic,
} from '../../src/core/interfaces/IBrowserDriver';
import { BrowserConfig } from '../../src/types/config';

/**
 * What one navigation does. Return the root document status, throw to fail
 * the attempt, or never settle to simulate a hanging page.
 */
export type PageScript = (page: FakePage) => Promise<NavigationResult | void> | NavigationResult | void;

export interface FakePage {
  url: string;
  /** 1-based attempt number for this URL */
  attempt: number;
  handle: FakeHandle;
  emit(event: RawDiagnostic): void;
  /** Kill the browser process; returns the error a real driver would reject with */
  crash(): BrowserDisconnectedError;
}

export class FakeBrowserDriver implements IBrowserDriver {
  readonly processes: FakeProcess[] = [];
  readonly navigations: string[] = [];
  readonly failingGenerations = new Set<number>();
  activeHandles = 0;
  maxActiveHandles = 0;

  private readonly routes = new Map<string, PageScript[]>();
  private readonly attempts = new Map<string, number>();

  /**
   * Scripts for consecutive attempts on `url`; the last one repeats
   */
  route(url: string, ...scripts: PageScript[]): this {
    this.routes.set(url, scripts);
    return this;
  }

  failLaunch(generation: number): this {
    this.failingGenerations.add(generation);
    return this;
  }

  get launches(): number {
    return this.processes.length;
  }

  async launch(_config: BrowserConfig, generation: number): Promise<FakeProcess> {
    if (this.failingGenerations.has(generation)) {
      throw new Error(`cannot launch generation ${generation}`);
    }
    const process = new FakeProcess(this, generation);
    this.processes.push(process);
    return process;
  }

  /** @internal */
  nextScript(url: string): { script?: PageScript; attempt: number } {
    const attempt = (this.attempts.get(url) ?? 0) + 1;
    this.attempts.set(url, attempt);
    const scripts = this.routes.get(url) ?? [];
    return { script: scripts[Math.min(attempt, scripts.length) - 1], attempt };
  }

  /** @internal */
  trackOpen(): void {
    this.activeHandles += 1;
    this.maxActiveHandles = Math.max(this.maxActiveHandles, this.activeHandles);
  }

  /** @internal */
  trackClose(): void {
    this.activeHandles -= 1;
  }
}

export class FakeProcess implements IBrowserProcess {
  connected = true;
  closed = false;
  private readonly disconnectListeners: Array<() => void> = [];
  private handleCount = 0;

  constructor(
    private readonly driver: FakeBrowserDriver,
    readonly generation: number
  ) {}

  isConnected(): boolean {
    return this.connected && !this.closed;
  }

  async newHandle(options: HandleOptions): Promise<FakeHandle> {
    if (!this.isConnected()) {
      throw new BrowserDisconnectedError();
    }
    this.handleCount += 1;
    this.driver.trackOpen();
    return new FakeHandle(`g${this.generation}-h${this.handleCount}`, this, this.driver, options);
  }

  onDisconnect(listener: () => void): void {
    this.disconnectListeners.push(listener);
  }

  disconnect(): void {
    if (!this.connected) return;
    this.connected = false;
    this.disconnectListeners.forEach((listener) => listener());
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeHandle implements BrowserHandle {
  readonly generation: number;
  readonly visibleSelectors = new Set<string>();
  readonly clicked: string[] = [];
  /** Selectors whose click throws */
  readonly clickFailures = new Set<string>();
  readonly styles: string[] = [];
  readonly evaluated: string[] = [];
  /** Expression results by substring of the expression */
  readonly evaluateResults = new Map<string, unknown>();
  waits: number[] = [];
  closed = false;
  private readonly listeners = new Set<DiagnosticListener>();

  constructor(
    readonly id: string,
    private readonly process: FakeProcess,
    private readonly driver: FakeBrowserDriver,
    readonly options: HandleOptions
  ) {
    this.generation = process.generation;
  }

  onDiagnostic(listener: DiagnosticListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  isConnected(): boolean {
    return this.process.isConnected() && !this.closed;
  }

  emit(event: RawDiagnostic): void {
    this.listeners.forEach((listener) => listener(event));
  }

  async navigate(url: string, _options: NavigateOptions): Promise<NavigationResult> {
    this.ensureConnected();
    this.driver.navigations.push(url);
    const { script, attempt } = this.driver.nextScript(url);
    if (!script) {
      return { status: 200 };
    }
    const page: FakePage = {
      url,
      attempt,
      handle: this,
      emit: (event) => this.emit(event),
      crash: () => {
        this.process.disconnect();
        return new BrowserDisconnectedError('Target page, context or browser has been closed');
      },
    };
    const result = await script(page);
    if (result) {
      return result;
    }
    return { status: 200 };
  }

  async evaluate<T>(expression: string): Promise<T> {
    this.ensureConnected();
    this.evaluated.push(expression);
    const match = Array.from(this.evaluateResults).find(([fragment]) => expression.includes(fragment));
    // page results are untyped; tests register the values they expect back
    return match?.[1] as T;
  }

  async isVisible(selector: string, _timeoutMs: number): Promise<boolean> {
    this.ensureConnected();
    return this.visibleSelectors.has(selector);
  }

  async click(selector: string, _timeoutMs: number): Promise<void> {
    this.ensureConnected();
    if (this.clickFailures.has(selector)) {
      throw new Error(`Element is not attached to the DOM: ${selector}`);
    }
    this.clicked.push(selector);
  }

  async addStyle(css: string): Promise<void> {
    this.ensureConnected();
    this.styles.push(css);
  }

  async wait(ms: number): Promise<void> {
    this.ensureConnected();
    this.waits.push(ms);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.listeners.clear();
    this.driver.trackClose();
  }

  private ensureConnected(): void {
    if (!this.process.isConnected()) {
      throw new BrowserDisconnectedError();
    }
  }
}

/**
 * A promise that settles when the test says so
 */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Never settles; the attempt can only end by cancellation or timeout
 */
export function hang(): Promise<never> {
  return new Promise<never>(() => undefined);
}
