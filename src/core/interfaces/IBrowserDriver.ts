import { BrowserConfig, CookieConfig, WaitStrategy } from '../../types/config';

/**
 * Raw event observed on a page, before classification
 */
export type RawDiagnostic =
  | {
      type: 'console';
      /** console.* method, `warning` for console.warn */
      level: string;
      text: string;
      location?: { url: string; line?: number; column?: number };
    }
  | { type: 'pageerror'; message: string }
  | { type: 'response'; url: string; status: number }
  | { type: 'requestfailed'; url: string; errorText: string }
  | {
      type: 'csp';
      directive: string;
      blockedUrl?: string;
      reportOnly: boolean;
      sourceUrl?: string;
      line?: number;
    }
  | { type: 'browserlog'; source: string; text: string; url?: string; line?: number };

export type DiagnosticListener = (event: RawDiagnostic) => void;

export interface NavigationResult {
  /** Status of the root document response, if there was one */
  status?: number;
}

export interface NavigateOptions {
  timeoutMs: number;
  waitUntil: WaitStrategy;
}

export interface HandleOptions {
  /** URL the handle will visit; cookies are scoped to its host */
  targetUrl: string;
  userAgent: string;
  cookies: CookieConfig[];
}

/**
 * A leased, exclusively-owned browser context and page.
 *
 * Every method rejects with BrowserDisconnectedError when the underlying
 * process is gone, so callers can tell a crash from a navigation failure.
 */
export interface BrowserHandle {
  readonly id: string;

  /** Generation of the browser process that created the handle */
  readonly generation: number;

  /** Subscribe to raw diagnostics. Returns an unsubscribe function. */
  onDiagnostic(listener: DiagnosticListener): () => void;

  isConnected(): boolean;

  navigate(url: string, options: NavigateOptions): Promise<NavigationResult>;

  /** Evaluate a JavaScript expression in the page */
  evaluate<T>(expression: string): Promise<T>;

  isVisible(selector: string, timeoutMs: number): Promise<boolean>;

  click(selector: string, timeoutMs: number): Promise<void>;

  addStyle(css: string): Promise<void>;

  wait(ms: number): Promise<void>;

  close(): Promise<void>;
}

/**
 * A running browser process
 */
export interface IBrowserProcess {
  readonly generation: number;
  isConnected(): boolean;
  newHandle(options: HandleOptions): Promise<BrowserHandle>;
  onDisconnect(listener: () => void): void;
  close(): Promise<void>;
}

/**
 * Browser engine binding
 */
export interface IBrowserDriver {
  launch(config: BrowserConfig, generation: number): Promise<IBrowserProcess>;
}
