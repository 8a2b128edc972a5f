import { EventEmitter } from 'events';

import { PlaywrightDriver } from '../../src/core/browser/PlaywrightDriver';
import { BrowserDisconnectedError } from '../../src/core/errors';
import { HandleOptions, IBrowserProcess, RawDiagnostic } from '../../src/core/interfaces/IBrowserDriver';
import { BrowserType } from '../../src/types/enums';
import { silentLogger } from '../helpers/fixtures';

class MockPage extends EventEmitter {}

class MockCdpSession extends EventEmitter {
  readonly sent: string[] = [];
  detached = false;

  async send(method: string): Promise<void> {
    this.sent.push(method);
  }

  async detach(): Promise<void> {
    this.detached = true;
  }
}

class MockContext {
  readonly page = new MockPage();
  readonly cdp = new MockCdpSession();
  readonly cookies: unknown[] = [];
  closed = false;

  async addCookies(cookies: unknown[]): Promise<void> {
    this.cookies.push(...cookies);
  }

  async newPage(): Promise<MockPage> {
    return this.page;
  }

  async newCDPSession(): Promise<MockCdpSession> {
    return this.cdp;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class MockBrowser extends EventEmitter {
  readonly contexts: MockContext[] = [];
  connected = true;

  isConnected(): boolean {
    return this.connected;
  }

  async newContext(): Promise<MockContext> {
    const context = new MockContext();
    this.contexts.push(context);
    return context;
  }

  async close(): Promise<void> {
    this.connected = false;
  }
}

let mockBrowser = new MockBrowser();

jest.mock('playwright', () => {
  const engine = { launch: async () => mockBrowser };
  return {
    chromium: engine,
    firefox: engine,
    webkit: engine,
    errors: { TimeoutError: class TimeoutError extends Error {} },
  };
});

const OPTIONS: HandleOptions = {
  targetUrl: 'https://shop.test/cart',
  userAgent: 'test-agent',
  cookies: [{ name: 'session', value: 'test-secret' }],
};

describe('PlaywrightDriver', () => {
  let process: IBrowserProcess;

  beforeEach(async () => {
    mockBrowser = new MockBrowser();
    process = await new PlaywrightDriver(silentLogger()).launch({ type: BrowserType.CHROMIUM, headless: true }, 1);
  });

  it('should not leave listeners on the browser after handles close', async () => {
    for (let i = 0; i < 20; i++) {
      const handle = await process.newHandle(OPTIONS);
      await handle.close();
    }

    expect(mockBrowser.listenerCount('disconnected')).toBe(1);
    expect(mockBrowser.contexts).toHaveLength(20);
    expect(mockBrowser.contexts.every((context) => context.closed && context.cdp.detached)).toBe(true);
  });

  it('should scope cookies to the target host', async () => {
    await process.newHandle(OPTIONS);

    expect(mockBrowser.contexts[0].cookies).toEqual([
      { name: 'session', value: 'test-secret', domain: 'shop.test', path: '/' },
    ]);
    expect(mockBrowser.contexts[0].cdp.sent).toEqual(['Log.enable', 'Audits.enable']);
  });

  it('should translate page events until the handle closes', async () => {
    const handle = await process.newHandle(OPTIONS);
    const page = mockBrowser.contexts[0].page;
    const events: RawDiagnostic[] = [];
    handle.onDiagnostic((event) => events.push(event));

    page.emit('pageerror', new Error('x is not defined'));
    page.emit('response', { url: () => 'https://shop.test/api', status: () => 502 });
    await handle.close();
    page.emit('pageerror', new Error('after close'));

    expect(events).toEqual([
      { type: 'pageerror', message: 'x is not defined' },
      { type: 'response', url: 'https://shop.test/api', status: 502 },
    ]);
  });

  it('should report a crashed page or a lost process as disconnected', async () => {
    const crashed = await process.newHandle(OPTIONS);
    const healthy = await process.newHandle(OPTIONS);

    mockBrowser.contexts[0].page.emit('crash');
    expect(crashed.isConnected()).toBe(false);
    expect(healthy.isConnected()).toBe(true);

    mockBrowser.connected = false;
    expect(healthy.isConnected()).toBe(false);
    await expect(process.newHandle(OPTIONS)).rejects.toBeInstanceOf(BrowserDisconnectedError);
  });

  it('should notify process listeners once the browser disconnects', () => {
    const disconnects: number[] = [];
    process.onDisconnect(() => disconnects.push(process.generation));

    mockBrowser.emit('disconnected');

    expect(disconnects).toEqual([1]);
  });
});
