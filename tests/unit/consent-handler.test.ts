import { ConsentHandler } from '../../src/core/consent/ConsentHandler';
import { CONSENT_VENDORS, hideCss } from '../../src/core/consent/vendors';
import { BrowserDisconnectedError } from '../../src/core/errors';
import { BrowserType, ConsentMode } from '../../src/types/enums';
import { FakeBrowserDriver, FakeHandle, FakeProcess } from '../helpers/FakeBrowserDriver';
import { silentLogger } from '../helpers/fixtures';

describe('ConsentHandler', () => {
  let process: FakeProcess;
  let handle: FakeHandle;
  let handler: ConsentHandler;

  beforeEach(async () => {
    process = await new FakeBrowserDriver().launch({ type: BrowserType.CHROMIUM, headless: true }, 1);
    handle = await process.newHandle({ targetUrl: 'https://shop.test/', userAgent: 'test-agent', cookies: [] });
    handler = new ConsentHandler({}, silentLogger());
  });

  it('should only hide banners in hide-only mode', async () => {
    const outcome = await handler.handle(handle, ConsentMode.HIDE_ONLY);

    expect(outcome).toEqual({ phase: 'hide', errors: [] });
    expect(handle.styles).toEqual(CONSENT_VENDORS.map((vendor) => hideCss(vendor.hideSelectors)));
    expect(handle.clicked).toEqual([]);
    expect(handle.evaluated.some((expression) => expression.includes('AllowAll()'))).toBe(false);
    expect(handle.waits).toEqual([1000]);
  });

  it('should accept through the vendor API when one is present', async () => {
    handle.evaluateResults.set("typeof window.OneTrust.AllowAll === 'function'", true);
    handle.evaluateResults.set('window.OneTrust.AllowAll();', true);

    const outcome = await handler.handle(handle, ConsentMode.ACCEPT);

    expect(outcome).toEqual({ phase: 'api', vendor: 'onetrust', errors: [] });
    expect(handle.clicked).toEqual([]);
    expect(handle.waits).toEqual([2000, 1000]);
  });

  it('should fall back to clicking a visible accept button', async () => {
    handle.visibleSelectors.add('#accept-cookies');

    const outcome = await handler.handle(handle, ConsentMode.ACCEPT);

    expect(outcome).toEqual({ phase: 'click', vendor: undefined, selector: '#accept-cookies', errors: [] });
    expect(handle.clicked).toEqual(['#accept-cookies']);
  });

  it('should record failed interactions and try the next button', async () => {
    handle.visibleSelectors.add('#accept-cookies');
    handle.visibleSelectors.add('.cc-accept');
    handle.clickFailures.add('#accept-cookies');

    const outcome = await handler.handle(handle, ConsentMode.ACCEPT);

    expect(outcome.phase).toBe('click');
    expect(outcome.selector).toBe('.cc-accept');
    expect(outcome.errors).toEqual(['click on #accept-cookies failed: Element is not attached to the DOM: #accept-cookies']);
  });

  it('should end in the hide phase when there is no banner', async () => {
    const outcome = await handler.handle(handle, ConsentMode.ACCEPT);

    expect(outcome).toEqual({ phase: 'hide', vendor: undefined, errors: [] });
    expect(handle.styles).toHaveLength(CONSENT_VENDORS.length);
  });

  it('should use the configured waits', async () => {
    handle.visibleSelectors.add('#onetrust-accept-btn-handler');
    const fast = new ConsentHandler({ acceptWaitMs: 10, hideWaitMs: 5 }, silentLogger());

    await fast.handle(handle, ConsentMode.ACCEPT);

    expect(handle.waits).toEqual([10, 5]);
  });

  it('should propagate a dead browser', async () => {
    process.disconnect();

    await expect(handler.handle(handle, ConsentMode.HIDE_ONLY)).rejects.toBeInstanceOf(BrowserDisconnectedError);
    await expect(handler.handle(handle, ConsentMode.ACCEPT)).rejects.toBeInstanceOf(BrowserDisconnectedError);
  });
});
