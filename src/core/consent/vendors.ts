import { BrowserHandle } from '../interfaces/IBrowserDriver';

export type ConsentVendorName = 'usercentrics' | 'onetrust' | 'cookiebot' | 'generic';

/**
 * One consent-management platform.
 *
 * `detect` looks for the vendor's global API; `accept` calls its documented
 * accept-all function; `hide` hides its banner without granting consent.
 * `acceptSelectors` are the buttons tried by the click fallback.
 */
export interface ConsentVendor {
  readonly name: ConsentVendorName;
  readonly acceptSelectors: readonly string[];
  readonly hideSelectors: readonly string[];
  detect(handle: BrowserHandle): Promise<boolean>;
  accept(handle: BrowserHandle): Promise<boolean>;
  hide(handle: BrowserHandle): Promise<void>;
}

export function hideCss(selectors: readonly string[]): string {
  return `${selectors.join(',\n')} { display: none !important; visibility: hidden !important; }`;
}

/**
 * Vendor driven by a global JavaScript object
 */
function apiVendor(
  name: Exclude<ConsentVendorName, 'generic'>,
  detectExpression: string,
  acceptExpression: string,
  acceptSelectors: string[],
  hideSelectors: string[],
  extraHideExpression?: string
): ConsentVendor {
  return {
    name,
    acceptSelectors,
    hideSelectors,
    async detect(handle) {
      return (await handle.evaluate<boolean>(detectExpression)) === true;
    },
    async accept(handle) {
      return (await handle.evaluate<boolean>(acceptExpression)) === true;
    },
    async hide(handle) {
      await handle.addStyle(hideCss(hideSelectors));
      if (extraHideExpression) {
        await handle.evaluate<void>(extraHideExpression);
      }
    },
  };
}

export const usercentrics = apiVendor(
  'usercentrics',
  `(() => !!(window.UC_UI && typeof window.UC_UI.acceptAllConsents === 'function'))()`,
  `(() => { window.UC_UI.acceptAllConsents(); return true; })()`,
  ['[data-testid="uc-accept-all-button"]', '#uc-btn-accept-banner', '.uc-btn-accept'],
  ['#usercentrics-root', '#uc-banner', '.uc-banner'],
  // the Usercentrics banner lives in a shadow root that page CSS cannot reach
  `(() => {
    const root = document.getElementById('usercentrics-root');
    if (root && root.shadowRoot) {
      root.shadowRoot.querySelectorAll('[class*="banner"]').forEach((el) => { el.style.display = 'none'; });
    }
  })()`
);

export const onetrust = apiVendor(
  'onetrust',
  `(() => !!(window.OneTrust && typeof window.OneTrust.AllowAll === 'function'))()`,
  `(() => { window.OneTrust.AllowAll(); return true; })()`,
  ['#onetrust-accept-btn-handler', '.onetrust-close-btn-handler'],
  ['#onetrust-banner-sdk', '#onetrust-consent-sdk']
);

export const cookiebot = apiVendor(
  'cookiebot',
  `(() => !!(window.Cookiebot && typeof window.Cookiebot.submitCustomConsent === 'function'))()`,
  `(() => { window.Cookiebot.submitCustomConsent(true, true, true); return true; })()`,
  ['#CybotCookiebotDialogBodyLevelButtonLevelOptinAllowAll', '#CybotCookiebotDialogBodyButtonAccept'],
  ['#CybotCookiebotDialog', '#CybotCookiebotDialogBodyUnderlay']
);

const GENERIC_HIDE_SELECTORS = [
  '.cookie-banner',
  '.cookie-consent',
  '.cookie-notice',
  '[class*="cookie-banner"]',
  '[class*="cookie-consent"]',
  '[id*="cookie-banner"]',
  '[id*="cookie-consent"]',
  '[class*="consent-banner"]',
  '[class*="CookieConsent"]',
];

/**
 * Banners without a known API: found by markup, accepted by clicking
 */
export const generic: ConsentVendor = {
  name: 'generic',
  acceptSelectors: [
    '[data-cookie-accept]',
    '[data-consent-accept]',
    'button[class*="accept"]',
    'button[class*="consent"]',
    'a[class*="accept"]',
    '.cookie-accept',
    '.cookie-consent-accept',
    '#cookie-accept',
    '#accept-cookies',
    '.cc-accept',
    '.cc-btn.cc-allow',
  ],
  hideSelectors: GENERIC_HIDE_SELECTORS,
  async detect(handle) {
    const expression = `(() => ${JSON.stringify(GENERIC_HIDE_SELECTORS)}.some((s) => !!document.querySelector(s)))()`;
    return (await handle.evaluate<boolean>(expression)) === true;
  },
  // no API to call; the click fallback covers generic banners
  async accept() {
    return false;
  },
  async hide(handle) {
    await handle.addStyle(hideCss(GENERIC_HIDE_SELECTORS));
    // banners often lock scrolling on the document
    await handle.evaluate<void>(
      `(() => { document.body.style.overflow = ''; document.documentElement.style.overflow = ''; })()`
    );
  },
};

/**
 * Detection order of the API phase; generic is last
 */
export const CONSENT_VENDORS: readonly ConsentVendor[] = [usercentrics, onetrust, cookiebot, generic];
