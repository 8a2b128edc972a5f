import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { ConfigurationManager, DEFAULT_CONFIG, mergeConfig, parseOverrides } from '../../src/core/config/ConfigurationManager';
import { ConfigurationError } from '../../src/core/errors';
import { isValidUrl, validateScanConfiguration } from '../../src/utils/validators/config-validator';
import { BrowserType, ConsentMode, ReportFormat } from '../../src/types/enums';
import { silentLogger } from '../helpers/fixtures';

describe('ConfigurationManager', () => {
  let dir: string;
  let manager: ConfigurationManager;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'config-'));
    manager = new ConfigurationManager(silentLogger());
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  const writeJson = async (name: string, data: unknown): Promise<string> => {
    const file = path.join(dir, name);
    await fs.promises.writeFile(file, typeof data === 'string' ? data : JSON.stringify(data));
    return file;
  };

  it('should start from the defaults', () => {
    const config = manager.getConfig();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.concurrency).toBe(8);
    expect(config.timeoutMs).toBe(30000);
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 5000 });
    expect(config.cancelGraceMs).toBe(2000);
  });

  it('should merge a configuration file over the defaults', async () => {
    await writeJson('whitelist.json', { description: 'vendors', patterns: ['*gtag*'] });
    const file = await writeJson('scan.json', {
      concurrency: 4,
      browser: { headless: false },
      retry: { maxAttempts: 2 },
      whitelist: 'whitelist.json',
      reporting: { formats: ['HTML', ' json'] },
    });

    const config = await manager.loadFromFile(file);

    expect(config.concurrency).toBe(4);
    expect(config.browser).toEqual({ type: BrowserType.CHROMIUM, headless: false });
    expect(config.retry).toEqual({ maxAttempts: 2, baseDelayMs: 5000 });
    expect(config.whitelist?.patterns).toEqual(['*gtag*']);
    expect(config.reporting.formats).toEqual([ReportFormat.HTML, ReportFormat.JSON]);
    expect(config.reporting.outputDir).toBe('reports');
  });

  it('should accept an inline whitelist', async () => {
    const file = await writeJson('scan.json', { whitelist: { patterns: ['*hotjar*'] } });

    const config = await manager.loadFromFile(file);

    expect(config.whitelist?.patterns).toEqual(['*hotjar*']);
    expect(config.whitelist?.source).toBe(path.resolve(file));
  });

  it('should report every field of the wrong type', async () => {
    const file = await writeJson('scan.json', {
      concurrency: '8',
      consoleLevel: 'loud',
      browser: { type: 'edge' },
      cookies: [{ name: 'session' }],
    });

    await expect(manager.loadFromFile(file)).rejects.toMatchObject({
      errors: [
        "'concurrency' must be a number",
        "'consoleLevel' must be one of error, warn, all",
        'Cookie #1 needs a string name and value',
        "'browser.type' must be one of chromium, firefox, webkit",
      ],
    });
  });

  it('should fail on unreadable or non-object files', async () => {
    const notObject = await writeJson('list.json', '[1, 2]');

    await expect(manager.loadFromFile(path.join(dir, 'missing.json'))).rejects.toThrow('Cannot read configuration file');
    await expect(manager.loadFromFile(notObject)).rejects.toThrow('must contain a JSON object');
  });

  it('should keep the previous configuration when overrides are invalid', () => {
    manager.loadFromObject({ concurrency: 2 });

    expect(() => manager.loadFromObject({ concurrency: 0 })).toThrow(ConfigurationError);
    expect(manager.getConfig().concurrency).toBe(2);
  });

  it('should return copies and reset to the defaults', () => {
    manager.getConfig().cookies.push({ name: 'leak', value: 'x' });
    expect(manager.getConfig().cookies).toEqual([]);

    manager.loadFromObject({ consentMode: ConsentMode.HIDE_ONLY });
    manager.reset();
    expect(manager.getConfig().consentMode).toBe(ConsentMode.ACCEPT);
  });
});

describe('mergeConfig', () => {
  it('should leave the base untouched', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { cookies: [{ name: 'session', value: 'test-secret' }], urlFilter: '/shop' });

    expect(merged.cookies).toEqual([{ name: 'session', value: 'test-secret' }]);
    expect(merged.urlFilter).toBe('/shop');
    expect(DEFAULT_CONFIG.cookies).toEqual([]);
    expect(DEFAULT_CONFIG.urlFilter).toBeUndefined();
  });
});

describe('parseOverrides', () => {
  it('should read cookie domain and path', () => {
    const overrides = parseOverrides({ cookies: [{ name: 'a', value: 'b', domain: '.shop.test', path: '/cart' }] });
    expect(overrides.cookies).toEqual([{ name: 'a', value: 'b', domain: '.shop.test', path: '/cart' }]);
  });

  it('should reject unknown report formats', () => {
    expect(() => parseOverrides({ reporting: { formats: ['pdf'] } })).toThrow("Unknown report format 'pdf'");
  });
});

describe('validateScanConfiguration', () => {
  it('should accept the defaults', () => {
    expect(validateScanConfiguration(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
  });

  it('should collect every problem', () => {
    const { valid, errors } = validateScanConfiguration({
      timeoutMs: -5,
      settleMs: -1,
      cookies: [{ name: ' ', value: 'x' }],
      retry: { maxAttempts: 0, baseDelayMs: 100 },
      reporting: { formats: [], outputDir: '' },
    });

    expect(valid).toBe(false);
    expect(errors).toEqual([
      'Timeout must be a positive number of milliseconds',
      'Cookie #1 has no name',
      'settleMs cannot be negative',
      'Max attempts must be at least 1',
      'Output directory is required',
      'At least one report format must be specified',
    ]);
  });
});

describe('isValidUrl', () => {
  it('should accept only http and https', () => {
    expect(isValidUrl('https://shop.test/a')).toBe(true);
    expect(isValidUrl('ftp://shop.test/a')).toBe(false);
    expect(isValidUrl('shop.test')).toBe(false);
  });
});
