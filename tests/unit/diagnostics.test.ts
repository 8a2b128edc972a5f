import { classifyDiagnostic, isCapturedAtLevel } from '../../src/core/analysis/DiagnosticClassifier';
import { ErrorCollector, dedupKey, deriveStatus, normalizeMessage } from '../../src/core/analysis/ErrorCollector';
import { ConsoleLevel, ErrorKind, PageStatus } from '../../src/types/enums';

describe('classifyDiagnostic', () => {
  it('should map console errors with their source location', () => {
    const classified = classifyDiagnostic(
      {
        type: 'console',
        level: 'error',
        text: 'Uncaught ReferenceError: gtag is not defined',
        location: { url: 'https://shop.test/app.js', line: 10, column: 0 },
      },
      ConsoleLevel.WARN
    );

    expect(classified).toEqual({
      kind: ErrorKind.CONSOLE_ERROR,
      message: 'Uncaught ReferenceError: gtag is not defined',
      sourceLocation: { url: 'https://shop.test/app.js', line: 10 },
    });
  });

  it('should drop the console echo of failed resources', () => {
    expect(
      classifyDiagnostic(
        { type: 'console', level: 'error', text: 'Failed to load resource: the server responded with a status of 404 ()' },
        ConsoleLevel.ALL
      )
    ).toBeNull();
  });

  it('should filter console messages by level', () => {
    const warning = { type: 'console' as const, level: 'warning', text: 'deprecated API' };
    const log = { type: 'console' as const, level: 'log', text: 'hello' };

    expect(classifyDiagnostic(warning, ConsoleLevel.ERROR)).toBeNull();
    expect(classifyDiagnostic(warning, ConsoleLevel.WARN)?.kind).toBe(ErrorKind.CONSOLE_WARN);
    expect(classifyDiagnostic(log, ConsoleLevel.WARN)).toBeNull();
    expect(classifyDiagnostic(log, ConsoleLevel.ALL)?.kind).toBe(ErrorKind.CONSOLE_LOG);
  });

  it('should name uncaught exceptions without a message', () => {
    expect(classifyDiagnostic({ type: 'pageerror', message: '' }, ConsoleLevel.ERROR)).toEqual({
      kind: ErrorKind.PAGE_ERROR,
      message: '(unknown error)',
    });
  });

  it('should record only error responses', () => {
    expect(
      classifyDiagnostic({ type: 'response', url: 'https://shop.test/', status: 200 }, ConsoleLevel.ALL)
    ).toBeNull();
    expect(
      classifyDiagnostic({ type: 'response', url: 'https://shop.test/api/cart', status: 503 }, ConsoleLevel.ERROR)
    ).toEqual({
      kind: ErrorKind.HTTP_ERROR,
      message: 'HTTP 503: https://shop.test/api/cart',
      sourceLocation: { url: 'https://shop.test/api/cart' },
    });
  });

  it('should ignore requests aborted by navigation', () => {
    expect(
      classifyDiagnostic({ type: 'requestfailed', url: 'https://cdn.test/a.js', errorText: 'net::ERR_ABORTED' }, ConsoleLevel.ALL)
    ).toBeNull();
    expect(
      classifyDiagnostic(
        { type: 'requestfailed', url: 'https://cdn.test/a.js', errorText: 'net::ERR_NAME_NOT_RESOLVED' },
        ConsoleLevel.ERROR
      )?.message
    ).toBe('Request failed: net::ERR_NAME_NOT_RESOLVED - https://cdn.test/a.js');
  });

  it('should describe CSP violations', () => {
    expect(
      classifyDiagnostic(
        {
          type: 'csp',
          directive: 'script-src',
          blockedUrl: 'https://tracker.test/t.js',
          reportOnly: false,
          sourceUrl: 'https://shop.test/',
          line: 3,
        },
        ConsoleLevel.ERROR
      )
    ).toEqual({
      kind: ErrorKind.CSP_VIOLATION,
      message: "CSP violation: 'script-src' blocked https://tracker.test/t.js",
      sourceLocation: { url: 'https://shop.test/', line: 3 },
    });
    expect(
      classifyDiagnostic({ type: 'csp', directive: 'img-src', reportOnly: true }, ConsoleLevel.ERROR)?.message
    ).toBe("CSP report-only: 'img-src'");
  });

  it('should keep security browser logs and deprecations only at level all', () => {
    expect(
      classifyDiagnostic({ type: 'browserlog', source: 'security', text: 'Refused to frame' }, ConsoleLevel.ERROR)
    ).toEqual({ kind: ErrorKind.CSP_VIOLATION, message: 'CSP violation: Refused to frame', sourceLocation: undefined });

    const deprecation = { type: 'browserlog' as const, source: 'deprecation', text: 'Unload handlers' };
    expect(classifyDiagnostic(deprecation, ConsoleLevel.WARN)).toBeNull();
    expect(classifyDiagnostic(deprecation, ConsoleLevel.ALL)?.message).toBe('Deprecation: Unload handlers');
    expect(classifyDiagnostic({ type: 'browserlog', source: 'network', text: 'x' }, ConsoleLevel.ALL)).toBeNull();
  });

  it('should always capture non-console kinds', () => {
    expect(isCapturedAtLevel(ErrorKind.REQUEST_FAILED, ConsoleLevel.ERROR)).toBe(true);
    expect(isCapturedAtLevel(ErrorKind.CONSOLE_INFO, ConsoleLevel.WARN)).toBe(false);
  });
});

describe('ErrorCollector', () => {
  it('should normalize whitespace for the dedup key', () => {
    expect(normalizeMessage('  a \n\t b  ')).toBe('a b');
    expect(dedupKey(ErrorKind.PAGE_ERROR, 'a  b')).toBe(dedupKey(ErrorKind.PAGE_ERROR, ' a b'));
    expect(dedupKey(ErrorKind.PAGE_ERROR, 'a b')).not.toBe(dedupKey(ErrorKind.CONSOLE_ERROR, 'a b'));
  });

  it('should count repeats on the first record', () => {
    const collector = new ErrorCollector([], () => 1000);

    const first = collector.add({ kind: ErrorKind.CONSOLE_ERROR, message: 'boom' });
    const repeat = collector.add({ kind: ErrorKind.CONSOLE_ERROR, message: ' boom ' });
    collector.add({ kind: ErrorKind.PAGE_ERROR, message: 'boom' });

    expect(first.isNew).toBe(true);
    expect(repeat.isNew).toBe(false);
    expect(collector.size).toBe(2);
    expect(collector.getErrors()[0]).toEqual({
      kind: ErrorKind.CONSOLE_ERROR,
      message: 'boom',
      timestamp: 1000,
      occurrenceCount: 2,
      whitelisted: false,
    });
  });

  it('should derive the page status as diagnostics arrive', () => {
    const collector = new ErrorCollector(['*hotjar*']);
    expect(collector.getStatus()).toBe(PageStatus.OK);

    collector.add({ kind: ErrorKind.CONSOLE_ERROR, message: 'Hotjar not loaded' });
    expect(collector.getStatus()).toBe(PageStatus.IGNORED);

    collector.add({ kind: ErrorKind.REQUEST_FAILED, message: 'Request failed: net::ERR_FAILED - https://cdn.test/x' });
    expect(collector.getStatus()).toBe(PageStatus.WARN);

    collector.add({ kind: ErrorKind.CSP_VIOLATION, message: "CSP violation: 'frame-src'" });
    expect(collector.getStatus()).toBe(PageStatus.ERROR);
  });

  it('should hand out copies', () => {
    const collector = new ErrorCollector();
    collector.add({ kind: ErrorKind.CONSOLE_WARN, message: 'slow' });

    collector.getErrors()[0].occurrenceCount = 99;

    expect(collector.getErrors()[0].occurrenceCount).toBe(1);
  });

  it('should keep the source location of the first record', () => {
    const collector = new ErrorCollector();
    collector.add({ kind: ErrorKind.PAGE_ERROR, message: 'x', sourceLocation: { url: 'https://shop.test/a.js', line: 4 } });

    expect(collector.getErrors()[0].sourceLocation).toEqual({ url: 'https://shop.test/a.js', line: 4 });
  });
});

describe('deriveStatus', () => {
  const error = (kind: ErrorKind, whitelisted = false) => ({
    kind,
    message: kind,
    timestamp: 0,
    occurrenceCount: 1,
    whitelisted,
  });

  it('should rank error over warn over ignored', () => {
    expect(deriveStatus([])).toBe(PageStatus.OK);
    expect(deriveStatus([error(ErrorKind.HTTP_ERROR, true)])).toBe(PageStatus.IGNORED);
    expect(deriveStatus([error(ErrorKind.HTTP_ERROR, true), error(ErrorKind.CONSOLE_WARN)])).toBe(PageStatus.WARN);
    expect(deriveStatus([error(ErrorKind.CONSOLE_WARN), error(ErrorKind.PAGE_ERROR)])).toBe(PageStatus.ERROR);
  });
});
