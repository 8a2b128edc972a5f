/**
 * Unit tests for Logger
 */

import { Logger, LogSink } from '../../src/utils/logger/Logger';
import { LogLevel } from '../../src/types/enums';

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger(LogLevel.INFO);
  });

  describe('constructor', () => {
    it('should create logger with default log level', () => {
      const defaultLogger = new Logger();
      expect(defaultLogger.getLevel()).toBe(LogLevel.INFO);
    });

    it('should create logger with custom log level', () => {
      const debugLogger = new Logger(LogLevel.DEBUG);
      expect(debugLogger.getLevel()).toBe(LogLevel.DEBUG);
    });
  });

  describe('setLevel', () => {
    it('should update log level', () => {
      logger.setLevel(LogLevel.ERROR);
      expect(logger.getLevel()).toBe(LogLevel.ERROR);
    });
  });

  describe('child', () => {
    it('should create child logger with prefix', () => {
      const child = logger.child('TestModule');
      expect(child).toBeInstanceOf(Logger);
      expect(child.getPrefix()).toBe('TestModule');
    });

    it('should join nested prefixes', () => {
      const child = logger.child('ScanEngine').child('PageSession');
      expect(child.getPrefix()).toBe('ScanEngine:PageSession');
    });

    it('should inherit parent log level', () => {
      logger.setLevel(LogLevel.DEBUG);
      const child = logger.child('TestModule');
      expect(child.getLevel()).toBe(LogLevel.DEBUG);
    });

    it('should follow level changes made on the parent after creation', () => {
      const lines: string[] = [];
      const root = new Logger(LogLevel.INFO, '', [(_level, line) => lines.push(line)]);
      const child = root.child('ScanEngine').child('Playwright');

      root.setLevel(LogLevel.DEBUG);
      child.debug('context opened');

      expect(child.getLevel()).toBe(LogLevel.DEBUG);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatch(/DEBUG \[ScanEngine:Playwright\] context opened$/);
    });

    it('should keep a level set on the child itself', () => {
      const child = logger.child('TestModule');
      child.setLevel(LogLevel.ERROR);
      logger.setLevel(LogLevel.DEBUG);

      expect(child.getLevel()).toBe(LogLevel.ERROR);
    });
  });

  describe('logging methods', () => {
    it('should call error method', () => {
      const consoleSpy = jest.spyOn(console, 'error');
      logger.error('Test error');
      expect(consoleSpy).toHaveBeenCalled();
    });

    it('should call warn method when level allows', () => {
      const consoleSpy = jest.spyOn(console, 'warn');
      logger.warn('Test warning');
      expect(consoleSpy).toHaveBeenCalled();
    });

    it('should not log debug when level is INFO', () => {
      const sink = jest.fn<void, Parameters<LogSink>>();
      const quiet = new Logger(LogLevel.INFO, '', [sink]);
      quiet.debug('Debug message');
      expect(sink).not.toHaveBeenCalled();
    });
  });

  describe('sinks', () => {
    it('should format lines with level and prefix', () => {
      const sink = jest.fn<void, Parameters<LogSink>>();
      const withSink = new Logger(LogLevel.INFO, 'Config', [sink]);

      withSink.warn('Loaded', 42);

      expect(sink).toHaveBeenCalledTimes(1);
      const [level, line, args] = sink.mock.calls[0];
      expect(level).toBe(LogLevel.WARN);
      expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z WARN  \[Config\] Loaded$/);
      expect(args).toEqual([42]);
    });

    it('should pass sinks added to the parent on to later children', () => {
      const sink = jest.fn<void, Parameters<LogSink>>();
      const parent = new Logger(LogLevel.INFO, '', []);
      parent.addSink(sink);

      parent.child('History').info('saved');

      expect(sink).toHaveBeenCalledTimes(1);
      expect(sink.mock.calls[0][1]).toMatch(/INFO  \[History\] saved$/);
    });
  });
});
