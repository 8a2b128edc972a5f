#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';

import { ConfigOverrides, ConfigurationManager } from '../core/config/ConfigurationManager';
import { ScanEngine } from '../core/engine/ScanEngine';
import { ConfigurationError, errorMessage } from '../core/errors';
import { HistoryStore, label } from '../history/HistoryStore';
import { SettingsStore } from '../history/SettingsStore';
import { bindReporters, createReporter } from '../reporters';
import { HttpSitemapSource } from '../sitemap/SitemapSource';
import { CookieConfig, ScanConfiguration } from '../types/config';
import { BrowserType, ConsentMode, ConsoleLevel, LogLevel, PageStatus, ReportFormat } from '../types/enums';
import { Logger } from '../utils/logger/Logger';
import { loadWhitelist } from '../utils/whitelist/Whitelist';

interface CliOptions {
  concurrency?: string;
  timeout?: string;
  filter?: string;
  consoleLevel?: string;
  userAgent?: string;
  cookie: string[];
  whitelist?: string;
  consent: boolean;
  headless: boolean;
  browser?: string;
  config?: string;
  output?: string;
  formats?: string;
  logLevel?: string;
}

/** Exit code when at least one page ended in `error` or `failed` */
const EXIT_PAGES_FAILED = 2;

const program = new Command();

program
  .name('console-error-scanner')
  .version('0.1.0')
  .description('Scan every page of a sitemap for console errors, page errors and CSP violations')
  .argument('[source]', 'Sitemap URL, local sitemap file or domain')
  .option('-c, --concurrency <n>', 'Pages scanned in parallel')
  .option('-t, --timeout <sec>', 'Navigation timeout per attempt in seconds')
  .option('-f, --filter <text>', 'Only scan URLs containing this text')
  .option('--console-level <level>', 'Console messages to record: error, warn or all')
  .option('--user-agent <ua>', 'User agent sent with every request')
  .option('--cookie <NAME=VALUE>', 'Cookie set before navigation (repeatable)', collect, [])
  .option('-w, --whitelist <file>', 'JSON file with known error patterns')
  .option('--no-consent', 'Hide cookie banners instead of accepting them')
  .option('--no-headless', 'Show the browser window')
  .option('--browser <type>', 'Browser engine: chromium, firefox or webkit')
  .option('--config <file>', 'Load configuration from a JSON file')
  .option('-o, --output <dir>', 'Output directory for reports')
  .option('--formats <list>', 'Comma-separated report formats (console,json,html)')
  .option('--log-level <level>', 'Log level: error, warn, info or debug')
  .action(async (source: string | undefined, options: CliOptions, command: Command) => {
    const logger = new Logger(pickEnum(LogLevel, options.logLevel) ?? LogLevel.INFO, 'CLI');
    let engine: ScanEngine | undefined;
    try {
      if (!source) {
        throw new Error('A sitemap URL, sitemap file or domain is required (see --help)');
      }

      const settings = await new SettingsStore({ logger }).load();
      const config = await buildConfig(options, command, settings.consentMode, logger);

      const urls = await new HttpSitemapSource({
        userAgent: config.userAgent,
        cookies: config.cookies,
        logger,
      }).resolve(source);
      logger.info(`Found ${urls.length} URL(s) in ${source}`);

      await new HistoryStore({ logger }).add({
        source,
        concurrency: config.concurrency,
        timeoutMs: config.timeoutMs,
        consoleLevel: config.consoleLevel,
        urlFilter: config.urlFilter,
        userAgent: options.userAgent,
        cookies: config.cookies,
        whitelistPath: options.whitelist,
        consentMode: config.consentMode,
      });

      engine = new ScanEngine({ logger });

      const reporters = config.reporting.formats.map(createReporter);
      for (const reporter of reporters) {
        await reporter.init(config, {
          outputDir: config.reporting.outputDir,
          fileNameTemplate: config.reporting.fileNameTemplate,
        });
      }
      const unbind = bindReporters(engine, reporters, logger);

      const scanEngine = engine;
      let interrupts = 0;
      const onInterrupt = (): void => {
        interrupts++;
        if (interrupts > 1) {
          process.exit(130);
        }
        console.error(chalk.yellow('\nCancelling scan, press Ctrl+C again to quit immediately'));
        scanEngine.cancelScan();
      };
      process.on('SIGINT', onInterrupt);

      const summary = await engine.startScan(urls, config);
      process.off('SIGINT', onInterrupt);
      unbind();

      const report = engine.getReport();
      for (const reporter of reporters) {
        const written = await reporter.generate(report);
        if (written) {
          console.log(`📄 ${reporter.getFormat().toUpperCase()} report: ${written}`);
        }
      }

      await engine.dispose();
      process.exit(summary.byStatus[PageStatus.ERROR] + summary.byStatus[PageStatus.FAILED] > 0 ? EXIT_PAGES_FAILED : 0);
    } catch (err: unknown) {
      if (engine) {
        await engine.dispose();
      }
      console.error(chalk.red(`\n✖ ${errorMessage(err)}`));
      if (err instanceof ConfigurationError) {
        for (const problem of err.errors) {
          console.error(chalk.red(`  - ${problem}`));
        }
      }
      process.exit(1);
    }
  });

program
  .command('history')
  .description('List past scans, newest first')
  .action(async () => {
    const entries = await new HistoryStore().load();
    if (entries.length === 0) {
      console.log('No scans recorded yet');
      return;
    }
    entries.forEach((entry, index) => {
      console.log(`${chalk.gray(String(index + 1).padStart(2))}  ${label(entry)}`);
    });
  });

program
  .command('settings')
  .description('Show or change persisted settings')
  .option('--consent <mode>', 'Default consent handling: accept or hide-only')
  .action(async (options: { consent?: string }) => {
    const store = new SettingsStore();
    const settings = await store.load();
    if (options.consent !== undefined) {
      const mode = pickEnum(ConsentMode, options.consent);
      if (!mode) {
        console.error(chalk.red(`Unknown consent mode '${options.consent}'`));
        process.exit(1);
      }
      settings.consentMode = mode;
      await store.save(settings);
    }
    console.log(`consent: ${settings.consentMode}`);
  });

/**
 * Defaults, then the saved settings, then the --config file, then the command line flags
 */
async function buildConfig(
  options: CliOptions,
  command: Command,
  savedConsentMode: ConsentMode,
  logger: Logger
): Promise<ScanConfiguration> {
  const manager = new ConfigurationManager(logger);
  manager.loadFromObject({ consentMode: savedConsentMode });
  if (options.config) {
    await manager.loadFromFile(options.config);
  }

  const errors: string[] = [];
  const overrides: ConfigOverrides = {};

  if (options.concurrency !== undefined) overrides.concurrency = parseNumber('--concurrency', options.concurrency, errors);
  if (options.timeout !== undefined) {
    overrides.timeoutMs = Math.round(parseNumber('--timeout', options.timeout, errors) * 1000);
  }
  if (options.filter) overrides.urlFilter = options.filter;
  if (options.consoleLevel !== undefined) {
    overrides.consoleLevel = parseEnum('--console-level', ConsoleLevel, options.consoleLevel, errors);
  }
  if (options.userAgent) overrides.userAgent = options.userAgent;
  if (options.cookie.length > 0) overrides.cookies = parseCookieFlags(options.cookie, errors);
  if (options.logLevel !== undefined) overrides.logLevel = parseEnum('--log-level', LogLevel, options.logLevel, errors);
  if (!options.consent) overrides.consentMode = ConsentMode.HIDE_ONLY;

  if (options.browser !== undefined || command.getOptionValueSource('headless') === 'cli') {
    overrides.browser = {
      type: options.browser !== undefined ? parseEnum('--browser', BrowserType, options.browser, errors) : undefined,
      headless: command.getOptionValueSource('headless') === 'cli' ? options.headless : undefined,
    };
  }
  if (options.output !== undefined || options.formats !== undefined) {
    overrides.reporting = {
      outputDir: options.output,
      formats:
        options.formats !== undefined
          ? options.formats.split(',').flatMap((format) => {
              const parsed = parseEnum('--formats', ReportFormat, format.trim(), errors);
              return parsed ? [parsed] : [];
            })
          : undefined,
    };
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  if (options.whitelist) {
    overrides.whitelist = await loadWhitelist(options.whitelist, logger);
  }
  return manager.loadFromObject(overrides);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseNumber(flag: string, value: string, errors: string[]): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    errors.push(`${flag} must be a number, got '${value}'`);
  }
  return parsed;
}

function parseCookieFlags(values: readonly string[], errors: string[]): CookieConfig[] {
  return values.flatMap((value): CookieConfig[] => {
    const separator = value.indexOf('=');
    if (separator <= 0) {
      errors.push(`--cookie expects NAME=VALUE, got '${value}'`);
      return [];
    }
    return [{ name: value.slice(0, separator).trim(), value: value.slice(separator + 1) }];
  });
}

function pickEnum<T extends string>(values: Record<string, T>, raw: string | undefined): T | undefined {
  if (raw === undefined) return undefined;
  const normalized = raw.toLowerCase();
  return Object.values(values).find((value) => value === normalized);
}

function parseEnum<T extends string>(flag: string, values: Record<string, T>, raw: string, errors: string[]): T | undefined {
  const value = pickEnum(values, raw);
  if (value === undefined) {
    errors.push(`${flag} must be one of ${Object.values(values).join(', ')}, got '${raw}'`);
  }
  return value;
}

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(errorMessage(err)));
  process.exit(1);
});
