import chalk from 'chalk';
import ora, { Ora } from 'ora';

import { ScanConfiguration } from '../types/config';
import { PageStatus, ReportFormat } from '../types/enums';
import { ScanResult, ScanSummary } from '../types/scan-result';

import { BaseReporter } from './base/IReporter';

/** Diagnostics printed per page; the rest is in the file reports */
const MAX_LISTED_ERRORS = 3;
const MAX_TOP_ERRORS = 10;

const STATUS_STYLE: Record<PageStatus, chalk.Chalk> = {
  [PageStatus.FAILED]: chalk.bgRed.white,
  [PageStatus.ERROR]: chalk.red,
  [PageStatus.WARN]: chalk.yellow,
  [PageStatus.IGNORED]: chalk.gray,
  [PageStatus.OK]: chalk.green,
};

export class ConsoleReporter extends BaseReporter {
  private spinner: Ora;

  constructor(spinner?: Ora) {
    super();
    this.spinner = spinner ?? ora({ spinner: 'dots' });
  }

  getFormat(): ReportFormat {
    return ReportFormat.CONSOLE;
  }

  override async onScanStarted(scanId: string, total: number, config: ScanConfiguration): Promise<void> {
    this.config = config;
    this.spinner.start(`Starting scan ${scanId}: ${total} URL(s), concurrency ${config.concurrency}`);
  }

  override async onPageStarted(url: string, index: number, total: number): Promise<void> {
    this.spinner.text = `[${index}/${total}] ${url}`;
  }

  override async onPageFinished(result: ScanResult, completed: number, total: number): Promise<void> {
    this.spinner.stop();
    // eslint-disable-next-line no-console
    console.log(formatResultLine(result, completed, total));
    for (const error of result.errors.filter((e) => !e.whitelisted).slice(0, MAX_LISTED_ERRORS)) {
      const count = error.occurrenceCount > 1 ? chalk.gray(` x${error.occurrenceCount}`) : '';
      // eslint-disable-next-line no-console
      console.log(`    ${chalk.gray(error.kind)} ${truncate(error.message, 160)}${count}`);
    }
    this.spinner.start();
  }

  override async onScanCompleted(summary: ScanSummary): Promise<void> {
    this.spinner.stop();
    const s = summary.byStatus;
    // eslint-disable-next-line no-console
    console.log(
      chalk.bold(`\nScan ${summary.status} in ${(summary.duration / 1000).toFixed(1)}s: `) +
        `${summary.scannedUrls}/${summary.totalUrls} pages ` +
        `(${STATUS_STYLE.ok(`OK:${s.ok}`)} ${STATUS_STYLE.warn(`W:${s.warn}`)} ${STATUS_STYLE.error(`E:${s.error}`)} ` +
        `${STATUS_STYLE.ignored(`I:${s.ignored}`)} ${STATUS_STYLE.failed(`F:${s.failed}`)})\n`
    );

    const top = [...summary.topErrors].sort((a, b) => b.count - a.count).slice(0, MAX_TOP_ERRORS);
    if (top.length === 0) return;
    // eslint-disable-next-line no-console
    console.log(chalk.bold('Top errors:'));
    top.forEach((entry, index) => {
      const rank = `${String(index + 1).padStart(2)}. ${chalk.bold(`${entry.count}x`)}`;
      // eslint-disable-next-line no-console
      console.log(`  ${rank} ${chalk.gray(entry.kind)} ${truncate(entry.message, 160)}`);
    });
  }
}

export function formatResultLine(result: ScanResult, completed: number, total: number): string {
  const label = STATUS_STYLE[result.status](` ${result.status.toUpperCase()} `);
  const details: string[] = [];
  if (result.loadTimeMs !== undefined) {
    details.push(`${(result.loadTimeMs / 1000).toFixed(1)}s`);
  }
  if (result.errors.length > 0) {
    details.push(`${result.errors.length} diagnostic(s)`);
  }
  if (result.failureReason) {
    details.push(`${result.failureReason} after ${result.attemptCount} attempt(s)`);
  }
  const suffix = details.length > 0 ? chalk.gray(` (${details.join(', ')})`) : '';
  return `[${completed}/${total}] ${label} ${result.url}${suffix}`;
}

function truncate(text: string, max: number): string {
  const singleLine = text.replace(/\s+/g, ' ');
  return singleLine.length > max ? `${singleLine.slice(0, max - 1)}…` : singleLine;
}
