import { ScanEngine } from '../core/engine/ScanEngine';
import { errorMessage } from '../core/errors';
import { ReportFormat } from '../types/enums';
import { ScanEvents } from '../types/events';
import { Logger } from '../utils/logger/Logger';

import { IReporter } from './base/IReporter';
import { ConsoleReporter } from './ConsoleReporter';
import { HtmlReporter } from './HtmlReporter';
import { JsonReporter } from './JsonReporter';

export function createReporter(format: ReportFormat): IReporter {
  switch (format) {
    case ReportFormat.JSON:
      return new JsonReporter();
    case ReportFormat.HTML:
      return new HtmlReporter();
    case ReportFormat.CONSOLE:
      return new ConsoleReporter();
  }
}

/**
 * Forward engine events to reporter hooks. Returns a function that unsubscribes.
 * Hook failures are logged and never interrupt the scan.
 */
export function bindReporters(engine: ScanEngine, reporters: readonly IReporter[], logger: Logger): () => void {
  const run = (hook: string, call: (reporter: IReporter) => Promise<void>): void => {
    for (const reporter of reporters) {
      call(reporter).catch((error: unknown) => {
        logger.warn(`${reporter.getFormat()} reporter ${hook} failed: ${errorMessage(error)}`);
      });
    }
  };

  const onScanStarted = ({ scanId, total, config }: ScanEvents['scanStarted']): void =>
    run('onScanStarted', (r) => r.onScanStarted(scanId, total, config));
  const onPageStarted = ({ url, index, total }: ScanEvents['pageStarted']): void =>
    run('onPageStarted', (r) => r.onPageStarted(url, index, total));
  const onErrorObserved = ({ url, error }: ScanEvents['errorObserved']): void =>
    run('onErrorObserved', (r) => r.onErrorObserved(url, error));
  const onPageFinished = ({ result, completed, total }: ScanEvents['pageFinished']): void =>
    run('onPageFinished', (r) => r.onPageFinished(result, completed, total));
  const onScanCompleted = (summary: ScanEvents['scanCompleted']): void =>
    run('onScanCompleted', (r) => r.onScanCompleted(summary));

  engine.on('scanStarted', onScanStarted);
  engine.on('pageStarted', onPageStarted);
  engine.on('errorObserved', onErrorObserved);
  engine.on('pageFinished', onPageFinished);
  engine.on('scanCompleted', onScanCompleted);

  return () => {
    engine.off('scanStarted', onScanStarted);
    engine.off('pageStarted', onPageStarted);
    engine.off('errorObserved', onErrorObserved);
    engine.off('pageFinished', onPageFinished);
    engine.off('scanCompleted', onScanCompleted);
  };
}

export { BaseReporter, IReporter, ReporterInitOptions } from './base/IReporter';
export { ConsoleReporter } from './ConsoleReporter';
export { HtmlReporter } from './HtmlReporter';
export { JsonReporter } from './JsonReporter';
