import * as path from 'path';

import { ScanConfiguration } from '../../types/config';
import { ReportFormat } from '../../types/enums';
import { PageError, ScanReport, ScanResult, ScanSummary } from '../../types/scan-result';

export interface ReporterInitOptions {
  outputDir: string;
  /** File name without extension; `{{scanId}}` is replaced */
  fileNameTemplate?: string;
}

export interface IReporter {
  getFormat(): ReportFormat;
  init(config: ScanConfiguration, options: ReporterInitOptions): Promise<void>;
  onScanStarted(scanId: string, total: number, config: ScanConfiguration): Promise<void>;
  onPageStarted(url: string, index: number, total: number): Promise<void>;
  onErrorObserved(url: string, error: PageError): Promise<void>;
  onPageFinished(result: ScanResult, completed: number, total: number): Promise<void>;
  onScanCompleted(summary: ScanSummary): Promise<void>;
  /** Write the report; returns the file written, if any */
  generate(report: ScanReport): Promise<string | undefined>;
}

export abstract class BaseReporter implements IReporter {
  protected config!: ScanConfiguration;
  protected options!: ReporterInitOptions;

  abstract getFormat(): ReportFormat;

  async init(config: ScanConfiguration, options: ReporterInitOptions): Promise<void> {
    this.config = config;
    this.options = options;
  }

  async onScanStarted(_scanId: string, _total: number, _config: ScanConfiguration): Promise<void> {}
  async onPageStarted(_url: string, _index: number, _total: number): Promise<void> {}
  async onErrorObserved(_url: string, _error: PageError): Promise<void> {}
  async onPageFinished(_result: ScanResult, _completed: number, _total: number): Promise<void> {}
  async onScanCompleted(_summary: ScanSummary): Promise<void> {}
  async generate(_report: ScanReport): Promise<string | undefined> {
    return undefined;
  }

  protected outputPath(scanId: string, extension: string): string {
    const fileName = (this.options.fileNameTemplate || 'scan-{{scanId}}').replace(/\{\{scanId\}\}/g, scanId);
    return path.join(this.options.outputDir, `${fileName}.${extension}`);
  }
}
