import * as fs from 'fs';
import * as path from 'path';

import Handlebars from 'handlebars';

import { ScanConfiguration } from '../types/config';
import { PageStatus, ReportFormat } from '../types/enums';
import { PageError, ScanReport, ScanResult } from '../types/scan-result';

import { BaseReporter, ReporterInitOptions } from './base/IReporter';

const STATUS_ORDER: PageStatus[] = [PageStatus.FAILED, PageStatus.ERROR, PageStatus.WARN, PageStatus.IGNORED, PageStatus.OK];

interface ErrorView {
  kind: string;
  message: string;
  location?: string;
  count: number;
  whitelisted: boolean;
}

interface PageView {
  url: string;
  status: string;
  attempts: number;
  loadTime?: string;
  httpStatus?: number;
  failure?: string;
  errors: ErrorView[];
}

export interface ReportView {
  scanId: string;
  generatedAt: string;
  status: string;
  duration: string;
  summary: ScanReport['summary'];
  statusCards: Array<{ status: string; count: number }>;
  topErrors: ScanReport['summary']['topErrors'];
  pages: PageView[];
}

export class HtmlReporter extends BaseReporter {
  private template?: Handlebars.TemplateDelegate<ReportView>;

  getFormat(): ReportFormat {
    return ReportFormat.HTML;
  }

  override async init(config: ScanConfiguration, options: ReporterInitOptions): Promise<void> {
    await super.init(config, options);
    const candidateTemplates = [
      path.join(__dirname, 'templates', 'report.hbs'),
      // compiled output lives in dist/src/reporters
      path.join(__dirname, '..', '..', '..', 'src', 'reporters', 'templates', 'report.hbs'),
      path.join(process.cwd(), 'src', 'reporters', 'templates', 'report.hbs'),
    ];
    let source: string | undefined;
    for (const candidate of candidateTemplates) {
      if (fs.existsSync(candidate)) {
        source = await fs.promises.readFile(candidate, 'utf-8');
        break;
      }
    }
    if (!source) {
      // Fallback minimal template
      source = `<!doctype html><html><head><meta charset="utf-8"/><title>Console Error Report</title></head>
      <body><h1>Console Error Report</h1><p>{{scanId}} | {{status}} | {{duration}}</p>
      <ul>{{#each pages}}<li>[{{status}}] {{url}} ({{errors.length}})</li>{{/each}}</ul></body></html>`;
    }
    this.template = Handlebars.compile<ReportView>(source);
  }

  override async generate(report: ScanReport): Promise<string | undefined> {
    if (!this.template) return undefined;
    const html = this.template(buildReportView(report));
    const outPath = this.outputPath(report.scanId, 'html');
    await fs.promises.mkdir(path.dirname(outPath), { recursive: true });
    await fs.promises.writeFile(outPath, html, 'utf-8');
    return outPath;
  }
}

/**
 * Template data: pages sorted worst first, errors flattened for display
 */
export function buildReportView(report: ScanReport): ReportView {
  const pages = [...report.results]
    .sort((a, b) => STATUS_ORDER.indexOf(a.status) - STATUS_ORDER.indexOf(b.status))
    .map(toPageView);

  return {
    scanId: report.scanId,
    generatedAt: report.generatedAt,
    status: report.status,
    duration: formatMs(report.duration),
    summary: report.summary,
    statusCards: STATUS_ORDER.map((status) => ({ status, count: report.summary.byStatus[status] })),
    topErrors: report.summary.topErrors,
    pages,
  };
}

function toPageView(result: ScanResult): PageView {
  return {
    url: result.url,
    status: result.status,
    attempts: result.attemptCount,
    loadTime: result.loadTimeMs !== undefined ? formatMs(result.loadTimeMs) : undefined,
    httpStatus: result.finalHttpStatus,
    failure: result.failureReason ? `${result.failureReason}: ${result.failureMessage ?? ''}` : undefined,
    errors: result.errors.map(toErrorView),
  };
}

function toErrorView(error: PageError): ErrorView {
  const loc = error.sourceLocation;
  let location: string | undefined;
  if (loc) {
    location = loc.line ? `${loc.url}:${loc.line}${loc.column ? `:${loc.column}` : ''}` : loc.url;
  }
  return {
    kind: error.kind,
    message: error.message,
    location,
    count: error.occurrenceCount,
    whitelisted: error.whitelisted,
  };
}

export function formatMs(ms: number): string {
  return ms >= 1000 ? `${(ms / 1000).toFixed(1)}s` : `${ms}ms`;
}
