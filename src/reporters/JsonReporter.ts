import * as fs from 'fs';
import * as path from 'path';

import { ReportFormat } from '../types/enums';
import { ScanReport } from '../types/scan-result';

import { BaseReporter } from './base/IReporter';

export class JsonReporter extends BaseReporter {
  getFormat(): ReportFormat {
    return ReportFormat.JSON;
  }

  override async generate(report: ScanReport): Promise<string> {
    const outPath = this.outputPath(report.scanId, 'json');
    await fs.promises.mkdir(path.dirname(outPath), { recursive: true });
    await fs.promises.writeFile(outPath, JSON.stringify(report, null, 2), 'utf-8');
    return outPath;
  }
}
