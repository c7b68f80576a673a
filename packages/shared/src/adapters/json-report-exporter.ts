import { IReportExporter } from '../interfaces/report-exporter.js';
import { ILogger } from '../interfaces/logger.js';
import { InsightReport } from '../types.js';
import { reportFileName, toSerializable, writeReportFile } from './report-file.js';

export class JsonReportExporter implements IReportExporter {
  readonly extension = 'json';

  constructor(private logger?: ILogger) {}

  async export(report: InsightReport, outputDir: string, now: Date = new Date()): Promise<string> {
    const contents = JSON.stringify(toSerializable(report), null, 2);
    const filePath = await writeReportFile(outputDir, reportFileName(report.username, this.extension, now), contents);
    this.logger?.info(`JSON report saved: ${filePath}`);
    return filePath;
  }
}
