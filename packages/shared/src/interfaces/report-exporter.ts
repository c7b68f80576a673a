import { InsightReport } from '../types.js';

export interface IReportExporter {
  readonly extension: string;
  /** Write the report into `outputDir` and return the path of the new file. */
  export(report: InsightReport, outputDir: string, now?: Date): Promise<string>;
}
