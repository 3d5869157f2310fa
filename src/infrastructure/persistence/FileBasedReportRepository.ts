import * as fs from 'fs/promises';
import * as path from 'path';
import { ReportRepository } from '../../application/ports/ReportRepository';
import { ScrapeReport } from '../../domain/report/ScrapeReport';
import { ReportWriteError, describeError } from '../../domain/errors/AppErrors';

/**
 * File name for a domain's report. `:` (host:port) and path separators become `_`.
 */
export function reportFileName(domain: string): string {
  return `${domain.replace(/[:\\/]/g, '_')}.json`;
}

/**
 * File-based implementation of ReportRepository.
 * Stores one pretty-printed JSON file per domain in a single directory.
 */
export class FileBasedReportRepository implements ReportRepository {
  constructor(private readonly baseDir: string) {}

  async save(report: ScrapeReport): Promise<string> {
    const filePath = path.join(this.baseDir, reportFileName(report.domain));
    const data = JSON.stringify(report.toJSON(), null, 2);

    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.writeFile(filePath, data, 'utf-8');
    } catch (error) {
      throw new ReportWriteError(filePath, describeError(error));
    }

    return filePath;
  }
}
