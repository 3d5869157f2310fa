import { ScrapeReport } from '../../domain/report/ScrapeReport';

/**
 * Repository interface for persisting scrape reports.
 */
export interface ReportRepository {
  /**
   * Save a report, replacing any previous report for the same domain.
   * @returns Location the report was written to
   */
  save(report: ScrapeReport): Promise<string>;
}
