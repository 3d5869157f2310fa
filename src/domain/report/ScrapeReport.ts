import { ConsoleRecord, ConsoleRecordJSON, ConsoleRecordKind } from '../console/ConsoleRecord';

export interface ScrapeReportProps {
  siteUrl: string;
  scrapedAt: Date;
  gdprCompliant: boolean;
  errors: ReadonlyArray<ConsoleRecord>;
}

/**
 * Serialized report shape. Keys are snake_case to match the file format.
 */
export interface ScrapeReportJSON {
  site_url: string;
  domain: string;
  scraped_at: string;
  gdpr_compliant: boolean;
  error_count: number;
  errors: ConsoleRecordJSON[];
}

/**
 * Returns the host of a URL (hostname plus an explicit port), without scheme, path or query.
 */
export function deriveDomain(siteUrl: string): string {
  return new URL(siteUrl).host;
}

/**
 * Summary of one run: the target, whether a consent banner showed up, and every captured record.
 */
export class ScrapeReport {
  private readonly props: ScrapeReportProps;
  public readonly domain: string;

  private constructor(props: ScrapeReportProps) {
    this.props = props;
    this.domain = deriveDomain(props.siteUrl);
  }

  public static create(props: ScrapeReportProps): ScrapeReport {
    return new ScrapeReport({
      siteUrl: props.siteUrl,
      scrapedAt: new Date(props.scrapedAt.getTime()),
      gdprCompliant: props.gdprCompliant,
      errors: [...props.errors],
    });
  }

  public get gdprCompliant(): boolean {
    return this.props.gdprCompliant;
  }

  public get errors(): ReadonlyArray<ConsoleRecord> {
    return this.props.errors;
  }

  public get errorCount(): number {
    return this.props.errors.length;
  }

  /**
   * Number of records per kind, in first-seen order.
   */
  public countByKind(): Map<ConsoleRecordKind, number> {
    const counts = new Map<ConsoleRecordKind, number>();
    for (const record of this.props.errors) {
      counts.set(record.kind, (counts.get(record.kind) ?? 0) + 1);
    }
    return counts;
  }

  public toJSON(): ScrapeReportJSON {
    const errors = this.props.errors.map(record => record.toJSON());
    return {
      site_url: this.props.siteUrl,
      domain: this.domain,
      scraped_at: this.props.scrapedAt.toISOString(),
      gdpr_compliant: this.props.gdprCompliant,
      error_count: errors.length,
      errors,
    };
  }
}
