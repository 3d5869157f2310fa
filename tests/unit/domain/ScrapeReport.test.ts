import { ScrapeReport, deriveDomain } from '../../../src/domain/report/ScrapeReport';
import { ConsoleRecord, ConsoleRecordKind } from '../../../src/domain/console/ConsoleRecord';

describe('deriveDomain', () => {
  it('should keep only the host', () => {
    expect(deriveDomain('https://www.example.com/path?q=1#top')).toBe('www.example.com');
  });

  it('should keep an explicit port', () => {
    expect(deriveDomain('http://localhost:8080/app')).toBe('localhost:8080');
  });

  it('should drop the default port', () => {
    expect(deriveDomain('https://example.com:443/')).toBe('example.com');
  });
});

describe('ScrapeReport', () => {
  const scrapedAt = new Date('2024-05-01T10:00:00.000Z');

  const record = (kind: ConsoleRecordKind, message: string): ConsoleRecord =>
    ConsoleRecord.create({ kind, message, timestamp: scrapedAt });

  it('should serialize an empty report', () => {
    const report = ScrapeReport.create({
      siteUrl: 'https://example.com',
      scrapedAt,
      gdprCompliant: false,
      errors: [],
    });

    expect(report.toJSON()).toEqual({
      site_url: 'https://example.com',
      domain: 'example.com',
      scraped_at: '2024-05-01T10:00:00.000Z',
      gdpr_compliant: false,
      error_count: 0,
      errors: [],
    });
  });

  it('should keep error_count equal to the number of errors', () => {
    const report = ScrapeReport.create({
      siteUrl: 'https://example.com/shop',
      scrapedAt,
      gdprCompliant: true,
      errors: [record('error', 'a'), record('warning', 'b'), record('page_error', 'c')],
    });

    const json = report.toJSON();

    expect(json.error_count).toBe(3);
    expect(json.errors.map(e => e.type)).toEqual(['error', 'warning', 'page_error']);
    expect(report.errorCount).toBe(3);
  });

  it('should copy the errors it is given', () => {
    const errors = [record('error', 'a')];
    const report = ScrapeReport.create({ siteUrl: 'https://example.com', scrapedAt, gdprCompliant: false, errors });

    errors.push(record('error', 'b'));

    expect(report.errorCount).toBe(1);
  });

  it('should count records per kind in first-seen order', () => {
    const report = ScrapeReport.create({
      siteUrl: 'https://example.com',
      scrapedAt,
      gdprCompliant: false,
      errors: [
        record('warning', 'a'),
        record('error', 'b'),
        record('warning', 'c'),
        record('page_error', 'd'),
      ],
    });

    expect(Array.from(report.countByKind().entries())).toEqual([
      ['warning', 2],
      ['error', 1],
      ['page_error', 1],
    ]);
  });
});
