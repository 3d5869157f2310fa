import { BrowserPort } from '../ports/BrowserPort';
import { ReportRepository } from '../ports/ReportRepository';
import { ScrapeReport } from '../../domain/report/ScrapeReport';
import { describeError } from '../../domain/errors/AppErrors';
import { NAVIGATION } from '../config/ScraperDefaults';
import { Logger, getLogger } from '../../infrastructure/logging';
import { ConsoleEventRecorder } from './ConsoleEventRecorder';
import { ConsentBannerHandler, ConsentBannerOptions, ConsentOutcome } from './ConsentBannerHandler';
import { Delay, sleep } from './delay';

/**
 * Timing of a run, in milliseconds.
 */
export interface ScrapeTimings {
  timeout: number;
  networkIdleTimeout: number;
  initialWait: number;
  settleDelay: number;
  /** Scroll to the bottom and back to trigger lazy-loaded content */
  scrollPage: boolean;
}

export interface ScrapeServiceDeps {
  browser: BrowserPort;
  reports: ReportRepository;
  consent: ConsentBannerOptions;
  timings: ScrapeTimings;
  delay?: Delay;
  now?: () => Date;
}

export interface ScrapeResult {
  report: ScrapeReport;
  reportPath: string;
  consent: ConsentOutcome;
}

/**
 * Runs one scrape: open the page with console capture attached, deal with the
 * consent banner, let late activity surface, then write the report.
 *
 * The browser is closed on every exit path. Launch and navigation failures
 * propagate and no report is written for them.
 *
 * An instance owns its browser for a single run; `run()` rejects when called again.
 */
export class ScrapeService {
  private readonly browser: BrowserPort;
  private readonly reports: ReportRepository;
  private readonly consentOptions: ConsentBannerOptions;
  private readonly timings: ScrapeTimings;
  private readonly delay: Delay;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private started = false;

  constructor(deps: ScrapeServiceDeps) {
    this.browser = deps.browser;
    this.reports = deps.reports;
    this.consentOptions = deps.consent;
    this.timings = deps.timings;
    this.delay = deps.delay ?? sleep;
    this.now = deps.now ?? (() => new Date());
    this.logger = getLogger('Scraper');
  }

  async run(siteUrl: string): Promise<ScrapeResult> {
    if (this.started) {
      throw new Error('ScrapeService.run() was already called; create a new service and browser');
    }
    this.started = true;

    this.logger.info('Starting console error scraper...', { url: siteUrl });
    const recorder = new ConsoleEventRecorder(this.now);

    try {
      recorder.attach(this.browser);
      await this.browser.initialize();

      await this.browser.navigate(siteUrl, {
        waitUntil: 'domcontentloaded',
        timeout: this.timings.timeout,
      });
      this.logger.info('Page loaded', { url: await this.browser.getCurrentUrl() });
      await this.delay(this.timings.initialWait);

      const consent = await new ConsentBannerHandler(
        this.browser,
        this.consentOptions,
        this.delay
      ).handle();

      this.logger.info('Waiting for page to fully load...');
      const idle = await this.browser.waitForNetworkIdle(this.timings.networkIdleTimeout);
      if (!idle) {
        this.logger.debug('Network did not go idle before the timeout', {
          timeout: this.timings.networkIdleTimeout,
        });
      }
      await this.delay(this.timings.settleDelay);

      if (this.timings.scrollPage) {
        await this.scrollPage();
      }

      this.logger.info(`Captured ${recorder.count()} console errors/warnings`);

      const report = ScrapeReport.create({
        siteUrl,
        scrapedAt: this.now(),
        gdprCompliant: consent.bannerDetected,
        errors: recorder.getRecords(),
      });

      const reportPath = await this.reports.save(report);
      this.logSummary(report, reportPath);

      return { report, reportPath, consent };
    } finally {
      await this.closeBrowser();
    }
  }

  /**
   * Scrolls to the bottom and back up, pausing after each step.
   * Scroll failures are logged, not thrown.
   */
  private async scrollPage(): Promise<void> {
    try {
      this.logger.info('Scrolling page to trigger additional content...');
      await this.browser.scrollToBottom();
      await this.delay(NAVIGATION.SCROLL_PAUSE);
      await this.browser.scrollToTop();
      await this.delay(NAVIGATION.SCROLL_PAUSE);
    } catch (error) {
      this.logger.warn('Scrolling failed', { error: describeError(error) });
    }
  }

  private async closeBrowser(): Promise<void> {
    try {
      await this.browser.close();
    } catch (error) {
      this.logger.warn('Browser close failed', { error: describeError(error) });
    }
  }

  private logSummary(report: ScrapeReport, reportPath: string): void {
    this.logger.info(`Console errors saved to: ${reportPath}`);
    this.logger.info(`Total errors captured: ${report.errorCount}`);
    this.logger.info(`GDPR/Cookie consent detected: ${report.gdprCompliant ? 'YES' : 'NO'}`);

    const counts = report.countByKind();
    if (counts.size > 0) {
      this.logger.info('Error summary:');
      for (const [kind, count] of counts) {
        this.logger.info(`  - ${kind}: ${count}`);
      }
    }
  }
}
