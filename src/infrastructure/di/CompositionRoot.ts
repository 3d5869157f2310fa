import { ScrapeService } from '../../application/services/ScrapeService';
import { PlaywrightBrowserAdapter } from '../browser/PlaywrightBrowserAdapter';
import { FileBasedReportRepository } from '../persistence/FileBasedReportRepository';
import { AppConfig } from '../config/ConfigSchema';
import { ConfigFactory, ConfigLoadOptions } from '../config/ConfigFactory';
import { setGlobalLoggerConfig } from '../logging';
import { onShutdown } from '../shutdown/GracefulShutdown';

export interface ApplicationContainer {
  config: AppConfig;
  scrapeService: ScrapeService;
  reportRepository: FileBasedReportRepository;
}

export class CompositionRoot {
  /**
   * Loads configuration and wires the scraper. Throws ConfigurationError
   * before anything is launched when the configuration is invalid.
   */
  static initialize(options: ConfigLoadOptions = {}): ApplicationContainer {
    // 1. Load Configuration
    const config = ConfigFactory.load(options);

    setGlobalLoggerConfig({
      minLevel: config.logging.level,
      jsonOutput: config.logging.json,
      useColors: !config.logging.json && Boolean(process.stdout.isTTY),
    });

    // 2. Initialize Infrastructure Adapters
    const browser = new PlaywrightBrowserAdapter({
      headless: config.browser.headless,
      timeout: config.navigation.timeout,
      viewportWidth: config.browser.width,
      viewportHeight: config.browser.height,
      userAgent: config.browser.userAgent,
    });
    onShutdown(() => browser.close());

    const reportRepository = new FileBasedReportRepository(config.output.directory);

    // 3. Initialize Application Services
    const scrapeService = new ScrapeService({
      browser,
      reports: reportRepository,
      consent: config.consent,
      timings: config.navigation,
    });

    return { config, scrapeService, reportRepository };
  }
}
