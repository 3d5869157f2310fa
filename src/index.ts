/**
 * Console Error Scraper
 * Library entry point. The CLI lives in main.ts.
 */

export { ScrapeService } from './application/services/ScrapeService';
export type { ScrapeResult, ScrapeTimings, ScrapeServiceDeps } from './application/services/ScrapeService';
export { ConsoleEventRecorder } from './application/services/ConsoleEventRecorder';
export { ConsentBannerHandler } from './application/services/ConsentBannerHandler';
export type { ConsentOutcome, ConsentBannerOptions } from './application/services/ConsentBannerHandler';
export type { BrowserPort, PageConsoleEvent, ReportRepository } from './application/ports';

export { ConsoleRecord } from './domain/console/ConsoleRecord';
export type { ConsoleRecordKind, ConsoleRecordJSON } from './domain/console/ConsoleRecord';
export { ScrapeReport, deriveDomain } from './domain/report/ScrapeReport';
export type { ScrapeReportJSON } from './domain/report/ScrapeReport';
export type { ClickableElement } from './domain/browser/ClickableElement';
export { findAcceptCandidates, containsPhrase, normalizeText } from './domain/consent/ConsentMatcher';
export * from './domain/errors/AppErrors';

export { PlaywrightBrowserAdapter } from './infrastructure/browser/PlaywrightBrowserAdapter';
export { FileBasedReportRepository } from './infrastructure/persistence/FileBasedReportRepository';
export { ConfigFactory } from './infrastructure/config/ConfigFactory';
export type { AppConfig } from './infrastructure/config/ConfigSchema';
export { CompositionRoot } from './infrastructure/di/CompositionRoot';
