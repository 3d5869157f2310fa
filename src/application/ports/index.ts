export type {
  BrowserPort,
  NavigateOptions,
  PageConsoleEvent,
  PageConsoleListener,
} from './BrowserPort';
export type { ReportRepository } from './ReportRepository';
