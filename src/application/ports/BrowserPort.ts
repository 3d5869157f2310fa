import { ClickableElement } from '../../domain/browser/ClickableElement';
import { SourceLocation } from '../../domain/console/ConsoleRecord';

/**
 * Options for browser navigation.
 */
export interface NavigateOptions {
  /** Load state that ends the navigation */
  waitUntil?: 'load' | 'domcontentloaded' | 'networkidle';
  /** Timeout in milliseconds */
  timeout?: number;
}

/**
 * Event emitted by the page: a console message of any level, or an uncaught script error.
 */
export type PageConsoleEvent =
  | {
      source: 'console';
      /** Console message type as reported by the browser (log, warning, error, ...) */
      level: string;
      text: string;
      location?: SourceLocation;
    }
  | {
      source: 'page';
      /** String form of the thrown exception */
      message: string;
    };

export type PageConsoleListener = (event: PageConsoleEvent) => void;

/**
 * Port interface for the browser session used by a scrape run.
 * One instance owns one browser process and one page.
 */
export interface BrowserPort {
  /**
   * Launches the browser and opens the page.
   * Must be called before any other operation.
   */
  initialize(): Promise<void>;

  /**
   * Closes page, context and browser. Safe to call more than once,
   * and after a failed initialize().
   */
  close(): Promise<void>;

  /**
   * Checks if the browser is launched and the page is open.
   */
  isReady(): boolean;

  /**
   * Registers a listener for console messages and page errors.
   * Listeners registered before initialize() are attached when the page opens.
   */
  onConsoleEvent(listener: PageConsoleListener): void;

  /**
   * Navigates the page. Rejects with NavigationError when the page cannot be loaded.
   */
  navigate(url: string, options?: NavigateOptions): Promise<void>;

  /**
   * Waits until there are no network connections for a while.
   * Resolves to false when the timeout elapses first; never rejects for a timeout.
   */
  waitForNetworkIdle(timeout?: number): Promise<boolean>;

  /**
   * Buttons and links currently in the DOM, in document order.
   */
  getClickableElements(): Promise<ClickableElement[]>;

  /**
   * Returns the markers (case-insensitive) found in the page's visible text
   * or in any element's id, class or aria-label.
   */
  findConsentMarkers(markers: string[]): Promise<string[]>;

  scrollToBottom(): Promise<void>;

  scrollToTop(): Promise<void>;

  getCurrentUrl(): Promise<string>;
}
