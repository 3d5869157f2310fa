import { chromium, errors, Browser, BrowserContext, ConsoleMessage, Page } from 'playwright';
import {
  BrowserPort,
  NavigateOptions,
  PageConsoleEvent,
  PageConsoleListener,
} from '../../application/ports/BrowserPort';
import { ClickableElement } from '../../domain/browser/ClickableElement';
import {
  BrowserLaunchError,
  NavigationError,
  describeError,
} from '../../domain/errors/AppErrors';
import { BROWSER, NAVIGATION } from '../../application/config/ScraperDefaults';
import { Logger, getLogger } from '../logging';
import {
  ClickableElementSnapshot,
  PlaywrightClickableElement,
} from './PlaywrightClickableElement';

/**
 * Configuration for the PlaywrightBrowserAdapter.
 */
export interface PlaywrightBrowserConfig {
  /** Run browser in headless mode */
  headless?: boolean;
  /** Default timeout for page operations in milliseconds */
  timeout?: number;
  /** Viewport width */
  viewportWidth?: number;
  /** Viewport height */
  viewportHeight?: number;
  /** User agent reported by the page */
  userAgent?: string;
  /** Extra Chromium command-line flags */
  launchArgs?: string[];
}

const DEFAULT_CONFIG: Required<PlaywrightBrowserConfig> = {
  headless: true,
  timeout: NAVIGATION.DEFAULT_TIMEOUT,
  viewportWidth: BROWSER.DEFAULT_VIEWPORT_WIDTH,
  viewportHeight: BROWSER.DEFAULT_VIEWPORT_HEIGHT,
  userAgent: BROWSER.DEFAULT_USER_AGENT,
  launchArgs: [...BROWSER.LAUNCH_ARGS],
};

/** Elements a user can click to dismiss a banner */
export const CLICKABLE_SELECTOR =
  'button, a, [role="button"], input[type="button"], input[type="submit"]';

/**
 * Playwright implementation of the BrowserPort interface.
 * Owns one Chromium process, one context and one page.
 */
export class PlaywrightBrowserAdapter implements BrowserPort {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private config: Required<PlaywrightBrowserConfig>;
  private listeners: PageConsoleListener[] = [];
  private logger: Logger;

  constructor(config: PlaywrightBrowserConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = getLogger('Browser');
  }

  /**
   * Launches Chromium and opens the page.
   */
  async initialize(): Promise<void> {
    let page: Page;
    try {
      const browser = await chromium.launch({
        headless: this.config.headless,
        args: this.config.launchArgs,
      });
      this.browser = browser;

      const context = await browser.newContext({
        userAgent: this.config.userAgent,
        viewport: {
          width: this.config.viewportWidth,
          height: this.config.viewportHeight,
        },
      });
      this.context = context;

      page = await context.newPage();
    } catch (error) {
      throw new BrowserLaunchError(describeError(error), error);
    }
    this.page = page;

    page.setDefaultTimeout(this.config.timeout);

    page.on('console', msg => this.dispatch(this.toConsoleEvent(msg)));
    page.on('pageerror', error => this.dispatch({ source: 'page', message: String(error) }));

    this.logger.info('Browser setup complete', { headless: this.config.headless });
  }

  /**
   * Closes the browser. Closing the browser also closes its context and page.
   */
  async close(): Promise<void> {
    const browser = this.browser;
    const context = this.context;
    this.page = null;
    this.context = null;
    this.browser = null;

    if (context) {
      await context.close().catch(error => {
        this.logger.debug('Context close failed', { error: describeError(error) });
      });
    }
    if (browser) {
      await browser.close();
      this.logger.info('Browser cleanup complete');
    }
  }

  isReady(): boolean {
    return this.browser !== null && this.page !== null;
  }

  onConsoleEvent(listener: PageConsoleListener): void {
    this.listeners.push(listener);
  }

  private toConsoleEvent(msg: ConsoleMessage): PageConsoleEvent {
    return {
      source: 'console',
      level: msg.type(),
      text: msg.text(),
      location: msg.location(),
    };
  }

  private dispatch(event: PageConsoleEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error('Console listener failed', { error: describeError(error) });
      }
    }
  }

  /**
   * Ensures the page is initialized.
   */
  private ensurePage(): Page {
    if (!this.page) {
      throw new Error('Browser not initialized. Call initialize() first.');
    }
    return this.page;
  }

  async navigate(url: string, options: NavigateOptions = {}): Promise<void> {
    const page = this.ensurePage();

    this.logger.info(`Navigating to: ${url}`);
    try {
      await page.goto(url, {
        waitUntil: options.waitUntil ?? 'domcontentloaded',
        timeout: options.timeout ?? this.config.timeout,
      });
    } catch (error) {
      throw new NavigationError(url, describeError(error), error);
    }
  }

  async waitForNetworkIdle(timeout?: number): Promise<boolean> {
    const page = this.ensurePage();
    try {
      await page.waitForLoadState('networkidle', { timeout: timeout ?? this.config.timeout });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Each element is bound to its own handle, so a later click reaches the node
   * that was enumerated even if the DOM has changed since. A removed node fails
   * the click instead of hitting a neighbour.
   */
  async getClickableElements(): Promise<ClickableElement[]> {
    const page = this.ensurePage();
    const handles = await page.locator(CLICKABLE_SELECTOR).elementHandles();

    const snapshots: ClickableElementSnapshot[] = await page.evaluate(
      nodes =>
        nodes.map(node => {
          if (!(node instanceof Element)) {
            return { tagName: '', text: '', attributes: {} };
          }
          let text = node instanceof HTMLElement ? node.innerText : (node.textContent ?? '');
          if (!text.trim() && node instanceof HTMLInputElement) {
            text = node.value;
          }
          if (!text.trim()) {
            text = node.getAttribute('aria-label') ?? '';
          }
          return {
            tagName: node.tagName.toLowerCase(),
            text: text.trim(),
            attributes: {
              id: node.id || undefined,
              className: node.getAttribute('class') || undefined,
              testId: node.getAttribute('data-testid') || undefined,
            },
          };
        }),
      handles
    );

    return snapshots.map(
      (snapshot, index) => new PlaywrightClickableElement(index, snapshot, handles[index])
    );
  }

  async findConsentMarkers(markers: string[]): Promise<string[]> {
    const page = this.ensurePage();
    return page.evaluate(candidates => {
      const bodyText = (document.body?.innerText ?? '').toLowerCase();
      const attributeText = Array.from(
        document.querySelectorAll('[id], [class], [aria-label]')
      )
        .map(el =>
          [el.id, el.getAttribute('class') ?? '', el.getAttribute('aria-label') ?? ''].join(' ')
        )
        .join(' ')
        .toLowerCase();

      return candidates.filter(marker => {
        const needle = marker.toLowerCase();
        return bodyText.includes(needle) || attributeText.includes(needle);
      });
    }, markers);
  }

  async scrollToBottom(): Promise<void> {
    const page = this.ensurePage();
    await page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }

  async scrollToTop(): Promise<void> {
    const page = this.ensurePage();
    await page.evaluate(() => window.scrollTo(0, 0));
  }

  async getCurrentUrl(): Promise<string> {
    const page = this.ensurePage();
    return page.url();
  }
}
