/**
 * Scraper Constants and Configuration Defaults
 *
 * Centralizes timing values, heuristics vocabulary and output locations.
 * Every value here can be overridden through the environment (see ConfigFactory).
 */

/**
 * Browser launch defaults.
 */
export const BROWSER = {
  DEFAULT_VIEWPORT_WIDTH: 1280,
  DEFAULT_VIEWPORT_HEIGHT: 720,
  DEFAULT_USER_AGENT:
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  /** Chromium flags applied at launch */
  LAUNCH_ARGS: [
    '--no-first-run',
    '--disable-default-apps',
    '--disable-extensions',
    '--disable-blink-features=AutomationControlled',
  ],
} as const;

/**
 * Navigation and timing defaults, in milliseconds.
 */
export const NAVIGATION = {
  /** Timeout for the initial page load */
  DEFAULT_TIMEOUT: 30000,
  /** Upper bound when waiting for network activity to settle */
  DEFAULT_NETWORK_IDLE_TIMEOUT: 30000,
  /** Pause after DOM load before looking for a consent banner */
  DEFAULT_INITIAL_WAIT: 3000,
  /** Pause after load so late console activity is captured */
  DEFAULT_SETTLE_DELAY: 5000,
  /** Pause after each scroll step */
  SCROLL_PAUSE: 2000,
} as const;

/**
 * Consent banner heuristics.
 */
export const CONSENT = {
  /** Accept-control phrases, most specific first */
  DEFAULT_ACCEPT_PHRASES: [
    'accept all cookies',
    'accept all',
    'allow all cookies',
    'allow all',
    'accept cookies',
    'i accept',
    'i agree',
    'agree',
    'accept',
    'got it',
  ],
  /** Substrings of id / class / data-testid used by common consent platforms */
  DEFAULT_ATTRIBUTE_MARKERS: [
    'accept-all',
    'acceptall',
    'accept_all',
    'allow-all',
    'allowall',
    'cc-allow',
    'onetrust-accept',
    'optinallowall',
  ],
  /** Text or attribute markers that reveal a consent banner */
  DEFAULT_BANNER_MARKERS: ['cookie', 'consent', 'gdpr'],
  /** Longer texts are paragraphs, not buttons */
  DEFAULT_MAX_TEXT_LENGTH: 60,
  DEFAULT_CLICK_TIMEOUT: 5000,
  /** Pause after a successful click for the banner to animate away */
  DEFAULT_POST_CLICK_WAIT: 2000,
} as const;

/**
 * Report output.
 */
export const OUTPUT = {
  DEFAULT_DIRECTORY: 'console_error/site_url',
} as const;
