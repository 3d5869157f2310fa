import { BrowserPort } from '../ports/BrowserPort';
import { ClickableElement, describeElement } from '../../domain/browser/ClickableElement';
import {
  AcceptCandidate,
  ConsentMatcherOptions,
  findAcceptCandidates,
} from '../../domain/consent/ConsentMatcher';
import { describeError } from '../../domain/errors/AppErrors';
import { Logger, getLogger } from '../../infrastructure/logging';
import { Delay, sleep } from './delay';

export interface ConsentBannerOptions extends ConsentMatcherOptions {
  /** Markers whose presence on the page means a consent banner is shown */
  bannerMarkers: string[];
  clickTimeout: number;
  /** Pause after a successful click */
  postClickWait: number;
}

/**
 * Result of one consent pass.
 */
export interface ConsentOutcome {
  /** A consent banner or accept control was found on the page */
  bannerDetected: boolean;
  /** The accept control was clicked without error */
  accepted: boolean;
  /** Text (or attribute marker) of the control that was picked */
  matchedText?: string;
  /** Banner markers found on the page */
  markers: string[];
}

/**
 * Finds and clicks a cookie-consent "accept all" control, and reports
 * whether a consent banner is present at all. Runs once per page load.
 *
 * Nothing here fails the run: enumeration and click errors are logged and
 * reflected in the outcome.
 */
export class ConsentBannerHandler {
  private logger: Logger;

  constructor(
    private readonly browser: BrowserPort,
    private readonly options: ConsentBannerOptions,
    private readonly delay: Delay = sleep
  ) {
    this.logger = getLogger('Consent');
  }

  async handle(): Promise<ConsentOutcome> {
    this.logger.info("Looking for 'Accept All' cookie button...");

    const candidate = await this.findClickableCandidate();
    const accepted = candidate ? await this.tryClick(candidate) : false;

    if (!candidate) {
      this.logger.info("No 'Accept All' button found");
    }

    const markers = await this.findMarkers();
    const bannerDetected = markers.length > 0 || candidate !== null;

    this.logger.info(`GDPR/Cookie consent detected: ${bannerDetected ? 'YES' : 'NO'}`, {
      accepted,
      markers: markers.join(',') || 'none',
    });

    return {
      bannerDetected,
      accepted,
      matchedText: candidate ? candidate.element.text || candidate.matched : undefined,
      markers,
    };
  }

  /**
   * First candidate, in match order, that is visible and enabled right now.
   */
  private async findClickableCandidate(): Promise<AcceptCandidate | null> {
    let elements: ClickableElement[];
    try {
      elements = await this.browser.getClickableElements();
    } catch (error) {
      this.logger.warn('Could not enumerate clickable elements', { error: describeError(error) });
      return null;
    }

    const candidates = findAcceptCandidates(elements, this.options);
    this.logger.debug(`${candidates.length} accept candidate(s) among ${elements.length} element(s)`);

    for (const candidate of candidates) {
      if (await this.isClickable(candidate.element)) {
        this.logger.info(`Found accept button: ${describeElement(candidate.element)}`, {
          matchedBy: candidate.reason,
          matched: candidate.matched,
        });
        return candidate;
      }
    }
    return null;
  }

  private async isClickable(element: ClickableElement): Promise<boolean> {
    try {
      return (await element.isVisible()) && (await element.isEnabled());
    } catch (error) {
      this.logger.debug(`Skipping ${describeElement(element)}`, { error: describeError(error) });
      return false;
    }
  }

  private async tryClick(candidate: AcceptCandidate): Promise<boolean> {
    try {
      await candidate.element.click({ timeout: this.options.clickTimeout });
    } catch (error) {
      this.logger.warn('Unable to click accept button', { error: describeError(error) });
      return false;
    }

    this.logger.info("Successfully clicked 'Accept All' button");
    await this.delay(this.options.postClickWait);
    return true;
  }

  private async findMarkers(): Promise<string[]> {
    try {
      return await this.browser.findConsentMarkers(this.options.bannerMarkers);
    } catch (error) {
      this.logger.warn('Could not scan page for consent markers', { error: describeError(error) });
      return [];
    }
  }
}
