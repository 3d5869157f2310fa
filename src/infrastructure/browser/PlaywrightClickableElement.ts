import type { ElementHandle } from 'playwright';
import { ClickableElement, ElementAttributes } from '../../domain/browser/ClickableElement';

/**
 * Snapshot of a clickable element, taken inside the page during enumeration.
 */
export interface ClickableElementSnapshot {
  tagName: string;
  text: string;
  attributes: ElementAttributes;
}

/**
 * ClickableElement backed by a Playwright element handle.
 */
export class PlaywrightClickableElement implements ClickableElement {
  readonly tagName: string;
  readonly text: string;
  readonly attributes: ElementAttributes;

  constructor(
    readonly index: number,
    snapshot: ClickableElementSnapshot,
    private readonly handle: ElementHandle
  ) {
    this.tagName = snapshot.tagName;
    this.text = snapshot.text;
    this.attributes = { ...snapshot.attributes };
  }

  isVisible(): Promise<boolean> {
    return this.handle.isVisible();
  }

  isEnabled(): Promise<boolean> {
    return this.handle.isEnabled();
  }

  async click(options: { timeout?: number } = {}): Promise<void> {
    await this.handle.click({ timeout: options.timeout });
  }
}
