/**
 * Attributes captured for a clickable element when the page was enumerated.
 */
export interface ElementAttributes {
  id?: string;
  className?: string;
  testId?: string;
}

/**
 * A button or link rendered on the page.
 *
 * `text` and `attributes` are a snapshot taken during enumeration;
 * visibility, enablement and the click itself are live queries against the
 * same DOM node.
 */
export interface ClickableElement {
  /** Position in document order among all enumerated elements */
  readonly index: number;
  readonly tagName: string;
  /** Visible text, or the aria-label / value when the element renders no text */
  readonly text: string;
  readonly attributes: ElementAttributes;

  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  click(options?: { timeout?: number }): Promise<void>;
}

/**
 * Short description of an element for log output.
 */
export function describeElement(element: ClickableElement): string {
  const label = element.text ? `"${element.text.substring(0, 50)}"` : '';
  const id = element.attributes.id ? `#${element.attributes.id}` : '';
  return [`<${element.tagName}${id}>`, label].filter(Boolean).join(' ');
}
