import { ClickableElement } from '../browser/ClickableElement';

/**
 * Why an element was picked as an accept control.
 */
export type AcceptMatchReason = 'text' | 'attribute';

export interface AcceptCandidate {
  element: ClickableElement;
  reason: AcceptMatchReason;
  /** Phrase or attribute marker that matched */
  matched: string;
}

export interface ConsentMatcherOptions {
  acceptPhrases: string[];
  attributeMarkers: string[];
  maxTextLength: number;
}

/**
 * Lower-cases and collapses whitespace.
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `phrase` occurs in `text` delimited by non-alphanumeric characters
 * (or the string edges). Both sides are normalized first, so "agree" does not
 * match "disagree" and "accept all" matches "Accept  All Cookies".
 */
export function containsPhrase(text: string, phrase: string): boolean {
  const needle = normalizeText(phrase);
  if (!needle) {
    return false;
  }
  const pattern = new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegExp(needle)}($|[^\\p{L}\\p{N}])`, 'u');
  return pattern.test(normalizeText(text));
}

/**
 * Finds accept-control candidates among enumerated elements.
 *
 * Text matches come first, in document order; for each element the first
 * configured phrase that matches is reported. Elements whose id, class or
 * data-testid carries a known accept marker follow, also in document order.
 * An element appears at most once.
 */
export function findAcceptCandidates(
  elements: ReadonlyArray<ClickableElement>,
  options: ConsentMatcherOptions
): AcceptCandidate[] {
  const textMatches: AcceptCandidate[] = [];
  const attributeMatches: AcceptCandidate[] = [];

  for (const element of elements) {
    const text = normalizeText(element.text);
    if (text && text.length <= options.maxTextLength) {
      const phrase = options.acceptPhrases.find(p => containsPhrase(text, p));
      if (phrase !== undefined) {
        textMatches.push({ element, reason: 'text', matched: phrase });
        continue;
      }
    }

    const attributeText = [
      element.attributes.id,
      element.attributes.className,
      element.attributes.testId,
    ]
      .filter((value): value is string => Boolean(value))
      .join(' ')
      .toLowerCase();

    const marker = options.attributeMarkers.find(m => attributeText.includes(m.toLowerCase()));
    if (marker !== undefined) {
      attributeMatches.push({ element, reason: 'attribute', matched: marker });
    }
  }

  return [...textMatches, ...attributeMatches];
}
