import {
  ConsentMatcherOptions,
  containsPhrase,
  findAcceptCandidates,
  normalizeText,
} from '../../../src/domain/consent/ConsentMatcher';
import { CONSENT } from '../../../src/application/config/ScraperDefaults';
import { FakeElement } from '../../helpers/FakeBrowser';

describe('ConsentMatcher', () => {
  const options: ConsentMatcherOptions = {
    acceptPhrases: [...CONSENT.DEFAULT_ACCEPT_PHRASES],
    attributeMarkers: [...CONSENT.DEFAULT_ATTRIBUTE_MARKERS],
    maxTextLength: CONSENT.DEFAULT_MAX_TEXT_LENGTH,
  };

  describe('normalizeText', () => {
    it('should lower-case and collapse whitespace', () => {
      expect(normalizeText('  Accept\n   ALL\tCookies ')).toBe('accept all cookies');
    });
  });

  describe('containsPhrase', () => {
    it('should match case-insensitively', () => {
      expect(containsPhrase('ACCEPT ALL COOKIES', 'accept all')).toBe(true);
    });

    it('should match phrases surrounded by punctuation', () => {
      expect(containsPhrase('I agree!', 'agree')).toBe(true);
      expect(containsPhrase('Okay, accept', 'accept')).toBe(true);
    });

    it('should not match inside a longer word', () => {
      expect(containsPhrase('Disagree', 'agree')).toBe(false);
      expect(containsPhrase('Unacceptable terms', 'accept')).toBe(false);
    });

    it('should not match non-latin letters as boundaries', () => {
      expect(containsPhrase('agreé', 'agree')).toBe(false);
    });

    it('should never match an empty phrase', () => {
      expect(containsPhrase('anything', '   ')).toBe(false);
    });
  });

  describe('findAcceptCandidates', () => {
    it('should return text matches in document order with the first matching phrase', () => {
      const elements = [
        new FakeElement(0, 'Home', { tagName: 'a' }),
        new FakeElement(1, 'Accept All'),
        new FakeElement(2, 'Accept'),
      ];

      const candidates = findAcceptCandidates(elements, options);

      expect(candidates.map(c => [c.element.index, c.reason, c.matched])).toEqual([
        [1, 'text', 'accept all'],
        [2, 'text', 'accept'],
      ]);
    });

    it('should prefer the most specific phrase for an element', () => {
      const candidates = findAcceptCandidates([new FakeElement(0, 'Accept all cookies')], options);

      expect(candidates[0].matched).toBe('accept all cookies');
    });

    it('should ignore texts longer than the limit', () => {
      const paragraph = new FakeElement(
        0,
        'By clicking accept you agree to our use of cookies and similar technologies',
        { tagName: 'a' }
      );

      expect(findAcceptCandidates([paragraph], options)).toEqual([]);
    });

    it('should fall back to attribute markers', () => {
      const button = new FakeElement(0, 'OK', { attributes: { id: 'onetrust-accept-btn-handler' } });

      const candidates = findAcceptCandidates([button], options);

      expect(candidates).toHaveLength(1);
      expect(candidates[0].reason).toBe('attribute');
      expect(candidates[0].matched).toBe('onetrust-accept');
    });

    it('should match attribute markers case-insensitively across id, class and test id', () => {
      const byClass = new FakeElement(0, '', { attributes: { className: 'btn CC-ALLOW' } });
      const byTestId = new FakeElement(1, '', { attributes: { testId: 'uc-accept-all-button' } });

      const candidates = findAcceptCandidates([byClass, byTestId], options);

      expect(candidates.map(c => c.matched)).toEqual(['cc-allow', 'accept-all']);
    });

    it('should put text matches before attribute matches', () => {
      const byAttribute = new FakeElement(0, 'OK', { attributes: { className: 'accept-all' } });
      const byText = new FakeElement(1, 'Got it');

      const candidates = findAcceptCandidates([byAttribute, byText], options);

      expect(candidates.map(c => c.element.index)).toEqual([1, 0]);
    });

    it('should list an element only once', () => {
      const both = new FakeElement(0, 'Accept all', { attributes: { id: 'accept-all' } });

      const candidates = findAcceptCandidates([both], options);

      expect(candidates).toHaveLength(1);
      expect(candidates[0].reason).toBe('text');
    });

    it('should use the configured phrases', () => {
      const german = new FakeElement(0, 'Alle akzeptieren');

      expect(findAcceptCandidates([german], options)).toEqual([]);
      expect(
        findAcceptCandidates([german], { ...options, acceptPhrases: ['alle akzeptieren'] })
      ).toHaveLength(1);
    });
  });
});
