import { describe, it, expect } from 'vitest';
import { FuzzyNameMatcher, StrictNameMatcher, levenshtein } from './NameMatcher';

describe('levenshtein', () => {
  it('returns 0 for identical strings', () => {
    expect(levenshtein('hello', 'hello')).toBe(0);
  });

  it('returns length for empty string comparison', () => {
    expect(levenshtein('', 'hello')).toBe(5);
    expect(levenshtein('hello', '')).toBe(5);
  });

  it('counts single edits', () => {
    expect(levenshtein('cat', 'bat')).toBe(1);
    expect(levenshtein('cat', 'cats')).toBe(1);
    expect(levenshtein('cats', 'cat')).toBe(1);
  });

  it('handles multiple edits', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
  });
});

describe('FuzzyNameMatcher', () => {
  const matcher = new FuzzyNameMatcher();

  describe('canonicalize', () => {
    it('strips honorifics and punctuation', () => {
      expect(matcher.canonicalize('Mr. Harry Potter')).toBe('harry potter');
      expect(matcher.canonicalize('  Dr.  WATSON ')).toBe('watson');
      expect(matcher.canonicalize("O'Brien")).toBe('obrien');
    });

    it('splits hyphenated names into words', () => {
      expect(matcher.canonicalize('Jean-Luc')).toBe('jean luc');
    });

    it('keeps a name that is only an honorific', () => {
      expect(matcher.canonicalize('Captain')).toBe('captain');
      expect(matcher.canonicalize('Lady Lord')).toBe('lord');
    });

    it('keeps non-Latin letters', () => {
      expect(matcher.canonicalize('Zoë')).toBe('zoë');
      expect(matcher.canonicalize('Наташа!')).toBe('наташа');
    });

    it('is idempotent', () => {
      const names = [
        'Mr. Harry Potter',
        'Professor  Minerva McGonagall',
        'Mrs Mr Dr',
        '__Jean--Luc__',
        'Captain',
        '!!!',
        '',
        'Zoë   Saldaña',
        'İstanbul Kid',
        'R2-D2',
      ];
      for (const name of names) {
        const once = matcher.canonicalize(name);
        expect(matcher.canonicalize(once)).toBe(once);
      }
    });
  });

  describe('matches', () => {
    it('matches a partial name contained in a fuller one', () => {
      expect(matcher.matches('Harry', 'Harry Potter')).toBe(true);
      expect(matcher.matches('Mr. Potter', 'Harry Potter')).toBe(true);
    });

    it('does not match different people sharing a surname', () => {
      expect(matcher.matches('Harry Potter', 'Lily Potter')).toBe(false);
    });

    it('tolerates small typos in longer names', () => {
      expect(matcher.matches('Hermione', 'Hermoine')).toBe(true);
      expect(matcher.matches('Snape', 'Snapes')).toBe(true);
    });

    it('never uses edit distance on short names', () => {
      expect(matcher.matches('Ron', 'Rob')).toBe(false);
    });

    it('never matches blank names', () => {
      expect(matcher.matches('', 'Ann')).toBe(false);
      expect(matcher.matches('...', '!!!')).toBe(false);
    });
  });

  describe('isVariant', () => {
    it('hits a recorded variant case-insensitively', () => {
      expect(matcher.isVariant('HARRY', 'Harry Potter', new Set(['Harry']))).toBe(true);
    });

    it('falls back to matching against multi-word variants', () => {
      expect(matcher.isVariant('Potter', 'Harry', new Set(['Harry Potter']))).toBe(true);
    });

    it('does not chain through a single-word variant', () => {
      expect(matcher.isVariant('Lily Potter', 'Harry Potter', new Set(['Harry Potter', 'Mr. Potter']))).toBe(false);
    });

    it('still takes an exact hit on a single-word variant', () => {
      expect(matcher.isVariant('mr. potter', 'Harry Potter', new Set(['Mr. Potter']))).toBe(true);
    });

    it('rejects unrelated names', () => {
      expect(matcher.isVariant('Ron', 'Harry', new Set(['Harry', 'Harry Potter']))).toBe(false);
    });
  });
});

describe('StrictNameMatcher', () => {
  const matcher = new StrictNameMatcher();

  it('ignores case and whitespace only', () => {
    expect(matcher.canonicalize('  Harry   Potter ')).toBe('harry potter');
    expect(matcher.matches(' Harry ', 'harry')).toBe(true);
    expect(matcher.matches('Harry', 'Harry Potter')).toBe(false);
  });

  it('checks recorded variants exactly', () => {
    expect(matcher.isVariant('the boy', 'Harry', new Set(['The Boy']))).toBe(true);
    expect(matcher.isVariant('Potter', 'Harry', new Set(['Harry Potter']))).toBe(false);
  });
});
