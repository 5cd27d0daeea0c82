/**
 * Decides whether two raw character names refer to the same character.
 * Injected into IncrementalMerger; swap in a stricter or looser policy as needed.
 */
export interface NameMatcher {
  /** Stable identity key for a raw name. Must be idempotent. */
  canonicalize(name: string): string;
  matches(a: string, b: string): boolean;
  /** Does `name` belong to the character shown as `displayName` with these recorded variants? */
  isVariant(name: string, displayName: string, variants: ReadonlySet<string>): boolean;
}

/**
 * Calculate Levenshtein distance between two strings
 * @returns Number of edits (insertions, deletions, substitutions) needed
 */
export function levenshtein(a: string, b: string): number {
  const an = a.length;
  const bn = b.length;
  if (an === 0) return bn;
  if (bn === 0) return an;

  const matrix: number[][] = Array.from({ length: an + 1 }, (_, i) =>
    Array.from({ length: bn + 1 }, (_, j) => (i === 0 ? j : j === 0 ? i : 0)),
  );

  for (let i = 1; i <= an; i++) {
    for (let j = 1; j <= bn; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      matrix[i][j] = Math.min(
        matrix[i - 1][j] + 1, // deletion
        matrix[i][j - 1] + 1, // insertion
        matrix[i - 1][j - 1] + cost, // substitution
      );
    }
  }
  return matrix[an][bn];
}

// ========== Fuzzy matcher ==========

const HONORIFICS = new Set([
  'mr', 'mrs', 'ms', 'miss', 'dr', 'sir', 'lady', 'lord', 'madam', 'prof', 'professor', 'captain', 'capt',
]);

function words(canonical: string): string[] {
  return canonical === '' ? [] : canonical.split(' ');
}

/**
 * Default matcher: honorific- and punctuation-insensitive, tolerant of
 * partial names ("Harry" / "Harry Potter") and small typos ("Hermoine").
 *
 * Two names match when their canonical forms are equal, when every word of the
 * shorter one appears in the longer one, or when they are within one edit
 * (two edits once the shorter form has 8+ characters). Forms under 5
 * characters never match by edit distance.
 */
export class FuzzyNameMatcher implements NameMatcher {
  canonicalize(name: string): string {
    const tokens = name
      .toLowerCase()
      .replace(/[-_]/g, ' ')
      .replace(/[^\p{L}\p{N}\s]/gu, '')
      .split(/\s+/)
      .filter((token) => token.length > 0);

    // Always keep the last word: "Captain" alone is a name
    let start = 0;
    while (start < tokens.length - 1 && HONORIFICS.has(tokens[start])) start++;

    return tokens.slice(start).join(' ');
  }

  matches(a: string, b: string): boolean {
    const ca = this.canonicalize(a);
    const cb = this.canonicalize(b);
    if (ca === '' || cb === '') return false;
    if (ca === cb) return true;

    const [shorter, longer] = ca.length <= cb.length ? [ca, cb] : [cb, ca];

    const longerWords = new Set(words(longer));
    if (words(shorter).every((word) => longerWords.has(word))) return true;

    if (shorter.length < 5) return false;
    const maxEdits = shorter.length >= 8 ? 2 : 1;
    return levenshtein(shorter, longer) <= maxEdits;
  }

  /**
   * Any recorded variant counts on an exact hit, but only multi-word variants
   * are fuzzy anchors: a bare surname like "Mr. Potter" would otherwise pull
   * in every other Potter.
   */
  isVariant(name: string, displayName: string, variants: ReadonlySet<string>): boolean {
    const lower = name.trim().toLowerCase();
    for (const variant of variants) {
      if (variant.trim().toLowerCase() === lower) return true;
    }
    if (this.matches(name, displayName)) return true;
    for (const variant of variants) {
      if (words(this.canonicalize(variant)).length < 2) continue;
      if (this.matches(name, variant)) return true;
    }
    return false;
  }
}

// ========== Strict matcher ==========

/**
 * Exact matching only: case and surrounding whitespace are ignored
 */
export class StrictNameMatcher implements NameMatcher {
  canonicalize(name: string): string {
    return name.trim().toLowerCase().replace(/\s+/g, ' ');
  }

  matches(a: string, b: string): boolean {
    const ca = this.canonicalize(a);
    return ca !== '' && ca === this.canonicalize(b);
  }

  isVariant(name: string, displayName: string, variants: ReadonlySet<string>): boolean {
    if (this.matches(name, displayName)) return true;
    for (const variant of variants) {
      if (this.matches(name, variant)) return true;
    }
    return false;
  }
}
