// Text Truncation
// Cuts chapter text to a character limit at paragraph or sentence boundaries

const PARAGRAPH_BREAK = /\n\s*\n/;
const SENTENCE_END = /[.!?]["'”’]?\s*/g;

/** Paragraph truncation is good enough once it fills this share of the limit */
const TARGET_FILL = 0.9;
/** A partial paragraph is only worth adding with more room than this */
const MIN_PARTIAL_CHARS = 50;

/**
 * Split text into non-empty, trimmed paragraphs
 */
export function splitParagraphs(text: string): string[] {
  return text
    .split(PARAGRAPH_BREAK)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Cut after the last sentence end in the second half of the limit,
 * else at the last space there, else hard.
 */
export function truncateAtSentenceBoundary(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;

  const window = text.slice(0, maxChars);
  const minCut = Math.floor(maxChars * 0.5);

  let cut = -1;
  const pattern = new RegExp(SENTENCE_END);
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(window)) !== null) {
    const end = match.index + match[0].length;
    if (end >= minCut) cut = end;
  }
  if (cut > 0) return window.slice(0, cut).trimEnd();

  const space = window.lastIndexOf(' ');
  if (space >= minCut) return window.slice(0, space);

  return window;
}

/**
 * Keep whole paragraphs; top up with part of the next one when the result
 * falls short of 90% of the limit.
 */
export function truncateAtParagraphBoundary(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;

  let result = '';
  for (const paragraph of text.split(PARAGRAPH_BREAK)) {
    const candidate = result ? `${result}\n\n${paragraph}` : paragraph;
    if (candidate.length <= maxChars) {
      result = candidate;
      continue;
    }

    if (result.length < maxChars * TARGET_FILL) {
      const separator = result ? 2 : 0;
      const remaining = maxChars - result.length - separator;
      if (remaining > MIN_PARTIAL_CHARS) {
        const partial = truncateAtSentenceBoundary(paragraph, remaining);
        result = result ? `${result}\n\n${partial}` : partial;
      }
    }
    break;
  }

  return result;
}

/**
 * Fit text into maxChars, preferring a paragraph cut and falling back
 * to a sentence cut when that keeps more text.
 */
export function prepareInputText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;

  const byParagraph = truncateAtParagraphBoundary(text, maxChars);
  if (byParagraph.length >= maxChars * TARGET_FILL) return byParagraph;

  const bySentence = truncateAtSentenceBoundary(text, maxChars);
  return bySentence.length > byParagraph.length ? bySentence : byParagraph;
}
