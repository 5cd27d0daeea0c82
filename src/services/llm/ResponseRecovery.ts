// Response Recovery Parser
// Turns unreliable model output (markdown, chatty prefixes, JSONL-style
// sibling objects, repetition loops, truncation) into a single JSON document.
// Nothing here throws: the worst case is an empty object.

import { isRecord, parseJsonLenient, stripCodeFences, stripThinkingTags } from '@/utils/llmUtils';
import { findTopLevelObjects, truncateAtDuplicateKey } from './JsonScanner';

const BOILERPLATE_PREFIXES = ['here is the json', "here's the json", 'output:', 'result:', 'json:'];
const PREFIX_WINDOW = 50;

export const EMPTY_JSON_OBJECT = '{}';

/**
 * Remove a known chatty prefix found in the first 50 characters,
 * as long as it comes before any JSON bracket.
 */
export function stripBoilerplatePrefix(text: string): string {
  const lower = text.toLowerCase();
  const firstBracket = text.search(/[{[]/);
  for (const prefix of BOILERPLATE_PREFIXES) {
    const index = lower.indexOf(prefix);
    if (index < 0 || index >= PREFIX_WINDOW) continue;
    if (firstBracket >= 0 && index > firstBracket) continue;
    return text.slice(index + prefix.length).replace(/^[\s:]+/, '');
  }
  return text;
}

/**
 * Thinking tags, boilerplate prefix and outer code fences removed
 */
export function cleanResponse(raw: string): string {
  return stripCodeFences(stripBoilerplatePrefix(stripThinkingTags(raw.trim())));
}

/**
 * Union of keys across objects; the first occurrence of a key wins
 */
export function mergeJsonObjects(objects: Record<string, unknown>[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const object of objects) {
    for (const [key, value] of Object.entries(object)) {
      if (!Object.hasOwn(merged, key)) merged[key] = value;
    }
  }
  return merged;
}

function parseObject(json: string): Record<string, unknown> | undefined {
  const value = parseJsonLenient(json);
  return isRecord(value) ? value : undefined;
}

/**
 * Extract one JSON object text from raw model output.
 *
 * Several complete sibling objects are parsed separately and merged by key.
 * Otherwise the first `{` .. last `}` slice is taken, cut at the first
 * repeated top-level key and closed after its last complete value.
 * Returns "{}" when no object can be located.
 */
export function extractJsonObject(raw: string): string {
  const cleaned = cleanResponse(raw);

  const siblings = findTopLevelObjects(cleaned);
  if (siblings.length > 1) {
    const parsed = siblings
      .map((object) => parseObject(truncateAtDuplicateKey(object)))
      .filter((object): object is Record<string, unknown> => object !== undefined);
    if (parsed.length > 0) {
      return JSON.stringify(mergeJsonObjects(parsed));
    }
  }

  const start = cleaned.indexOf('{');
  if (start < 0) return EMPTY_JSON_OBJECT;
  const end = cleaned.lastIndexOf('}');
  const candidate = end > start ? cleaned.slice(start, end + 1) : cleaned.slice(start);

  return truncateAtDuplicateKey(candidate);
}

/**
 * Parsed object from raw model output, or undefined when nothing usable is there
 */
export function recoverJson(raw: string): Record<string, unknown> | undefined {
  return parseObject(extractJsonObject(raw));
}

/**
 * Parsed array from raw model output (first `[` .. last `]`),
 * repaired when truncated. Undefined when no array is there.
 */
export function recoverJsonArray(raw: string): unknown[] | undefined {
  const cleaned = cleanResponse(raw);
  const start = cleaned.indexOf('[');
  if (start < 0) return undefined;
  const end = cleaned.lastIndexOf(']');
  const candidate = end > start ? cleaned.slice(start, end + 1) : cleaned.slice(start);

  const value = parseJsonLenient(candidate);
  return Array.isArray(value) ? value : undefined;
}

/**
 * Which JSON shape the response opens with, ignoring prose around it
 */
export function detectJsonShape(raw: string): 'object' | 'array' | 'none' {
  const cleaned = cleanResponse(raw);
  const index = cleaned.search(/[{[]/);
  if (index < 0) return 'none';
  return cleaned[index] === '[' ? 'array' : 'object';
}
