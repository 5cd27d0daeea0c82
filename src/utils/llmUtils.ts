// LLM Response Utilities
// Low-level cleanup shared by the recovery parser and the model client

import { jsonrepair } from 'jsonrepair';

/**
 * Strip thinking tags from LLM response
 * Used by reasoning models like DeepSeek, Qwen, etc.
 */
export function stripThinkingTags(content: string): string {
  return content
    .replace(/<think>[\s\S]*?<\/think>/gi, '')
    .replace(/<thinking>[\s\S]*?<\/thinking>/gi, '')
    // An unclosed block means generation stopped mid-thought
    .replace(/<think(?:ing)?>[\s\S]*$/i, '');
}

/**
 * Remove a leading opening fence (with or without language tag) and a
 * trailing closing fence. Fences inside the text are left alone.
 */
export function stripCodeFences(content: string): string {
  return content
    .trim()
    .replace(/^```[\w-]*[^\S\n]*\n?/, '')
    .replace(/\n?[^\S\n]*```$/, '')
    .trim();
}

/**
 * JSON.parse, then jsonrepair for trailing commas, missing quotes
 * and unclosed brackets. Undefined when neither works.
 */
export function parseJsonLenient(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    try {
      return JSON.parse(jsonrepair(text));
    } catch {
      return undefined;
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
