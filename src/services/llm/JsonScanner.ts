// JSON Scanner
// Small brace/string-aware lexer over raw model output. Tracks nesting depth,
// string literals and escapes without parsing values, so it works on broken JSON.

export type JsonTokenKind = 'open' | 'close' | 'string' | 'colon' | 'comma';

export interface JsonToken {
  kind: JsonTokenKind;
  /** Index of the token's first character */
  start: number;
  /** Index just past the token (text.length for an unterminated string) */
  end: number;
  /**
   * Depth the token sits at: for 'open' the depth outside the bracket,
   * for 'close' the depth after closing
   */
  depth: number;
  /** Bracket character for open/close tokens */
  char: string;
  /** False only for a string literal cut off by the end of the text */
  terminated: boolean;
}

/**
 * Tokenize structural characters and string literals.
 * Stray closing brackets never take the depth below zero.
 */
export function scanJson(text: string): JsonToken[] {
  const tokens: JsonToken[] = [];
  let depth = 0;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    switch (c) {
      case '"': {
        const start = i;
        let escape = false;
        i++;
        while (i < text.length) {
          const s = text[i];
          if (escape) {
            escape = false;
          } else if (s === '\\') {
            escape = true;
          } else if (s === '"') {
            break;
          }
          i++;
        }
        tokens.push({ kind: 'string', start, end: Math.min(i + 1, text.length), depth, char: c, terminated: i < text.length });
        break;
      }
      case '{':
      case '[':
        tokens.push({ kind: 'open', start: i, end: i + 1, depth, char: c, terminated: true });
        depth++;
        break;
      case '}':
      case ']':
        depth = Math.max(0, depth - 1);
        tokens.push({ kind: 'close', start: i, end: i + 1, depth, char: c, terminated: true });
        break;
      case ':':
        tokens.push({ kind: 'colon', start: i, end: i + 1, depth, char: c, terminated: true });
        break;
      case ',':
        tokens.push({ kind: 'comma', start: i, end: i + 1, depth, char: c, terminated: true });
        break;
    }
  }

  return tokens;
}

/**
 * Complete `{...}` objects sitting side by side at depth 0 (JSONL-style output)
 */
export function findTopLevelObjects(text: string): string[] {
  const objects: string[] = [];
  let start = -1;

  for (const token of scanJson(text)) {
    if (token.depth !== 0) continue;
    if (token.kind === 'open') {
      start = token.char === '{' ? token.start : -1;
    } else if (token.kind === 'close' && token.char === '}' && start >= 0) {
      objects.push(text.slice(start, token.end));
      start = -1;
    }
  }

  return objects;
}

/**
 * Decode a key token's raw text; keys with broken escapes compare by raw text
 */
function keyText(text: string, token: JsonToken): string {
  const raw = text.slice(token.start, token.end);
  try {
    const decoded: unknown = JSON.parse(raw);
    return typeof decoded === 'string' ? decoded : raw;
  } catch {
    return raw;
  }
}

/**
 * Repair an object-shaped JSON text (starting at its `{`):
 * - cut before the first repeated top-level key (and its comma, if any) and close the object
 * - drop anything after the object's closing brace
 * - if the object never closes, cut after the last complete top-level value
 */
export function truncateAtDuplicateKey(json: string): string {
  const tokens = scanJson(json);
  const seen = new Set<string>();
  let lastValidEnd = -1;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (token.depth === 0 && token.kind === 'close') {
      return json.slice(0, token.end);
    }
    if (token.depth !== 1) continue;

    switch (token.kind) {
      case 'close':
        lastValidEnd = token.end;
        break;
      case 'string': {
        if (tokens[i + 1]?.kind !== 'colon') {
          if (token.terminated) lastValidEnd = token.end;
          break;
        }
        const key = keyText(json, token);
        if (seen.has(key)) {
          // Cut before the separating comma, or at the key when the model left it out
          const previous = tokens[i - 1];
          const cut = previous.kind === 'comma' && previous.depth === 1 ? previous.start : token.start;
          return `${json.slice(0, cut).trimEnd()}}`;
        }
        seen.add(key);
        break;
      }
    }
  }

  if (lastValidEnd > 0) {
    return `${json.slice(0, lastValidEnd)}}`;
  }
  return json;
}
