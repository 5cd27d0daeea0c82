// Character Names Prompt
// Pass 1: names only, per segment

import { LLM_PROMPTS } from '@/config/prompts';
import { isRecord } from '@/utils/llmUtils';
import { recoverJson } from '../ResponseRecovery';
import { prepareInputText } from '../TextTruncation';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';

export interface CharacterNamesInput {
  text: string;
  pageNumber?: number;
}

export interface CharacterNamesOutput {
  characterNames: string[];
}

function nameOf(entry: unknown): string {
  if (typeof entry === 'string') return entry.trim();
  if (isRecord(entry) && typeof entry.name === 'string') return entry.name.trim();
  return '';
}

/**
 * Case-insensitive dedupe keeping the first spelling
 */
export function dedupeNames(names: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const name of names) {
    const key = name.toLowerCase();
    if (!name || seen.has(key)) continue;
    seen.add(key);
    result.push(name);
  }
  return result;
}

export class CharacterNamesPrompt extends BasePromptDefinition<CharacterNamesInput, CharacterNamesOutput> {
  readonly promptId = 'character_extraction_v1';
  readonly displayName = 'Character Names';
  readonly purpose = 'List the character names that appear in a text segment';
  readonly tokenBudget = TOKEN_BUDGETS.characterExtraction;
  readonly systemPrompt = LLM_PROMPTS.characterNames.system;
  readonly temperature: number = 0.1;

  buildUserPrompt(input: CharacterNamesInput): string {
    return fillTemplate(LLM_PROMPTS.characterNames.userTemplate, { text: input.text });
  }

  prepareInput(input: CharacterNamesInput): CharacterNamesInput {
    return { ...input, text: prepareInputText(input.text, this.tokenBudget.maxInputChars) };
  }

  emptyOutput(): CharacterNamesOutput {
    return { characterNames: [] };
  }

  protected parse(raw: string): CharacterNamesOutput {
    const root = recoverJson(raw);
    const list = root?.characters ?? root?.names;
    if (!Array.isArray(list)) return this.emptyOutput();
    return { characterNames: dedupeNames(list.map(nameOf)) };
  }
}
