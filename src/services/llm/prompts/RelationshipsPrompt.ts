// Relationships Prompt
// How one character relates to the rest of the cast in a chapter

import { LLM_PROMPTS } from '@/config/prompts';
import type { CharacterRelationship } from '@/state/types';
import { recoverJson } from '../ResponseRecovery';
import { RelationshipItemSchema } from '../schemas';
import { prepareInputText } from '../TextTruncation';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';

export interface RelationshipsInput {
  characterName: string;
  chapterText: string;
  otherCharacters: string[];
}

export interface RelationshipsOutput {
  characterName: string;
  relationships: CharacterRelationship[];
}

export const MAX_OTHER_CHARACTERS = 20;

/**
 * The others worth asking about: self excluded case-insensitively, capped
 */
export function selectOtherCharacters(characterName: string, others: readonly string[]): string[] {
  const self = characterName.trim().toLowerCase();
  return others.filter((name) => name.trim().toLowerCase() !== self).slice(0, MAX_OTHER_CHARACTERS);
}

export class RelationshipsPrompt extends BasePromptDefinition<RelationshipsInput, RelationshipsOutput> {
  readonly promptId = 'relationships_v1';
  readonly displayName = 'Relationships';
  readonly purpose = 'Extract relationships between one character and the others in a chapter';
  readonly tokenBudget = TOKEN_BUDGETS.relationships;
  readonly systemPrompt = LLM_PROMPTS.relationships.system;

  buildUserPrompt(input: RelationshipsInput): string {
    return fillTemplate(LLM_PROMPTS.relationships.userTemplate, {
      name: input.characterName,
      others: selectOtherCharacters(input.characterName, input.otherCharacters).join(', '),
      text: input.chapterText,
    });
  }

  prepareInput(input: RelationshipsInput): RelationshipsInput {
    return { ...input, chapterText: prepareInputText(input.chapterText, this.tokenBudget.maxInputChars) };
  }

  emptyOutput(input?: RelationshipsInput): RelationshipsOutput {
    return { characterName: input?.characterName ?? '', relationships: [] };
  }

  protected parse(raw: string, input?: RelationshipsInput): RelationshipsOutput {
    const list = recoverJson(raw)?.relationships;
    if (!Array.isArray(list)) return this.emptyOutput(input);

    const self = input?.characterName.trim().toLowerCase();
    const relationships: CharacterRelationship[] = [];
    for (const item of list) {
      const parsed = RelationshipItemSchema.safeParse(item);
      if (!parsed.success || parsed.data.character.toLowerCase() === self) continue;
      relationships.push({
        character: parsed.data.character,
        relationship: parsed.data.relationship.toLowerCase(),
        nature: parsed.data.nature,
      });
    }
    return { characterName: input?.characterName ?? '', relationships };
  }
}
