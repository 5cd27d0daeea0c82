// Key Moments Prompt

import { LLM_PROMPTS } from '@/config/prompts';
import type { KeyMoment } from '@/state/types';
import { recoverJson } from '../ResponseRecovery';
import { KeyMomentItemSchema } from '../schemas';
import { prepareInputText } from '../TextTruncation';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';

export interface KeyMomentsInput {
  characterName: string;
  chapterText: string;
  chapterTitle: string;
}

export interface KeyMomentsOutput {
  characterName: string;
  moments: KeyMoment[];
}

export class KeyMomentsPrompt extends BasePromptDefinition<KeyMomentsInput, KeyMomentsOutput> {
  readonly promptId = 'key_moments_v1';
  readonly displayName = 'Key Moments';
  readonly purpose = "Pick a character's significant moments in one chapter";
  readonly tokenBudget = TOKEN_BUDGETS.keyMoments;
  readonly systemPrompt = LLM_PROMPTS.keyMoments.system;
  readonly temperature: number = 0.2;

  buildUserPrompt(input: KeyMomentsInput): string {
    return fillTemplate(LLM_PROMPTS.keyMoments.userTemplate, {
      name: input.characterName,
      chapterTitle: input.chapterTitle,
      text: input.chapterText,
    });
  }

  prepareInput(input: KeyMomentsInput): KeyMomentsInput {
    return { ...input, chapterText: prepareInputText(input.chapterText, this.tokenBudget.maxInputChars) };
  }

  emptyOutput(input?: KeyMomentsInput): KeyMomentsOutput {
    return { characterName: input?.characterName ?? '', moments: [] };
  }

  protected parse(raw: string, input?: KeyMomentsInput): KeyMomentsOutput {
    const list = recoverJson(raw)?.moments;
    if (!Array.isArray(list)) return this.emptyOutput(input);

    const moments: KeyMoment[] = [];
    for (const item of list) {
      const parsed = KeyMomentItemSchema.safeParse(item);
      if (!parsed.success) continue;
      moments.push({
        chapter: parsed.data.chapter || (input?.chapterTitle ?? ''),
        moment: parsed.data.moment,
        significance: parsed.data.significance,
      });
    }
    return { characterName: input?.characterName ?? '', moments };
  }
}
