// Traits and Voice Prompt
// Pass 3: per-character traits with optional voice hints

import { LLM_PROMPTS } from '@/config/prompts';
import type { ExtractedVoiceProfile } from '@/state/types';
import { recoverJson } from '../ResponseRecovery';
import { prepareInputText } from '../TextTruncation';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { parseVoiceObject } from '../VoiceProfile';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';

export interface TraitsVoiceInput {
  characterName: string;
  contextText: string;
}

export interface TraitsVoiceOutput {
  characterName: string;
  traits: string[];
  voiceProfile?: ExtractedVoiceProfile;
}

/** Traits longer than this are prose, not traits */
const MAX_TRAIT_LENGTH = 40;

export class TraitsVoicePrompt extends BasePromptDefinition<TraitsVoiceInput, TraitsVoiceOutput> {
  readonly promptId = 'traits_extraction_v1';
  readonly displayName = 'Traits and Voice';
  readonly purpose = 'Extract concise traits for one character and hint at a matching voice';
  readonly tokenBudget = TOKEN_BUDGETS.traits;
  readonly systemPrompt = LLM_PROMPTS.traitsVoice.system;
  readonly temperature: number = 0.1;

  buildUserPrompt(input: TraitsVoiceInput): string {
    return fillTemplate(LLM_PROMPTS.traitsVoice.userTemplate, {
      name: input.characterName,
      context: input.contextText,
    });
  }

  prepareInput(input: TraitsVoiceInput): TraitsVoiceInput {
    return { ...input, contextText: prepareInputText(input.contextText, this.tokenBudget.maxInputChars) };
  }

  emptyOutput(input?: TraitsVoiceInput): TraitsVoiceOutput {
    return { characterName: input?.characterName ?? '', traits: [] };
  }

  protected parse(raw: string, input?: TraitsVoiceInput): TraitsVoiceOutput {
    const root = recoverJson(raw);
    if (!root) return this.emptyOutput(input);

    const echoed = typeof root.character === 'string' ? root.character.trim() : '';
    const characterName = input?.characterName ?? echoed;
    const traits = Array.isArray(root.traits)
      ? root.traits
          .filter((trait): trait is string => typeof trait === 'string')
          .map((trait) => trait.trim())
          .filter((trait) => trait.length > 0 && trait.length <= MAX_TRAIT_LENGTH)
      : [];

    return { characterName, traits, voiceProfile: parseVoiceObject(root.voice_profile) };
  }
}
