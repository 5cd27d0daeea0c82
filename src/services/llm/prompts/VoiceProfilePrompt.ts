// Voice Profile Prompt
// Casting-level voice suggestions for a group of characters

import { LLM_PROMPTS } from '@/config/prompts';
import type { VoiceProfileSuggestion } from '@/state/types';
import { recoverJson } from '../ResponseRecovery';
import { VoiceSuggestionSchema } from '../schemas';
import { prepareInputText } from '../TextTruncation';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { DEFAULT_VOICE_PROFILE, PITCH_RANGE, SPEED_RANGE, normalizeAge, normalizeGender } from '../VoiceProfile';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';

export interface VoiceProfileInput {
  characterNames: string[];
  dialogContext: string;
}

export interface VoiceProfileOutput {
  profiles: VoiceProfileSuggestion[];
}

const ENERGY_RANGE = { min: 0.5, max: 1.5 } as const;

function clamp(value: number, range: { min: number; max: number }): number {
  return Math.min(range.max, Math.max(range.min, value));
}

/** Keeps numeric entries only, clamped to [0, 1] */
function toEmotionBias(value: Record<string, unknown>): Record<string, number> {
  const bias: Record<string, number> = {};
  for (const [emotion, weight] of Object.entries(value)) {
    if (typeof weight === 'number' && Number.isFinite(weight)) {
      bias[emotion.toLowerCase()] = clamp(weight, { min: 0, max: 1 });
    }
  }
  return bias;
}

export class VoiceProfilePrompt extends BasePromptDefinition<VoiceProfileInput, VoiceProfileOutput> {
  readonly promptId = 'voice_profile_v1';
  readonly displayName = 'Voice Profiles';
  readonly purpose = 'Suggest voice casting parameters for characters from their dialogs';
  readonly tokenBudget = TOKEN_BUDGETS.voiceProfile;
  readonly systemPrompt = LLM_PROMPTS.voiceProfile.system;
  readonly temperature: number = 0.2;

  buildUserPrompt(input: VoiceProfileInput): string {
    return fillTemplate(LLM_PROMPTS.voiceProfile.userTemplate, {
      names: input.characterNames.join(', '),
      context: input.dialogContext,
    });
  }

  prepareInput(input: VoiceProfileInput): VoiceProfileInput {
    return { ...input, dialogContext: prepareInputText(input.dialogContext, this.tokenBudget.maxInputChars) };
  }

  emptyOutput(): VoiceProfileOutput {
    return { profiles: [] };
  }

  protected parse(raw: string): VoiceProfileOutput {
    const list = recoverJson(raw)?.characters;
    if (!Array.isArray(list)) return this.emptyOutput();

    const profiles: VoiceProfileSuggestion[] = [];
    for (const item of list) {
      const parsed = VoiceSuggestionSchema.safeParse(item);
      if (!parsed.success) continue;
      const { name, gender, age, tone, accent, voice_profile: voice } = parsed.data;
      profiles.push({
        characterName: name,
        gender: normalizeGender(gender),
        age: normalizeAge(age),
        accent: accent.toLowerCase() || DEFAULT_VOICE_PROFILE.accent,
        tone,
        pitch: clamp(voice.pitch, PITCH_RANGE),
        speed: clamp(voice.speed, SPEED_RANGE),
        energy: clamp(voice.energy, ENERGY_RANGE),
        emotionBias: toEmotionBias(voice.emotion_bias),
      });
    }
    return { profiles };
  }
}
