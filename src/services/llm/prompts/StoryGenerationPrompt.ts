// Story Generation Prompt
// Prose output: a complete story written from the user's prompt

import { LLM_PROMPTS } from '@/config/prompts';
import { stripThinkingTags } from '@/utils/llmUtils';
import { truncateAtParagraphBoundary } from '../TextTruncation';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';

export interface StoryGenerationInput {
  userPrompt: string;
}

export interface StoryGenerationOutput {
  storyText: string;
}

export class StoryGenerationPrompt extends BasePromptDefinition<StoryGenerationInput, StoryGenerationOutput> {
  readonly promptId = 'story_generation_v1';
  readonly displayName = 'Story Generation';
  readonly purpose = 'Write a complete story from a prompt';
  readonly tokenBudget = TOKEN_BUDGETS.storyGeneration;
  readonly systemPrompt = LLM_PROMPTS.story.system;
  readonly temperature: number = 0.7;

  buildUserPrompt(input: StoryGenerationInput): string {
    return fillTemplate(LLM_PROMPTS.story.userTemplate, { prompt: input.userPrompt });
  }

  prepareInput(input: StoryGenerationInput): StoryGenerationInput {
    return { userPrompt: truncateAtParagraphBoundary(input.userPrompt, this.tokenBudget.maxInputChars) };
  }

  emptyOutput(): StoryGenerationOutput {
    return { storyText: '' };
  }

  protected parse(raw: string): StoryGenerationOutput {
    return { storyText: cleanStoryText(raw) };
  }
}

/**
 * Story prose without reasoning blocks or markdown fences
 */
export function cleanStoryText(raw: string): string {
  return stripThinkingTags(raw)
    .replace(/```[\w]*\n/g, '')
    .replace(/```/g, '')
    .trim();
}
