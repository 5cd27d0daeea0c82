// Story Remix Prompt
// Rewrites an existing story following a short instruction

import { LLM_PROMPTS } from '@/config/prompts';
import { truncateAtParagraphBoundary, truncateAtSentenceBoundary } from '../TextTruncation';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';
import { cleanStoryText, type StoryGenerationOutput } from './StoryGenerationPrompt';

export interface StoryRemixInput {
  instruction: string;
  sourceStory: string;
}

export type StoryRemixOutput = StoryGenerationOutput;

/** Share of the input budget an instruction may take */
const INSTRUCTION_SHARE = 0.25;

export class StoryRemixPrompt extends BasePromptDefinition<StoryRemixInput, StoryRemixOutput> {
  readonly promptId = 'story_remix_v1';
  readonly displayName = 'Story Remix';
  readonly purpose = 'Rewrite an existing story following an instruction';
  readonly tokenBudget = TOKEN_BUDGETS.storyRemix;
  readonly systemPrompt = LLM_PROMPTS.storyRemix.system;
  readonly temperature: number = 0.7;

  buildUserPrompt(input: StoryRemixInput): string {
    return fillTemplate(LLM_PROMPTS.storyRemix.userTemplate, {
      instruction: input.instruction,
      story: input.sourceStory,
    });
  }

  /**
   * Instruction and story share one input budget. The story gets whatever
   * the (capped) instruction leaves.
   */
  prepareInput(input: StoryRemixInput): StoryRemixInput {
    const limit = this.tokenBudget.maxInputChars;
    const instruction = truncateAtSentenceBoundary(input.instruction, Math.floor(limit * INSTRUCTION_SHARE));
    const sourceStory = truncateAtParagraphBoundary(input.sourceStory, limit - instruction.length);
    return { instruction, sourceStory };
  }

  emptyOutput(): StoryRemixOutput {
    return { storyText: '' };
  }

  protected parse(raw: string): StoryRemixOutput {
    return { storyText: cleanStoryText(raw) };
  }
}
