// Story Service
// Generates a story from a prompt, or rewrites an existing one

import type { ILogger } from '@/services/Logger';
import type { LanguageModel } from '@/services/llm/LanguageModel';
import {
  StoryGenerationPrompt,
  type StoryGenerationInput,
  type StoryGenerationOutput,
} from '@/services/llm/prompts/StoryGenerationPrompt';
import {
  StoryRemixPrompt,
  type StoryRemixInput,
  type StoryRemixOutput,
} from '@/services/llm/prompts/StoryRemixPrompt';
import { PromptPass } from './PromptPass';
import { PASS_CONFIGS, type PassConfig } from './types';

export interface StoryServiceOptions {
  model: LanguageModel;
  generationConfig?: PassConfig;
  remixConfig?: PassConfig;
  logger?: ILogger;
}

export class StoryService {
  private readonly model: LanguageModel;
  private readonly generationConfig: PassConfig;
  private readonly remixConfig: PassConfig;
  private readonly generationPass: PromptPass<StoryGenerationInput, StoryGenerationOutput>;
  private readonly remixPass: PromptPass<StoryRemixInput, StoryRemixOutput>;

  constructor(options: StoryServiceOptions) {
    this.model = options.model;
    this.generationConfig = options.generationConfig ?? PASS_CONFIGS.storyGeneration;
    this.remixConfig = options.remixConfig ?? PASS_CONFIGS.storyRemix;
    const logger = options.logger;
    this.generationPass = new PromptPass(new StoryGenerationPrompt({ logger }), { logger });
    this.remixPass = new PromptPass(new StoryRemixPrompt({ logger }), { logger });
  }

  /** Empty string when the model produced nothing usable */
  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    const output = await this.generationPass.execute(this.model, { userPrompt: prompt }, this.generationConfig, signal);
    return output.storyText;
  }

  async remix(instruction: string, sourceStory: string, signal?: AbortSignal): Promise<string> {
    const output = await this.remixPass.execute(this.model, { instruction, sourceStory }, this.remixConfig, signal);
    return output.storyText;
  }
}
