// Batched Analysis Prompt
// One call per paragraph batch: characters keyed by name with dialogs, traits and a voice tuple

import { LLM_PROMPTS } from '@/config/prompts';
import { defaultConfig } from '@/config';
import type { ExtractedCharacterData, ExtractedVoiceProfile } from '@/state/types';
import { isRecord } from '@/utils/llmUtils';
import { recoverJson } from '../ResponseRecovery';
import { truncateAtParagraphBoundary } from '../TextTruncation';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { parseVoiceObject, parseVoiceTuple } from '../VoiceProfile';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';

export interface BatchedAnalysisInput {
  text: string;
  /** 0-based */
  batchIndex: number;
  totalBatches: number;
}

export interface BatchedAnalysisOutput {
  characters: ExtractedCharacterData[];
}

const DIALOG_KEYS = ['D', 'd', 'dialogs'] as const;
const TRAIT_KEYS = ['T', 't', 'traits'] as const;
const VOICE_KEYS = ['V', 'v'] as const;

function firstPresent(record: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined && record[key] !== null) return record[key];
  }
  return undefined;
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
    .map((item) => String(item).trim())
    .filter((item) => item.length > 0);
}

function parseVoice(record: Record<string, unknown>): ExtractedVoiceProfile | undefined {
  const tuple = firstPresent(record, VOICE_KEYS);
  if (typeof tuple === 'string' && tuple.includes(',')) {
    const profile = parseVoiceTuple(tuple);
    if (profile) return profile;
  }
  return parseVoiceObject(record.voice);
}

export class BatchedAnalysisPrompt extends BasePromptDefinition<BatchedAnalysisInput, BatchedAnalysisOutput> {
  readonly promptId = 'batched_analysis_v1';
  readonly displayName = 'Batched Chapter Analysis';
  readonly purpose = 'Extract characters, dialogs, traits and voice profiles from a batch of paragraphs';
  readonly tokenBudget = TOKEN_BUDGETS.batchedAnalysis;
  readonly systemPrompt = LLM_PROMPTS.batchedAnalysis.system;
  readonly temperature: number = defaultConfig.llm.batchedTemperature;

  buildUserPrompt(input: BatchedAnalysisInput): string {
    return fillTemplate(LLM_PROMPTS.batchedAnalysis.userTemplate, { text: input.text });
  }

  prepareInput(input: BatchedAnalysisInput): BatchedAnalysisInput {
    const maxChars = this.tokenBudget.maxInputChars;
    if (input.text.length <= maxChars) return input;
    this.logger?.debug?.(`[${this.promptId}] Truncating batch ${input.batchIndex + 1}/${input.totalBatches}`, {
      from: input.text.length,
      to: maxChars,
    });
    return { ...input, text: truncateAtParagraphBoundary(input.text, maxChars) };
  }

  emptyOutput(): BatchedAnalysisOutput {
    return { characters: [] };
  }

  protected parse(raw: string): BatchedAnalysisOutput {
    const root = recoverJson(raw);
    if (!root) {
      this.logger?.warn(`[${this.promptId}] No JSON object in response`, { response: raw.substring(0, 300) });
      return this.emptyOutput();
    }

    const characters: ExtractedCharacterData[] = [];
    for (const [key, value] of Object.entries(root)) {
      const name = key.trim();
      if (!name) continue;
      if (!isRecord(value)) {
        this.logger?.debug?.(`[${this.promptId}] Skipping "${name}": value is not an object`);
        continue;
      }
      characters.push({
        name,
        dialogs: toStringList(firstPresent(value, DIALOG_KEYS)),
        traits: toStringList(firstPresent(value, TRAIT_KEYS)),
        voiceProfile: parseVoice(value),
      });
    }
    return { characters };
  }
}
