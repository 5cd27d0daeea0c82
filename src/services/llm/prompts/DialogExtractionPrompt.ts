// Dialog Extraction Prompt
// Pass 2: quoted speech attributed to known characters, narration to "Narrator"

import { LLM_PROMPTS } from '@/config/prompts';
import type { ExtractedDialog } from '@/state/types';
import { isRecord } from '@/utils/llmUtils';
import { detectJsonShape, recoverJson, recoverJsonArray } from '../ResponseRecovery';
import { DialogItemSchema } from '../schemas';
import { prepareInputText } from '../TextTruncation';
import { TOKEN_BUDGETS } from '../TokenBudget';
import { BasePromptDefinition, fillTemplate } from './PromptDefinition';

export const NARRATOR = 'Narrator';

export interface DialogExtractionInput {
  text: string;
  characterNames: string[];
}

export interface DialogExtractionOutput {
  dialogs: ExtractedDialog[];
}

const clampIntensity = (value: number): number => Math.min(1, Math.max(0, value));

export class DialogExtractionPrompt extends BasePromptDefinition<DialogExtractionInput, DialogExtractionOutput> {
  readonly promptId = 'dialog_extraction_v1';
  readonly displayName = 'Dialog Extraction';
  readonly purpose = 'Attribute quoted speech in a segment to speakers, with emotion and intensity';
  readonly tokenBudget = TOKEN_BUDGETS.dialogExtraction;
  readonly systemPrompt = LLM_PROMPTS.dialogs.system;

  buildUserPrompt(input: DialogExtractionInput): string {
    const speakers = [...input.characterNames, NARRATOR];
    return fillTemplate(LLM_PROMPTS.dialogs.userTemplate, {
      characters: JSON.stringify(speakers),
      text: input.text,
    });
  }

  prepareInput(input: DialogExtractionInput): DialogExtractionInput {
    return { ...input, text: prepareInputText(input.text, this.tokenBudget.maxInputChars) };
  }

  emptyOutput(): DialogExtractionOutput {
    return { dialogs: [] };
  }

  protected parse(raw: string): DialogExtractionOutput {
    if (detectJsonShape(raw) === 'array') {
      return { dialogs: this.parseSpeakerLines(recoverJsonArray(raw) ?? []) };
    }
    const list = recoverJson(raw)?.dialogs;
    if (!Array.isArray(list)) return this.emptyOutput();

    const dialogs: ExtractedDialog[] = [];
    for (const item of list) {
      const parsed = DialogItemSchema.safeParse(item);
      if (!parsed.success) continue;
      dialogs.push({ ...parsed.data, intensity: clampIntensity(parsed.data.intensity) });
    }
    return { dialogs };
  }

  /** Fallback shape: [{"Speaker": "line"}, ...] */
  private parseSpeakerLines(items: unknown[]): ExtractedDialog[] {
    const dialogs: ExtractedDialog[] = [];
    for (const item of items) {
      if (!isRecord(item)) continue;
      for (const [speaker, line] of Object.entries(item)) {
        if (typeof line !== 'string' || !speaker.trim() || !line.trim()) continue;
        dialogs.push({ speaker: speaker.trim(), text: line.trim(), emotion: 'neutral', intensity: 0.5 });
      }
    }
    return dialogs;
  }
}
