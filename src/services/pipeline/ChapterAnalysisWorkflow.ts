// Chapter Analysis Workflow
// Names, then dialogs, then traits per character, folded into one cast

import type { ILogger } from '@/services/Logger';
import { IncrementalMerger } from '@/services/llm/IncrementalMerger';
import type { LanguageModel } from '@/services/llm/LanguageModel';
import { prepareInputText, splitParagraphs } from '@/services/llm/TextTruncation';
import {
  CharacterNamesPrompt,
  dedupeNames,
  type CharacterNamesInput,
  type CharacterNamesOutput,
} from '@/services/llm/prompts/CharacterNamesPrompt';
import {
  DialogExtractionPrompt,
  NARRATOR,
  type DialogExtractionInput,
  type DialogExtractionOutput,
} from '@/services/llm/prompts/DialogExtractionPrompt';
import { TraitsVoicePrompt, type TraitsVoiceInput, type TraitsVoiceOutput } from '@/services/llm/prompts/TraitsVoicePrompt';
import type { ExtractedCharacterData, ExtractedDialog, MergedCharacter } from '@/state/types';
import { batchParagraphs } from './ParagraphBatcher';
import { PromptPass } from './PromptPass';
import { THREE_PASS, passCount, type WorkflowConfig } from './WorkflowConfig';
import { BasePipelineStep, isolate } from './types';

const CONTEXT_SEPARATOR = '\n\n---\n\n';

export interface ChapterAnalysisWorkflowOptions {
  model: LanguageModel;
  config?: WorkflowConfig;
  merger?: IncrementalMerger;
  logger?: ILogger;
}

export interface ChapterAnalysisResult {
  characters: MergedCharacter[];
  dialogs: ExtractedDialog[];
}

/**
 * Split chapter text into paragraph-aligned segments of at most maxChars
 */
export function segmentText(text: string, maxChars: number): string[] {
  return batchParagraphs(splitParagraphs(text), maxChars).map((batch) => batch.text);
}

/**
 * Runs the passes a WorkflowConfig selects. A pass that fails leaves its
 * output empty and the passes after it still run.
 */
export class ChapterAnalysisWorkflow extends BasePipelineStep {
  readonly name = 'chapter-analysis';

  private readonly model: LanguageModel;
  private readonly config: WorkflowConfig;
  private readonly merger: IncrementalMerger;
  private readonly logger?: ILogger;
  private readonly namesPass: PromptPass<CharacterNamesInput, CharacterNamesOutput>;
  private readonly dialogPass: PromptPass<DialogExtractionInput, DialogExtractionOutput>;
  private readonly traitsPass: PromptPass<TraitsVoiceInput, TraitsVoiceOutput>;

  constructor(options: ChapterAnalysisWorkflowOptions) {
    super();
    this.model = options.model;
    this.config = options.config ?? THREE_PASS;
    this.logger = options.logger;
    this.merger = options.merger ?? new IncrementalMerger({ logger: options.logger });

    const shared = { logger: options.logger };
    this.namesPass = new PromptPass(new CharacterNamesPrompt(shared), shared);
    this.dialogPass = new PromptPass(new DialogExtractionPrompt(shared), shared);
    this.traitsPass = new PromptPass(new TraitsVoicePrompt(shared), shared);
  }

  get workflowName(): string {
    return this.config.name;
  }

  async run(text: string, signal?: AbortSignal): Promise<ChapterAnalysisResult> {
    this.checkCancelled(signal);
    const totalPasses = passCount(this.config);
    this.logger?.info(`[ChapterAnalysis] Starting ${this.config.name} (${totalPasses} passes)`);

    const segmentsByName = new Map<string, string[]>();
    let names: string[] = [];
    let dialogs: ExtractedDialog[] = [];

    if (this.config.runCharacterExtraction) {
      names = await this.isolate('Pass 1', () => this.extractNames(text, segmentsByName, signal), []);
      this.logger?.info(`[ChapterAnalysis] Pass 1 complete: ${names.length} characters`);
    }

    if (this.config.runDialogExtraction) {
      if (names.length === 0) {
        this.logger?.info('[ChapterAnalysis] Skipping Pass 2: no characters to attribute dialogs to');
      } else {
        dialogs = await this.isolate('Pass 2', () => this.extractDialogs(text, names, signal), []);
        this.logger?.info(`[ChapterAnalysis] Pass 2 complete: ${dialogs.length} dialogs`);
      }
    }

    const characters = collectCharacters(names, dialogs);

    if (this.config.runTraitsExtraction && characters.length > 0) {
      await this.isolate('Pass 3', () => this.extractTraits(characters, segmentsByName, signal), undefined);
      this.logger?.info(`[ChapterAnalysis] Pass 3 complete: ${characters.length} characters`);
    }

    const state = this.merger.merge(this.merger.createState(), { characters });
    const merged = this.merger.toList(state);
    this.reportProgress(totalPasses, totalPasses, `Analyzed ${merged.length} character(s)`);
    return { characters: merged, dialogs };
  }

  // ========== Passes ==========

  private async extractNames(
    text: string,
    segmentsByName: Map<string, string[]>,
    signal?: AbortSignal,
  ): Promise<string[]> {
    const { pass1Config, segmentSizePass1 } = this.config;
    const segments = segmentText(text, Math.min(segmentSizePass1, pass1Config.maxSegmentChars));
    const found: string[] = [];

    for (const [index, segment] of segments.entries()) {
      this.checkCancelled(signal);
      this.reportProgress(index + 1, segments.length, `Pass 1: Segment ${index + 1}/${segments.length}`);
      const output = await this.namesPass.execute(this.model, { text: segment }, pass1Config, signal);
      for (const name of output.characterNames) {
        const key = name.toLowerCase();
        const pages = segmentsByName.get(key) ?? [];
        pages.push(segment);
        segmentsByName.set(key, pages);
        found.push(name);
      }
    }

    return dedupeNames(found);
  }

  private async extractDialogs(text: string, names: string[], signal?: AbortSignal): Promise<ExtractedDialog[]> {
    const { pass2Config, segmentSizePass2 } = this.config;
    const segments = segmentText(text, Math.min(segmentSizePass2, pass2Config.maxSegmentChars));
    const dialogs: ExtractedDialog[] = [];

    for (const [index, segment] of segments.entries()) {
      this.checkCancelled(signal);
      this.reportProgress(index + 1, segments.length, `Pass 2: Segment ${index + 1}/${segments.length}`);
      const output = await this.dialogPass.execute(
        this.model,
        { text: segment, characterNames: names },
        pass2Config,
        signal,
      );
      dialogs.push(...output.dialogs);
    }

    return dialogs;
  }

  /** Fills traits and voice in place, so characters done before a failure keep theirs */
  private async extractTraits(
    characters: ExtractedCharacterData[],
    segmentsByName: Map<string, string[]>,
    signal?: AbortSignal,
  ): Promise<void> {
    for (const [index, character] of characters.entries()) {
      this.checkCancelled(signal);
      this.reportProgress(index + 1, characters.length, `Pass 3: Character ${index + 1}/${characters.length}`);

      const contextText = this.contextFor(character, segmentsByName);
      if (!contextText) {
        this.logger?.debug?.(`[ChapterAnalysis] No context for "${character.name}", skipping traits`);
        continue;
      }

      const output = await this.traitsPass.execute(
        this.model,
        { characterName: character.name, contextText },
        this.config.pass3Config,
        signal,
      );
      character.traits = output.traits;
      if (output.voiceProfile) character.voiceProfile = output.voiceProfile;
    }
  }

  /**
   * Segments the character was found in; their own lines when Pass 1 never saw them
   */
  private contextFor(character: ExtractedCharacterData, segmentsByName: Map<string, string[]>): string {
    const segments = segmentsByName.get(character.name.toLowerCase()) ?? [];
    const source = segments.length > 0 ? segments.join(CONTEXT_SEPARATOR) : character.dialogs.join('\n');
    return prepareInputText(source, this.config.maxContextPerCharacter);
  }

  private isolate<T>(label: string, run: () => Promise<T>, fallback: T): Promise<T> {
    return isolate(run, fallback, (error) => {
      this.logger?.error(`[ChapterAnalysis] ${label} failed, continuing without it`, error);
    });
  }
}

/**
 * One entry per known name, plus any other named speaker; narration is not a character
 */
function collectCharacters(names: readonly string[], dialogs: readonly ExtractedDialog[]): ExtractedCharacterData[] {
  const byKey = new Map<string, ExtractedCharacterData>();
  for (const name of names) {
    byKey.set(name.toLowerCase(), { name, dialogs: [], traits: [] });
  }

  for (const dialog of dialogs) {
    const speaker = dialog.speaker.trim();
    const key = speaker.toLowerCase();
    if (!speaker || key === NARRATOR.toLowerCase()) continue;
    let character = byKey.get(key);
    if (!character) {
      character = { name: speaker, dialogs: [], traits: [] };
      byKey.set(key, character);
    }
    character.dialogs.push(dialog.text);
  }

  return Array.from(byKey.values());
}

export function createChapterAnalysisWorkflow(options: ChapterAnalysisWorkflowOptions): ChapterAnalysisWorkflow {
  return new ChapterAnalysisWorkflow(options);
}
