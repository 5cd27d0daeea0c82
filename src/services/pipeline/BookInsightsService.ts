// Book Insights Service
// Theme, plot arc, foreshadowing, chapter summaries, key moments, relationships
// and voice suggestions; each one best-effort

import type { ILogger } from '@/services/Logger';
import type { LanguageModel } from '@/services/llm/LanguageModel';
import { ChapterSummaryPrompt, type ChapterSummaryInput } from '@/services/llm/prompts/ChapterSummaryPrompt';
import {
  ForeshadowingPrompt,
  type ForeshadowingInput,
  type ForeshadowingOutput,
} from '@/services/llm/prompts/ForeshadowingPrompt';
import { KeyMomentsPrompt, type KeyMomentsInput, type KeyMomentsOutput } from '@/services/llm/prompts/KeyMomentsPrompt';
import { PlotPointPrompt, type PlotPointInput, type PlotPointOutput } from '@/services/llm/prompts/PlotPointPrompt';
import {
  RelationshipsPrompt,
  type RelationshipsInput,
  type RelationshipsOutput,
} from '@/services/llm/prompts/RelationshipsPrompt';
import { ThemeAnalysisPrompt, type ThemeAnalysisInput } from '@/services/llm/prompts/ThemeAnalysisPrompt';
import {
  VoiceProfilePrompt,
  type VoiceProfileInput,
  type VoiceProfileOutput,
} from '@/services/llm/prompts/VoiceProfilePrompt';
import type {
  ChapterSummary,
  CharacterRelationship,
  Foreshadowing,
  KeyMoment,
  PlotPoint,
  ThemeAnalysis,
  VoiceProfileSuggestion,
} from '@/state/types';
import { PromptPass } from './PromptPass';
import { BasePipelineStep, PASS_CONFIGS, isolate, type PassConfig } from './types';

export interface InsightPassConfigs {
  theme: PassConfig;
  plotPoints: PassConfig;
  foreshadowing: PassConfig;
  chapterSummary: PassConfig;
  keyMoments: PassConfig;
  relationships: PassConfig;
  voiceProfile: PassConfig;
}

export interface BookInsightsServiceOptions {
  model: LanguageModel;
  passConfigs?: Partial<InsightPassConfigs>;
  logger?: ILogger;
}

export interface ChapterText {
  title: string;
  text: string;
}

export interface BookInsightsRequest {
  bookId: string;
  title: string;
  chapters: ChapterText[];
  /** Characters to collect key moments for */
  characterNames?: string[];
}

export interface BookInsights {
  theme: ThemeAnalysis;
  plotPoints: PlotPoint[];
  /** By character name, in chapter order */
  keyMoments: Record<string, KeyMoment[]>;
}

export class BookInsightsService extends BasePipelineStep {
  readonly name = 'book-insights';

  private readonly model: LanguageModel;
  private readonly configs: InsightPassConfigs;
  private readonly logger?: ILogger;
  private readonly themePrompt: ThemeAnalysisPrompt;
  private readonly themePass: PromptPass<ThemeAnalysisInput, ThemeAnalysis>;
  private readonly plotPass: PromptPass<PlotPointInput, PlotPointOutput>;
  private readonly foreshadowingPass: PromptPass<ForeshadowingInput, ForeshadowingOutput>;
  private readonly summaryPass: PromptPass<ChapterSummaryInput, ChapterSummary>;
  private readonly momentsPass: PromptPass<KeyMomentsInput, KeyMomentsOutput>;
  private readonly relationshipsPass: PromptPass<RelationshipsInput, RelationshipsOutput>;
  private readonly voicePass: PromptPass<VoiceProfileInput, VoiceProfileOutput>;

  constructor(options: BookInsightsServiceOptions) {
    super();
    this.model = options.model;
    this.logger = options.logger;
    this.configs = {
      theme: PASS_CONFIGS.themeAnalysis,
      plotPoints: PASS_CONFIGS.plotPoints,
      foreshadowing: PASS_CONFIGS.foreshadowing,
      chapterSummary: PASS_CONFIGS.chapterSummary,
      keyMoments: PASS_CONFIGS.keyMoments,
      relationships: PASS_CONFIGS.relationships,
      voiceProfile: PASS_CONFIGS.voiceProfile,
      ...options.passConfigs,
    };

    const shared = { logger: options.logger };
    this.themePrompt = new ThemeAnalysisPrompt(shared);
    this.themePass = new PromptPass(this.themePrompt, shared);
    this.plotPass = new PromptPass(new PlotPointPrompt(shared), shared);
    this.foreshadowingPass = new PromptPass(new ForeshadowingPrompt(shared), shared);
    this.summaryPass = new PromptPass(new ChapterSummaryPrompt(shared), shared);
    this.momentsPass = new PromptPass(new KeyMomentsPrompt(shared), shared);
    this.relationshipsPass = new PromptPass(new RelationshipsPrompt(shared), shared);
    this.voicePass = new PromptPass(new VoiceProfilePrompt(shared), shared);
  }

  // ========== Single passes ==========

  /** Mood, genre and era from the opening chapter */
  analyzeTheme(bookId: string, title: string, firstChapterText: string, signal?: AbortSignal): Promise<ThemeAnalysis> {
    return this.themePass.execute(this.model, { bookId, title, firstChapterText }, this.configs.theme, signal);
  }

  async extractPlotPoints(bookId: string, chapterTexts: readonly string[], signal?: AbortSignal): Promise<PlotPoint[]> {
    const chapters = chapterTexts.map((text, index): [number, string] => [index, text]);
    const output = await this.plotPass.execute(this.model, { bookId, chapters }, this.configs.plotPoints, signal);
    return output.plotPoints;
  }

  /** Setups and payoffs; chapter indices in the result are 0-based */
  async detectForeshadowing(
    bookId: string,
    chapterTexts: readonly string[],
    signal?: AbortSignal,
  ): Promise<Foreshadowing[]> {
    if (chapterTexts.length === 0) return [];
    const chapters = chapterTexts.map((text, index): [number, string] => [index, text]);
    const output = await this.foreshadowingPass.execute(
      this.model,
      { bookId, chapters },
      this.configs.foreshadowing,
      signal,
    );
    return output.foreshadowings;
  }

  summarizeChapter(chapter: ChapterText, signal?: AbortSignal): Promise<ChapterSummary> {
    return this.summaryPass.execute(
      this.model,
      { chapterTitle: chapter.title, chapterText: chapter.text },
      this.configs.chapterSummary,
      signal,
    );
  }

  async extractKeyMoments(characterName: string, chapter: ChapterText, signal?: AbortSignal): Promise<KeyMoment[]> {
    const output = await this.momentsPass.execute(
      this.model,
      { characterName, chapterText: chapter.text, chapterTitle: chapter.title },
      this.configs.keyMoments,
      signal,
    );
    return output.moments;
  }

  async extractRelationships(
    characterName: string,
    chapterText: string,
    otherCharacters: readonly string[],
    signal?: AbortSignal,
  ): Promise<CharacterRelationship[]> {
    const output = await this.relationshipsPass.execute(
      this.model,
      { characterName, chapterText, otherCharacters: [...otherCharacters] },
      this.configs.relationships,
      signal,
    );
    return output.relationships;
  }

  async suggestVoiceProfiles(
    characterNames: readonly string[],
    dialogContext: string,
    signal?: AbortSignal,
  ): Promise<VoiceProfileSuggestion[]> {
    if (characterNames.length === 0) return [];
    const output = await this.voicePass.execute(
      this.model,
      { characterNames: [...characterNames], dialogContext },
      this.configs.voiceProfile,
      signal,
    );
    return output.profiles;
  }

  // ========== Whole book ==========

  /**
   * Theme, then plot points, then key moments per character. A failed
   * stage leaves its part at the default and the rest still run.
   */
  async analyzeBook(request: BookInsightsRequest, signal?: AbortSignal): Promise<BookInsights> {
    this.checkCancelled(signal);
    const { bookId, title, chapters } = request;
    const characterNames = request.characterNames ?? [];
    const totalSteps = 2 + characterNames.length;
    let step = 0;

    this.reportProgress(step++, totalSteps, 'Analyzing theme...');
    const defaultTheme = this.themePrompt.emptyOutput({ bookId, title, firstChapterText: '' });
    const theme =
      chapters.length > 0
        ? await isolate(() => this.analyzeTheme(bookId, title, chapters[0].text, signal), defaultTheme, (error) =>
            this.logStageFailure('Theme analysis', error),
          )
        : defaultTheme;

    this.reportProgress(step++, totalSteps, 'Extracting plot points...');
    const plotPoints =
      chapters.length > 0
        ? await isolate(
            () =>
              this.extractPlotPoints(
                bookId,
                chapters.map((chapter) => chapter.text),
                signal,
              ),
            [],
            (error) => this.logStageFailure('Plot point extraction', error),
          )
        : [];

    const keyMoments: Record<string, KeyMoment[]> = {};
    for (const characterName of characterNames) {
      this.reportProgress(step++, totalSteps, `Key moments: ${characterName}`);
      keyMoments[characterName] = await isolate(
        () => this.collectKeyMoments(characterName, chapters, signal),
        [],
        (error) => this.logStageFailure(`Key moments for "${characterName}"`, error),
      );
    }

    this.reportProgress(totalSteps, totalSteps, 'Insights complete');
    this.logger?.info(
      `[BookInsights] ${bookId}: ${plotPoints.length} plot points, key moments for ${characterNames.length} characters`,
    );
    return { theme, plotPoints, keyMoments };
  }

  private async collectKeyMoments(
    characterName: string,
    chapters: readonly ChapterText[],
    signal?: AbortSignal,
  ): Promise<KeyMoment[]> {
    const moments: KeyMoment[] = [];
    for (const chapter of chapters) {
      this.checkCancelled(signal);
      moments.push(...(await this.extractKeyMoments(characterName, chapter, signal)));
    }
    return moments;
  }

  private logStageFailure(stage: string, error: Error): void {
    this.logger?.error(`[BookInsights] ${stage} failed, continuing without it`, error);
  }
}

export function createBookInsightsService(options: BookInsightsServiceOptions): BookInsightsService {
  return new BookInsightsService(options);
}
