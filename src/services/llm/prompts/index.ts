export { BasePromptDefinition, DEFAULT_PROMPT_TEMPERATURE, fillTemplate } from './PromptDefinition';
export type { PromptDefinition, PromptOptions } from './PromptDefinition';
export { BatchedAnalysisPrompt } from './BatchedAnalysisPrompt';
export type { BatchedAnalysisInput, BatchedAnalysisOutput } from './BatchedAnalysisPrompt';
export { CharacterNamesPrompt, dedupeNames } from './CharacterNamesPrompt';
export type { CharacterNamesInput, CharacterNamesOutput } from './CharacterNamesPrompt';
export { DialogExtractionPrompt, NARRATOR } from './DialogExtractionPrompt';
export type { DialogExtractionInput, DialogExtractionOutput } from './DialogExtractionPrompt';
export { TraitsVoicePrompt } from './TraitsVoicePrompt';
export type { TraitsVoiceInput, TraitsVoiceOutput } from './TraitsVoicePrompt';
export { ThemeAnalysisPrompt, DEFAULT_THEME_SAMPLE_CHARS } from './ThemeAnalysisPrompt';
export type { ThemeAnalysisInput } from './ThemeAnalysisPrompt';
export { PlotPointPrompt, PLOT_POINT_TYPES, DEFAULT_PLOT_SAMPLE_CHARS, parsePlotPointType } from './PlotPointPrompt';
export type { PlotPointInput, PlotPointOutput } from './PlotPointPrompt';
export { KeyMomentsPrompt } from './KeyMomentsPrompt';
export type { KeyMomentsInput, KeyMomentsOutput } from './KeyMomentsPrompt';
export { RelationshipsPrompt, MAX_OTHER_CHARACTERS, selectOtherCharacters } from './RelationshipsPrompt';
export type { RelationshipsInput, RelationshipsOutput } from './RelationshipsPrompt';
export { VoiceProfilePrompt } from './VoiceProfilePrompt';
export type { VoiceProfileInput, VoiceProfileOutput } from './VoiceProfilePrompt';
export { StoryGenerationPrompt, cleanStoryText } from './StoryGenerationPrompt';
export type { StoryGenerationInput, StoryGenerationOutput } from './StoryGenerationPrompt';
export { StoryRemixPrompt } from './StoryRemixPrompt';
export type { StoryRemixInput, StoryRemixOutput } from './StoryRemixPrompt';
export { ForeshadowingPrompt, DEFAULT_FORESHADOWING_SAMPLE_CHARS } from './ForeshadowingPrompt';
export type { ForeshadowingInput, ForeshadowingOutput } from './ForeshadowingPrompt';
export { ChapterSummaryPrompt, OMITTED_MIDDLE_MARKER } from './ChapterSummaryPrompt';
export type { ChapterSummaryInput } from './ChapterSummaryPrompt';
