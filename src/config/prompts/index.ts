// LLM Prompts Configuration
// One module per extraction task; user templates use {{placeholder}} slots

import { batchedAnalysisPrompt } from './batchedAnalysis';
import { chapterSummaryPrompt } from './chapterSummary';
import { characterNamesPrompt } from './characterNames';
import { dialogsPrompt } from './dialogs';
import { foreshadowingPrompt } from './foreshadowing';
import { keyMomentsPrompt } from './keyMoments';
import { plotPointsPrompt } from './plotPoints';
import { relationshipsPrompt } from './relationships';
import { storyPrompt, storyRemixPrompt } from './story';
import { themePrompt } from './theme';
import { traitsVoicePrompt } from './traitsVoice';
import { voiceProfilePrompt } from './voiceProfile';

export const LLM_PROMPTS = {
  characterNames: characterNamesPrompt,
  dialogs: dialogsPrompt,
  traitsVoice: traitsVoicePrompt,
  batchedAnalysis: batchedAnalysisPrompt,
  theme: themePrompt,
  plotPoints: plotPointsPrompt,
  foreshadowing: foreshadowingPrompt,
  chapterSummary: chapterSummaryPrompt,
  keyMoments: keyMomentsPrompt,
  relationships: relationshipsPrompt,
  voiceProfile: voiceProfilePrompt,
  story: storyPrompt,
  storyRemix: storyRemixPrompt,
} as const;

export type PromptKey = keyof typeof LLM_PROMPTS;
