// Domain types for chapter analysis

// ========== Voice ==========

export type Gender = 'male' | 'female';

export type AgeGroup = 'child' | 'young' | 'young-adult' | 'middle-aged' | 'elderly';

/**
 * Compact voice profile carried by batched extraction.
 * Accent is open-ended (neutral, british, american, asian, ...).
 */
export interface ExtractedVoiceProfile {
  gender: Gender;
  age: AgeGroup;
  accent: string;
  /** 0.5 - 1.5 */
  pitch: number;
  /** 0.5 - 2.0 */
  speed: number;
}

/**
 * Richer profile suggested by the dedicated voice-profile prompt
 */
export interface VoiceProfileSuggestion extends ExtractedVoiceProfile {
  characterName: string;
  tone: string;
  energy: number;
  emotionBias: Record<string, number>;
}

// ========== Characters ==========

/**
 * One batch's view of one character; consumed by the merger right away
 */
export interface ExtractedCharacterData {
  name: string;
  dialogs: string[];
  traits: string[];
  voiceProfile?: ExtractedVoiceProfile;
}

/**
 * Accumulator entry owned by IncrementalMerger; mutated in place across batches
 */
export interface MergedCharacterData {
  /** Display name, upgraded to the longest variant seen */
  name: string;
  /** Stable map key, fixed at creation */
  readonly canonicalName: string;
  dialogs: string[];
  /** Case-insensitively unique, first-seen casing */
  traits: string[];
  voiceProfile?: ExtractedVoiceProfile;
  nameVariants: Set<string>;
}

export type MergeState = Map<string, MergedCharacterData>;

/**
 * Immutable snapshot handed to persistence and voice assignment
 */
export interface MergedCharacter {
  readonly name: string;
  readonly canonicalName: string;
  readonly dialogs: readonly string[];
  readonly traits: readonly string[];
  readonly voiceProfile?: Readonly<ExtractedVoiceProfile>;
  readonly nameVariants: readonly string[];
}

// ========== Dialogs ==========

export interface ExtractedDialog {
  speaker: string;
  text: string;
  emotion: string;
  /** 0 - 1 */
  intensity: number;
}

// ========== Book insights ==========

export interface ThemeAnalysis {
  bookId: string;
  mood: string;
  genre: string;
  era: string;
  emotionalTone: string;
  ambientSound: string | null;
}

export type PlotPointType =
  | 'EXPOSITION'
  | 'INCITING_INCIDENT'
  | 'RISING_ACTION'
  | 'MIDPOINT'
  | 'CLIMAX'
  | 'FALLING_ACTION'
  | 'RESOLUTION';

export interface PlotPoint {
  type: PlotPointType;
  /** 0-based */
  chapterIndex: number;
  description: string;
  /** 0 - 1 */
  confidence: number;
}

/**
 * A hint in one chapter and the place it pays off
 */
export interface Foreshadowing {
  /** 0-based */
  setupChapter: number;
  setupText: string;
  /** 0-based */
  payoffChapter: number;
  payoffText: string;
  theme: string;
  /** 0 - 1 */
  confidence: number;
}

export interface ChapterSummary {
  summary: string;
  themes: string[];
  genre: string;
  mood: string;
  keyEvents: string[];
}

export interface KeyMoment {
  chapter: string;
  moment: string;
  significance: string;
}

export interface CharacterRelationship {
  character: string;
  relationship: string;
  nature: string;
}
