import { z } from 'zod';

/**
 * Wire shapes of model responses.
 *
 * Every optional field degrades through .catch() to the default the pipeline
 * uses, so a wrong type on one field never discards the whole item.
 * Fields without a .catch() are required: an item missing them is dropped.
 */

const text = (fallback: string) => z.string().trim().catch(fallback);

/** Non-blank text; blank and missing both fall back */
const label = (fallback: string) => z.string().trim().min(1).catch(fallback);

const requiredText = z.string().trim().min(1);

/** Numbers arrive as JSON numbers or numeric strings */
const numeric = (fallback: number) =>
  z
    .union([
      z.number(),
      z
        .string()
        .trim()
        .regex(/^-?\d+(\.\d+)?$/)
        .transform(Number),
    ])
    .catch(fallback);

const nullableText = z.string().trim().min(1).nullable().catch(null);

// Legacy batched `voice` object
export const VoiceObjectSchema = z.object({
  gender: text('male'),
  age: text('middle-aged'),
  accent: text('neutral'),
  pitch: numeric(1.0),
  speed: numeric(1.0),
});

// Dialog extraction: {"dialogs":[{speaker,text,emotion,intensity}]}
export const DialogItemSchema = z.object({
  speaker: requiredText,
  text: requiredText,
  emotion: label('neutral').transform((value) => value.toLowerCase()),
  intensity: numeric(0.5),
});

// Voice profile suggestion: {"characters":[{name, gender, age, tone, accent, voice_profile}]}
export const VoiceSuggestionSchema = z.object({
  name: requiredText,
  gender: label('male'),
  age: label('adult'),
  tone: text(''),
  accent: label('neutral'),
  voice_profile: z
    .object({
      pitch: numeric(1.0),
      speed: numeric(1.0),
      energy: numeric(1.0),
      emotion_bias: z.record(z.string(), z.unknown()).catch({}),
    })
    .catch({ pitch: 1.0, speed: 1.0, energy: 1.0, emotion_bias: {} }),
});

// Relationships: {"relationships":[{character, relationship, nature}]}
export const RelationshipItemSchema = z.object({
  character: requiredText,
  relationship: label('other'),
  nature: text(''),
});

// Key moments: {"moments":[{chapter, moment, significance}]}
export const KeyMomentItemSchema = z.object({
  chapter: z.union([z.string().trim(), z.number().transform(String)]).catch(''),
  moment: requiredText,
  significance: text(''),
});

// Theme analysis (whole object)
export const ThemeSchema = z.object({
  mood: label('classic'),
  genre: label('modern_fiction'),
  era: label('contemporary'),
  emotional_tone: label('neutral'),
  suggested_ambient_sound: nullableText,
});

// Plot points: [{type, chapter (1-based), description, confidence}]
export const PlotPointItemSchema = z.object({
  type: requiredText,
  chapter: numeric(1),
  description: requiredText,
  confidence: numeric(0.8),
});

// Foreshadowing: {"foreshadowing":[{setup_chapter, setup_text, payoff_chapter, payoff_text, theme, confidence}]}
export const ForeshadowingItemSchema = z.object({
  setup_chapter: z.union([z.number(), z.string().trim().regex(/^\d+$/).transform(Number)]),
  setup_text: text(''),
  payoff_chapter: z.union([z.number(), z.string().trim().regex(/^\d+$/).transform(Number)]),
  payoff_text: text(''),
  theme: label('unknown'),
  confidence: numeric(0.7),
});

const textList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.flatMap((item) => (typeof item === 'string' && item.trim() ? [item.trim()] : [])),
  );

// Chapter summary (whole object)
export const ChapterSummarySchema = z.object({
  summary: text(''),
  themes: textList,
  genre: text(''),
  mood: text(''),
  key_events: textList,
});

export type VoiceObject = z.infer<typeof VoiceObjectSchema>;
export type DialogItem = z.infer<typeof DialogItemSchema>;
export type VoiceSuggestionItem = z.infer<typeof VoiceSuggestionSchema>;
export type RelationshipItem = z.infer<typeof RelationshipItemSchema>;
export type KeyMomentItem = z.infer<typeof KeyMomentItemSchema>;
export type ThemeResponse = z.infer<typeof ThemeSchema>;
export type PlotPointItem = z.infer<typeof PlotPointItemSchema>;
export type ForeshadowingItem = z.infer<typeof ForeshadowingItemSchema>;
export type ChapterSummaryResponse = z.infer<typeof ChapterSummarySchema>;
