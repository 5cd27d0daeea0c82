// Voice Profile parsing
// Compact "Gender,Age,Accent,Pitch,Speed" tuples and the legacy voice object

import type { AgeGroup, ExtractedVoiceProfile, Gender } from '@/state/types';
import { isRecord } from '@/utils/llmUtils';
import { VoiceObjectSchema } from './schemas';

export const DEFAULT_VOICE_PROFILE: Readonly<ExtractedVoiceProfile> = Object.freeze({
  gender: 'male',
  age: 'middle-aged',
  accent: 'neutral',
  pitch: 1.0,
  speed: 1.0,
});

export const PITCH_RANGE = { min: 0.5, max: 1.5 } as const;
export const SPEED_RANGE = { min: 0.5, max: 2.0 } as const;

const AGE_ALIASES: Record<string, AgeGroup> = {
  child: 'child',
  kid: 'child',
  teen: 'young',
  teenager: 'young',
  young: 'young',
  youth: 'young',
  'young-adult': 'young-adult',
  'young adult': 'young-adult',
  'young_adult': 'young-adult',
  adult: 'middle-aged',
  'middle-aged': 'middle-aged',
  'middle aged': 'middle-aged',
  middle: 'middle-aged',
  elderly: 'elderly',
  old: 'elderly',
  senior: 'elderly',
};

export function normalizeGender(value: string): Gender {
  const lower = value.trim().toLowerCase();
  if (lower === 'female' || lower === 'f' || lower === 'woman' || lower === 'girl') return 'female';
  return DEFAULT_VOICE_PROFILE.gender;
}

export function normalizeAge(value: string): AgeGroup {
  return AGE_ALIASES[value.trim().toLowerCase()] ?? DEFAULT_VOICE_PROFILE.age;
}

function clamp(value: number, range: { min: number; max: number }): number {
  return Math.min(range.max, Math.max(range.min, value));
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Parse "Gender,Age,Accent[,Pitch,Speed]".
 * Needs at least three parts; blank parts take defaults.
 */
export function parseVoiceTuple(tuple: string): ExtractedVoiceProfile | undefined {
  const parts = tuple.split(',').map((part) => part.trim().toLowerCase());
  if (parts.length < 3) return undefined;

  const [gender, age, accent, pitch, speed] = parts;
  return {
    gender: gender ? normalizeGender(gender) : DEFAULT_VOICE_PROFILE.gender,
    age: age ? normalizeAge(age) : DEFAULT_VOICE_PROFILE.age,
    accent: accent || DEFAULT_VOICE_PROFILE.accent,
    pitch: clamp(parseNumber(pitch, DEFAULT_VOICE_PROFILE.pitch), PITCH_RANGE),
    speed: clamp(parseNumber(speed, DEFAULT_VOICE_PROFILE.speed), SPEED_RANGE),
  };
}

/**
 * Parse the legacy nested `voice` object; undefined when it is not an object
 */
export function parseVoiceObject(value: unknown): ExtractedVoiceProfile | undefined {
  if (!isRecord(value)) return undefined;
  const voice = VoiceObjectSchema.parse(value);
  return {
    gender: normalizeGender(voice.gender),
    age: normalizeAge(voice.age),
    accent: voice.accent.trim().toLowerCase() || DEFAULT_VOICE_PROFILE.accent,
    pitch: clamp(voice.pitch, PITCH_RANGE),
    speed: clamp(voice.speed, SPEED_RANGE),
  };
}

const PROFILE_FIELDS = ['gender', 'age', 'accent', 'pitch', 'speed'] as const;

export function isDefaultValue<K extends keyof ExtractedVoiceProfile>(field: K, value: ExtractedVoiceProfile[K]): boolean {
  return DEFAULT_VOICE_PROFILE[field] === value;
}

/**
 * Number of fields that differ from the defaults
 */
export function detailScore(profile: ExtractedVoiceProfile): number {
  return PROFILE_FIELDS.filter((field) => !isDefaultValue(field, profile[field])).length;
}

export function isDefaultProfile(profile: ExtractedVoiceProfile): boolean {
  return detailScore(profile) === 0;
}
