import type { ExtractedVoiceProfile } from '@/state/types';
import { isDefaultValue } from './VoiceProfile';

/**
 * Reconciles two partial voice profiles for the same character.
 * Must be deterministic for the same two inputs.
 */
export interface VoiceProfileMerger {
  merge(
    existing: ExtractedVoiceProfile | undefined,
    incoming: ExtractedVoiceProfile | undefined,
  ): ExtractedVoiceProfile | undefined;
}

/**
 * Field by field: a non-default incoming value wins, otherwise the existing value stays.
 * A profile missing on either side yields the other one.
 */
export class PreferDetailedVoiceProfileMerger implements VoiceProfileMerger {
  merge(
    existing: ExtractedVoiceProfile | undefined,
    incoming: ExtractedVoiceProfile | undefined,
  ): ExtractedVoiceProfile | undefined {
    if (!existing) return incoming && { ...incoming };
    if (!incoming) return { ...existing };

    const pick = <K extends keyof ExtractedVoiceProfile>(field: K): ExtractedVoiceProfile[K] =>
      isDefaultValue(field, incoming[field]) ? existing[field] : incoming[field];

    return {
      gender: pick('gender'),
      age: pick('age'),
      accent: pick('accent'),
      pitch: pick('pitch'),
      speed: pick('speed'),
    };
  }
}

/** Latest profile replaces the earlier one */
export class PreferNewVoiceProfileMerger implements VoiceProfileMerger {
  merge(
    existing: ExtractedVoiceProfile | undefined,
    incoming: ExtractedVoiceProfile | undefined,
  ): ExtractedVoiceProfile | undefined {
    const profile = incoming ?? existing;
    return profile && { ...profile };
  }
}

/** First profile seen is kept */
export class PreferExistingVoiceProfileMerger implements VoiceProfileMerger {
  merge(
    existing: ExtractedVoiceProfile | undefined,
    incoming: ExtractedVoiceProfile | undefined,
  ): ExtractedVoiceProfile | undefined {
    const profile = existing ?? incoming;
    return profile && { ...profile };
  }
}
