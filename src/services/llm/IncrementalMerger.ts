// Incremental Merger
// Folds per-batch character data into one cast, resolving name variants as it goes

import type { ILogger } from '@/services/Logger';
import type { ExtractedCharacterData, MergeState, MergedCharacter, MergedCharacterData } from '@/state/types';
import { FuzzyNameMatcher, type NameMatcher } from './NameMatcher';
import { PreferDetailedVoiceProfileMerger, type VoiceProfileMerger } from './VoiceProfileMerger';
import type { BatchedAnalysisOutput } from './prompts/BatchedAnalysisPrompt';

export interface IncrementalMergerOptions {
  nameMatcher?: NameMatcher;
  voiceProfileMerger?: VoiceProfileMerger;
  logger?: ILogger;
}

/**
 * Case-insensitive union; first-seen casing wins
 */
function unionTraits(existing: string[], incoming: readonly string[]): string[] {
  const seen = new Set(existing.map((trait) => trait.toLowerCase()));
  for (const trait of incoming) {
    const key = trait.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    existing.push(trait);
  }
  return existing;
}

/**
 * Merges batches in submission order. The state map is plain mutable data:
 * callers must not run two merges on the same map at once.
 */
export class IncrementalMerger {
  private readonly nameMatcher: NameMatcher;
  private readonly voiceProfileMerger: VoiceProfileMerger;
  private readonly logger?: ILogger;

  constructor(options: IncrementalMergerOptions = {}) {
    this.nameMatcher = options.nameMatcher ?? new FuzzyNameMatcher();
    this.voiceProfileMerger = options.voiceProfileMerger ?? new PreferDetailedVoiceProfileMerger();
    this.logger = options.logger;
  }

  createState(): MergeState {
    return new Map();
  }

  /**
   * Fold one batch into the state; mutates and returns it
   */
  merge(state: MergeState, batch: BatchedAnalysisOutput): MergeState {
    for (const character of batch.characters) {
      this.mergeCharacter(state, character);
    }
    return state;
  }

  fold(batches: Iterable<BatchedAnalysisOutput>, state: MergeState = this.createState()): MergeState {
    for (const batch of batches) {
      this.merge(state, batch);
    }
    return state;
  }

  /**
   * Frozen snapshots, most dialog first; ties keep insertion order
   */
  toList(state: MergeState): MergedCharacter[] {
    return Array.from(state.values(), snapshot).sort((a, b) => b.dialogs.length - a.dialogs.length);
  }

  private mergeCharacter(state: MergeState, character: ExtractedCharacterData): void {
    const name = character.name.trim();
    const canonicalName = this.nameMatcher.canonicalize(name);
    if (!canonicalName) {
      this.logger?.warn('[IncrementalMerger] Skipping character with blank name', { name: character.name });
      return;
    }

    const existing = state.get(canonicalName) ?? this.findVariantOwner(state, name);
    if (!existing) {
      state.set(canonicalName, {
        name,
        canonicalName,
        dialogs: [...character.dialogs],
        traits: unionTraits([], character.traits),
        voiceProfile: this.voiceProfileMerger.merge(undefined, character.voiceProfile),
        nameVariants: new Set([name]),
      });
      return;
    }

    existing.nameVariants.add(name);
    if (name.length > existing.name.length) {
      existing.name = name;
    }
    existing.dialogs.push(...character.dialogs);
    unionTraits(existing.traits, character.traits);
    existing.voiceProfile = this.voiceProfileMerger.merge(existing.voiceProfile, character.voiceProfile);
  }

  /** First match in map order wins; more than one candidate is logged */
  private findVariantOwner(state: MergeState, name: string): MergedCharacterData | undefined {
    const candidates: MergedCharacterData[] = [];
    for (const entry of state.values()) {
      if (this.nameMatcher.isVariant(name, entry.name, entry.nameVariants)) {
        candidates.push(entry);
      }
    }

    if (candidates.length > 1) {
      this.logger?.warn(`[IncrementalMerger] Ambiguous name "${name}", merging into "${candidates[0].name}"`, {
        candidates: candidates.map((candidate) => candidate.name),
      });
    }
    return candidates[0];
  }
}

function snapshot(data: MergedCharacterData): MergedCharacter {
  return Object.freeze({
    name: data.name,
    canonicalName: data.canonicalName,
    dialogs: Object.freeze([...data.dialogs]),
    traits: Object.freeze([...data.traits]),
    voiceProfile: data.voiceProfile && Object.freeze({ ...data.voiceProfile }),
    nameVariants: Object.freeze([...data.nameVariants]),
  });
}
