// Workflow Config
// Which passes a chapter analysis runs, and how each is tuned

import { PASS_CONFIGS, passConfig, type PassConfig } from './types';

export interface WorkflowConfig {
  readonly name: string;
  readonly runCharacterExtraction: boolean;
  readonly runDialogExtraction: boolean;
  readonly runTraitsExtraction: boolean;
  readonly pass1Config: PassConfig;
  readonly pass2Config: PassConfig;
  readonly pass3Config: PassConfig;
  /** Segment size for character name extraction */
  readonly segmentSizePass1: number;
  /** Segment size for dialog extraction */
  readonly segmentSizePass2: number;
  /** Dialog context handed to the traits pass, per character */
  readonly maxContextPerCharacter: number;
}

/**
 * Number of passes a workflow runs
 */
export function passCount(config: WorkflowConfig): number {
  return [config.runCharacterExtraction, config.runDialogExtraction, config.runTraitsExtraction].filter(Boolean)
    .length;
}

const BASE: WorkflowConfig = {
  name: 'Custom Workflow',
  runCharacterExtraction: true,
  runDialogExtraction: true,
  runTraitsExtraction: true,
  pass1Config: PASS_CONFIGS.characterExtraction,
  pass2Config: PASS_CONFIGS.dialogExtraction,
  pass3Config: PASS_CONFIGS.traitsExtraction,
  segmentSizePass1: 12_000,
  segmentSizePass2: 6_000,
  maxContextPerCharacter: 10_000,
};

function workflow(overrides: Partial<WorkflowConfig>): WorkflowConfig {
  return Object.freeze({ ...BASE, ...overrides });
}

// ========== Presets ==========

/** Names and dialogs; quick, suits weaker models */
export const TWO_PASS = workflow({
  name: '2-Pass Workflow',
  runTraitsExtraction: false,
});

/** Names, dialogs, then traits and voice per character */
export const THREE_PASS = workflow({
  name: '3-Pass Workflow',
  segmentSizePass1: 10_000,
  segmentSizePass2: 10_000,
});

export const CHARACTER_ONLY = workflow({
  name: 'Character-Only Workflow',
  runDialogExtraction: false,
  runTraitsExtraction: false,
});

/**
 * Two passes with a tight name budget and a warmer dialog pass, for small fast models
 */
export function forFastModel(): WorkflowConfig {
  return workflow({
    name: 'Fast 2-Pass Workflow',
    runTraitsExtraction: false,
    pass1Config: passConfig({ maxTokens: 100, temperature: 0.1, maxSegmentChars: 12_000 }),
    pass2Config: passConfig({ maxTokens: 2100, temperature: 0.35, maxSegmentChars: 6_000 }),
  });
}

/**
 * All three passes over larger segments, for models that handle richer output
 */
export function forRichModel(): WorkflowConfig {
  return workflow({
    name: 'Rich 3-Pass Workflow',
    pass1Config: passConfig({ maxTokens: 256, temperature: 0.1, maxSegmentChars: 10_000 }),
    pass2Config: passConfig({ maxTokens: 512, temperature: 0.15, maxSegmentChars: 10_000 }),
    pass3Config: passConfig({ maxTokens: 384, temperature: 0.1, maxSegmentChars: 10_000 }),
    segmentSizePass1: 10_000,
    segmentSizePass2: 10_000,
  });
}

// ========== Builder ==========

export class WorkflowConfigBuilder {
  private config: WorkflowConfig = { ...BASE, runTraitsExtraction: false };

  name(name: string): this {
    return this.set({ name });
  }

  withCharacterExtraction(enabled = true): this {
    return this.set({ runCharacterExtraction: enabled });
  }

  withDialogExtraction(enabled = true): this {
    return this.set({ runDialogExtraction: enabled });
  }

  withTraitsExtraction(enabled = true): this {
    return this.set({ runTraitsExtraction: enabled });
  }

  pass1Config(config: PassConfig): this {
    return this.set({ pass1Config: config });
  }

  pass2Config(config: PassConfig): this {
    return this.set({ pass2Config: config });
  }

  pass3Config(config: PassConfig): this {
    return this.set({ pass3Config: config });
  }

  segmentSizePass1(size: number): this {
    return this.set({ segmentSizePass1: size });
  }

  segmentSizePass2(size: number): this {
    return this.set({ segmentSizePass2: size });
  }

  maxContextPerCharacter(size: number): this {
    return this.set({ maxContextPerCharacter: size });
  }

  build(): WorkflowConfig {
    return Object.freeze({ ...this.config });
  }

  private set(patch: Partial<WorkflowConfig>): this {
    this.config = { ...this.config, ...patch };
    return this;
  }
}
