// Model Connection Settings
// Validated settings for an OpenAI-compatible inference server

import { z } from 'zod';
import { AppError } from '@/errors';
import { defaultConfig } from './defaults';

export const ModelSettingsSchema = z.object({
  apiUrl: z.url(),
  // Local servers (llama.cpp, Ollama, LM Studio) accept any key
  apiKey: z.string().min(1).default('not-needed'),
  model: z.string().min(1),
  streaming: z.boolean().default(false),
  reasoning: z.enum(['auto', 'high', 'medium', 'low']).optional(),
  topP: z.number().min(0).max(1).optional(),
  requestTimeoutMs: z.number().int().positive().default(defaultConfig.llm.requestTimeoutMs),
  debugDir: z.string().min(1).optional(),
});

export type ModelSettings = z.infer<typeof ModelSettingsSchema>;
export type ModelSettingsInput = z.input<typeof ModelSettingsSchema>;

/**
 * Validate raw settings, failing loudly on a bad configuration
 */
export function parseModelSettings(input: unknown): ModelSettings {
  const result = ModelSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new AppError('INVALID_CONFIG', `Invalid model settings:\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}

/**
 * Read settings from LLM_* environment variables
 */
export function modelSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): ModelSettings {
  return parseModelSettings({
    apiUrl: env.LLM_API_URL,
    apiKey: env.LLM_API_KEY || undefined,
    model: env.LLM_MODEL,
    streaming: env.LLM_STREAMING === 'true',
    debugDir: env.LLM_DEBUG_DIR || undefined,
  });
}
