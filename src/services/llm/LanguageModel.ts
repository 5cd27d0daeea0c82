// Language Model boundary
// The only thing the pipeline knows about inference

export interface GenerateRequest {
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal;
  /** Tags request logs; not sent to the model */
  promptId?: string;
}

/**
 * Returns the raw completion text. An empty string is a valid answer
 * and is handled downstream as a blank response.
 */
export interface LanguageModel {
  generate(request: GenerateRequest): Promise<string>;
}
