// Chapter Voice Pipeline
// Public entry point

export * from './config';
export * from './errors';
export * from './services';
export * from './services/llm';
export * from './services/pipeline';
export type * from './state/types';
