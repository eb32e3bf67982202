export { OllamaClient, DEFAULT_OLLAMA_BASE_URL, DEFAULT_OLLAMA_MODEL } from './ollama';
export { LLMConnectionError } from './types';
export type { CompletionOptions, LLMClient } from './types';
