/**
 * Ollama LLM Client
 *
 * Implementation of LLMClient for local Ollama instances.
 * Default: http://localhost:11434 with qwen2.5:7b model
 */

import { LLMConnectionError, type CompletionOptions, type LLMClient } from './types';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'qwen2.5:7b';

interface GenerateResponse {
  response: string;
  done: boolean;
}

function isGenerateResponse(value: unknown): value is GenerateResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'response' in value &&
    typeof value.response === 'string' &&
    'done' in value &&
    typeof value.done === 'boolean'
  );
}

/**
 * Ollama API client
 */
export class OllamaClient implements LLMClient {
  constructor(
    private baseUrl: string = DEFAULT_OLLAMA_BASE_URL,
    private model: string = DEFAULT_OLLAMA_MODEL,
    private fetchImpl: typeof fetch = fetch
  ) {}

  /**
   * Complete a prompt using Ollama
   */
  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          prompt,
          stream: false,
          options: {
            temperature: options?.temperature ?? 0.1, // Low temperature for structured output
            num_predict: options?.maxTokens ?? 1000,
          },
        }),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LLMConnectionError(
        `Cannot connect to Ollama at ${this.baseUrl}. Is Ollama running? (${reason})`,
        this.baseUrl
      );
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Ollama API error (${response.status}): ${errorText}`);
    }

    const data: unknown = await response.json();
    if (!isGenerateResponse(data)) {
      throw new Error('Ollama returned an unexpected response body');
    }
    if (!data.done) {
      throw new Error('Ollama response incomplete');
    }

    return data.response;
  }

  /**
   * Check if Ollama is available
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/tags`, {
        method: 'GET',
      });
      return response.ok;
    } catch {
      return false;
    }
  }
}
