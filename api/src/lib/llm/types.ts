/**
 * LLM Client Interface
 *
 * Abstraction over the language-model provider. The parser and the
 * answer narrator depend only on this interface.
 */

/**
 * Options for LLM completion requests
 */
export interface CompletionOptions {
  temperature?: number; // 0.0-1.0, lower = more deterministic
  maxTokens?: number; // Maximum tokens to generate
}

/**
 * LLM client interface
 */
export interface LLMClient {
  /**
   * Complete a prompt and return the response
   *
   * @param prompt - The prompt to send to the LLM
   * @param options - Optional completion parameters
   * @returns The LLM's response text
   * @throws LLMConnectionError if the provider cannot be reached
   */
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * The provider could not be reached at all (as opposed to answering badly)
 */
export class LLMConnectionError extends Error {
  constructor(
    message: string,
    readonly baseUrl: string
  ) {
    super(message);
    this.name = 'LLMConnectionError';
  }
}
