/**
 * LLMProvider interface – the only way the app reaches a model.
 * Ships with GroqLLM (OpenAI-compatible API) and MockLLM.
 */
export interface GenerateOptions {
  /** Model id; providers fall back to their configured default. */
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMProvider {
  readonly name: string;

  /**
   * Generate a text completion given a system prompt and a user message.
   * Returns the raw text response from the LLM.
   */
  generate(systemPrompt: string, userMessage: string, options?: GenerateOptions): Promise<string>;
}
