import OpenAI from "openai";
import { DEFAULT_MODEL } from "../core/schemas/index.js";
import { ServiceError, toServiceError } from "../core/errors.js";
import type { GenerateOptions, LLMProvider } from "./llm-provider.js";

export const GROQ_BASE_URL = "https://api.groq.com/openai/v1";

/**
 * Groq LLM provider – talks to Groq's OpenAI-compatible endpoint through the
 * OpenAI SDK.
 *
 * Reads GROQ_API_KEY from environment unless a key is passed in.
 * SDK failures surface as ServiceError.
 */
export class GroqLLM implements LLMProvider {
  readonly name: string;
  private client: OpenAI;
  private model: string;

  constructor(options?: { apiKey?: string; model?: string; baseURL?: string }) {
    const apiKey = options?.apiKey ?? process.env["GROQ_API_KEY"];
    if (!apiKey) {
      throw new Error("GROQ_API_KEY is required. Set it in .env or pass via constructor.");
    }

    this.model = options?.model ?? DEFAULT_MODEL;
    this.name = `Groq/${this.model}`;
    this.client = new OpenAI({ apiKey, baseURL: options?.baseURL ?? GROQ_BASE_URL });
  }

  async generate(
    systemPrompt: string,
    userMessage: string,
    options?: GenerateOptions,
  ): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: options?.model ?? this.model,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userMessage },
        ],
        temperature: options?.temperature ?? 0.3,
        max_tokens: options?.maxTokens ?? 4000,
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      throw toServiceError(error);
    }

    if (!content) {
      throw new ServiceError("Groq returned an empty response", { reason: "empty-response" });
    }

    return content;
  }
}
