/**
 * Provider factory – auto-detects which LLM backend to use.
 *
 * Priority:
 *   1. forceProvider option
 *   2. API key passed in or GROQ_API_KEY set → Groq provider
 *   3. Fallback → MockLLM (safe for tests / offline dev)
 *
 * Usage:
 *   import { createLLMProvider } from "../providers/index.js";
 *   const llm = createLLMProvider();
 */
export { MockLLM } from "./mock-llm.js";
export { GroqLLM, GROQ_BASE_URL } from "./groq-llm.js";
export type { LLMProvider, GenerateOptions } from "./llm-provider.js";

import pino from "pino";
import type { LLMProvider } from "./llm-provider.js";
import { MockLLM } from "./mock-llm.js";
import { GroqLLM } from "./groq-llm.js";

const logger = pino({ name: "providers" });

export function createLLMProvider(options?: {
  forceProvider?: "groq" | "mock";
  apiKey?: string;
  model?: string;
  baseURL?: string;
}): LLMProvider {
  // Explicit override
  if (options?.forceProvider === "mock") {
    return new MockLLM();
  }

  const apiKey = options?.apiKey ?? process.env["GROQ_API_KEY"];

  if (options?.forceProvider === "groq" || apiKey) {
    return new GroqLLM({ apiKey, model: options?.model, baseURL: options?.baseURL });
  }

  // Fallback
  logger.warn("No GROQ_API_KEY configured, using MockLLM");
  return new MockLLM();
}
