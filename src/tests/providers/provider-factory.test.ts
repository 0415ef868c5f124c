import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createLLMProvider, MockLLM, GroqLLM } from "../../providers/index.js";

// Mock OpenAI SDK so it doesn't need a real key at import time
vi.mock("openai", () => {
  return {
    default: class MockOpenAI {
      chat = { completions: { create: vi.fn() } };
    },
  };
});

describe("createLLMProvider", () => {
  let originalKey: string | undefined;

  beforeEach(() => {
    originalKey = process.env["GROQ_API_KEY"];
  });

  afterEach(() => {
    if (originalKey !== undefined) {
      process.env["GROQ_API_KEY"] = originalKey;
    } else {
      delete process.env["GROQ_API_KEY"];
    }
  });

  it("should return MockLLM when forceProvider=mock", () => {
    process.env["GROQ_API_KEY"] = "some-key";
    const llm = createLLMProvider({ forceProvider: "mock" });
    expect(llm).toBeInstanceOf(MockLLM);
  });

  it("should return GroqLLM when forceProvider=groq", () => {
    process.env["GROQ_API_KEY"] = "some-key";
    const llm = createLLMProvider({ forceProvider: "groq" });
    expect(llm).toBeInstanceOf(GroqLLM);
  });

  it("should throw when forceProvider=groq and no key is available", () => {
    delete process.env["GROQ_API_KEY"];
    expect(() => createLLMProvider({ forceProvider: "groq" })).toThrow("GROQ_API_KEY is required");
  });

  it("should auto-detect Groq when GROQ_API_KEY is set", () => {
    process.env["GROQ_API_KEY"] = "test-key";
    const llm = createLLMProvider();
    expect(llm).toBeInstanceOf(GroqLLM);
  });

  it("should use an explicit API key without the environment", () => {
    delete process.env["GROQ_API_KEY"];
    const llm = createLLMProvider({ apiKey: "test-key" });
    expect(llm).toBeInstanceOf(GroqLLM);
  });

  it("should fallback to MockLLM when no key is set", () => {
    delete process.env["GROQ_API_KEY"];
    const llm = createLLMProvider();
    expect(llm).toBeInstanceOf(MockLLM);
  });

  it("should pass custom model to Groq", () => {
    process.env["GROQ_API_KEY"] = "test-key";
    const llm = createLLMProvider({ model: "llama-3.1-8b-instant" });
    expect(llm.name).toBe("Groq/llama-3.1-8b-instant");
  });
});
