import { describe, it, expect, vi, beforeEach } from "vitest";

// ── Mock the OpenAI SDK ────────────────────────────────────────────
const { mockCreate, constructorArgs } = vi.hoisted(() => {
  const constructorArgs: unknown[] = [];
  return { mockCreate: vi.fn(), constructorArgs };
});

vi.mock("openai", () => {
  return {
    default: class MockOpenAI {
      chat = {
        completions: {
          create: mockCreate,
        },
      };

      constructor(options: unknown) {
        constructorArgs.push(options);
      }
    },
  };
});

import { GroqLLM, GROQ_BASE_URL } from "../../providers/groq-llm.js";
import { ServiceError } from "../../core/errors.js";

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error,
  );
}

describe("GroqLLM", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    constructorArgs.length = 0;
  });

  it("should throw if no API key is provided", () => {
    const original = process.env["GROQ_API_KEY"];
    delete process.env["GROQ_API_KEY"];

    expect(() => new GroqLLM({ apiKey: undefined })).toThrow("GROQ_API_KEY is required");

    if (original) process.env["GROQ_API_KEY"] = original;
  });

  it("should point the SDK at the Groq endpoint", () => {
    const provider = new GroqLLM({ apiKey: "test-key" });
    expect(provider.name).toBe("Groq/llama-3.3-70b-versatile");
    expect(constructorArgs).toEqual([{ apiKey: "test-key", baseURL: GROQ_BASE_URL }]);
  });

  it("should accept a custom model and base URL", () => {
    const provider = new GroqLLM({
      apiKey: "test-key",
      model: "llama-3.1-8b-instant",
      baseURL: "http://localhost:8080/v1",
    });
    expect(provider.name).toBe("Groq/llama-3.1-8b-instant");
    expect(constructorArgs).toEqual([{ apiKey: "test-key", baseURL: "http://localhost:8080/v1" }]);
  });

  it("should call the chat completions API and return content", async () => {
    mockCreate.mockResolvedValueOnce({
      choices: [{ message: { content: "Test Case 1: Happy path" } }],
    });

    const provider = new GroqLLM({ apiKey: "test-key" });
    const result = await provider.generate("You are a tester.", "Write tests");

    expect(result).toBe("Test Case 1: Happy path");
    expect(mockCreate).toHaveBeenCalledOnce();
    expect(mockCreate).toHaveBeenCalledWith({
      model: "llama-3.3-70b-versatile",
      messages: [
        { role: "system", content: "You are a tester." },
        { role: "user", content: "Write tests" },
      ],
      temperature: 0.3,
      max_tokens: 4000,
    });
  });

  it("should apply per-call generation options", async () => {
    mockCreate.mockResolvedValueOnce({ choices: [{ message: { content: "ok" } }] });

    const provider = new GroqLLM({ apiKey: "test-key" });
    await provider.generate("sys", "msg", { model: "mixtral-8x7b-32768", temperature: 0.2, maxTokens: 3000 });

    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({ model: "mixtral-8x7b-32768", temperature: 0.2, max_tokens: 3000 }),
    );
  });

  it("should throw a ServiceError on empty response", async () => {
    mockCreate.mockResolvedValueOnce({
      choices: [{ message: { content: null } }],
    });

    const provider = new GroqLLM({ apiKey: "test-key" });
    const error = await failureOf(provider.generate("sys", "msg"));

    expect(error).toBeInstanceOf(ServiceError);
    if (error instanceof ServiceError) {
      expect(error.reason).toBe("empty-response");
      expect(error.message).toBe("Groq returned an empty response");
    }
  });

  it("should map an authentication failure", async () => {
    mockCreate.mockRejectedValueOnce(Object.assign(new Error("Invalid API Key"), { status: 401 }));

    const provider = new GroqLLM({ apiKey: "test-key" });
    const error = await failureOf(provider.generate("sys", "msg"));

    expect(error).toBeInstanceOf(ServiceError);
    if (error instanceof ServiceError) {
      expect(error.reason).toBe("auth");
      expect(error.status).toBe(401);
      expect(error.message).toBe("Groq API error: Invalid API Key");
    }
  });

  it("should propagate other API errors as upstream failures", async () => {
    mockCreate.mockRejectedValueOnce(new Error("Bad gateway"));

    const provider = new GroqLLM({ apiKey: "test-key" });
    await expect(provider.generate("sys", "msg")).rejects.toThrow("Groq API error: Bad gateway");
  });
});
