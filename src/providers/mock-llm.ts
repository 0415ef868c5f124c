import type { GenerateOptions, LLMProvider } from "./llm-provider.js";

export const MOCK_TEST_CASES = `# Test Case Overview
The process receives an order message and routes it to fulfilment.

Test Case 1: Valid order
1. Send a well-formed order message
2. Verify the confirmation reply

Test Case 2: Missing customer id
1. Send an order without a customer id
2. Verify the fault response`;

export const MOCK_ANALYSIS = `## Complexity Metrics
- Cyclomatic complexity: 4
- Maintainability score: 7/10

## Risk Assessment
Complexity rating: Medium
Overall risk: LOW`;

/**
 * MockLLM – a deterministic provider that returns canned Markdown.
 * Used for testing and development without any API keys.
 *
 * The system prompt decides which answer comes back: complexity review
 * prompts get an analysis, everything else gets test cases.
 */
export class MockLLM implements LLMProvider {
  readonly name = "MockLLM";

  /** Every call, in order. */
  readonly calls: Array<{ systemPrompt: string; userMessage: string; options?: GenerateOptions }> = [];

  async generate(systemPrompt: string, userMessage: string, options?: GenerateOptions): Promise<string> {
    this.calls.push({ systemPrompt, userMessage, options });
    return /complexity/i.test(systemPrompt) ? MOCK_ANALYSIS : MOCK_TEST_CASES;
  }
}
