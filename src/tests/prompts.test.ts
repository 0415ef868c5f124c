import { describe, it, expect } from "vitest";
import {
  ANALYSIS_CHUNK_SYSTEM_PROMPT,
  TEST_CASE_SYSTEM_PROMPT,
  mergeChunkResults,
  planAnalysisPrompts,
  planTestCasePrompts,
  splitIntoChunks,
} from "../core/prompts/index.js";
import { format } from "../core/formatter/index.js";

describe("splitIntoChunks", () => {
  it("should return short input as a single chunk", () => {
    expect(splitIntoChunks("abc", 10)).toEqual(["abc"]);
  });

  it("should break on line boundaries", () => {
    const code = "aaaa\nbbbb\ncccc";
    const chunks = splitIntoChunks(code, 9);
    expect(chunks).toEqual(["aaaa\nbbbb", "cccc"]);
    expect(chunks.join("\n")).toBe(code);
  });

  it("should cut a line longer than the limit", () => {
    expect(splitIntoChunks(`ab\n${"x".repeat(10)}`, 4)).toEqual(["ab", "xxxx", "xxxx", "xx"]);
  });

  it("should reject a non-positive limit", () => {
    expect(() => splitIntoChunks("abc", 0)).toThrow(RangeError);
  });
});

describe("mergeChunkResults", () => {
  it("should return a single result unchanged", () => {
    expect(mergeChunkResults(["one"])).toBe("one");
  });

  it("should put each part under its own heading", () => {
    expect(mergeChunkResults(["a ", "b"])).toBe("## Part 1 of 2\n\na\n\n## Part 2 of 2\n\nb");
  });

  it("should close a fence left open by a truncated part", () => {
    const merged = mergeChunkResults([
      "## Chunk Analysis\n```xml\n<pd:activity",
      "## Test Scenarios\nTest Case 1: x\nsteps",
    ]);

    expect(merged).toBe(
      "## Part 1 of 2\n\n## Chunk Analysis\n```xml\n<pd:activity\n```\n\n" +
        "## Part 2 of 2\n\n## Test Scenarios\nTest Case 1: x\nsteps",
    );
    expect(format(merged, "TestCases").sections.map((s) => s.title)).toEqual([
      "Part 1 of 2",
      "Chunk Analysis",
      "Part 2 of 2",
      "Test Scenarios",
      "Test Case 1: x",
    ]);
  });

  it("should close a fence with a run as long as its opener", () => {
    expect(mergeChunkResults(["~~~~\nx", "y"])).toBe("## Part 1 of 2\n\n~~~~\nx\n~~~~\n\n## Part 2 of 2\n\ny");
  });
});

describe("prompt plans", () => {
  const testOptions = { testTypes: ["Happy Path Tests", "Edge Cases"] as const, complexityLevel: "Basic" as const };
  const analysisOptions = { analysisAreas: ["Security Concerns"] as const, detailLevel: "Summary" as const };

  it("should build one full test case prompt for small input", () => {
    const plans = planTestCasePrompts("<pd:ProcessDefinition/>", testOptions, 1000);
    expect(plans).toHaveLength(1);
    expect(plans[0].systemPrompt).toBe(TEST_CASE_SYSTEM_PROMPT);
    expect(plans[0].temperature).toBe(0.3);
    expect(plans[0].maxTokens).toBe(4000);
    expect(plans[0].userMessage).toContain("TIBCO Code/XML:\n<pd:ProcessDefinition/>");
    expect(plans[0].userMessage).toContain("- Test Types: Happy Path Tests, Edge Cases");
    expect(plans[0].userMessage).toContain("- Complexity Level: Basic");
  });

  it("should build one chunk prompt per part for large input", () => {
    const code = "<a/>\n".repeat(500);
    const plans = planAnalysisPrompts(code, analysisOptions, 1000);
    expect(plans).toHaveLength(3);
    for (const plan of plans) {
      expect(plan.systemPrompt).toBe(ANALYSIS_CHUNK_SYSTEM_PROMPT);
      expect(plan.temperature).toBe(0.2);
      expect(plan.maxTokens).toBe(3000);
      expect(plan.userMessage).toContain("- Analysis Areas: Security Concerns");
      expect(plan.userMessage).toContain("- Detail Level: Summary");
    }
    expect(plans[0].userMessage).toContain("TIBCO Code/XML (part 1 of 3):");
    expect(plans[2].userMessage).toContain("TIBCO Code/XML (part 3 of 3):");
  });
});
