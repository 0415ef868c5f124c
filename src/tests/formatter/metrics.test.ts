import { describe, it, expect } from "vitest";
import { extractMetrics } from "../../core/formatter/index.js";
import { MOCK_ANALYSIS } from "../../providers/mock-llm.js";

describe("extractMetrics", () => {
  it("should read every headline metric in a fixed order", () => {
    expect(extractMetrics(MOCK_ANALYSIS)).toEqual([
      { label: "Cyclomatic Complexity", value: "4" },
      { label: "Maintainability", value: "7/10" },
      { label: "Complexity Rating", value: "Medium" },
      { label: "Overall Risk", value: "Low" },
    ]);
  });

  it("should accept an echoed range hint and bold values", () => {
    const text = "- Maintainability score (1-10): **6**\n- Complexity rating (Low/Medium/High): **HIGH**";
    expect(extractMetrics(text)).toEqual([
      { label: "Maintainability", value: "6" },
      { label: "Complexity Rating", value: "High" },
    ]);
  });

  it("should return nothing when no metric is present", () => {
    expect(extractMetrics("No numbers here.")).toEqual([]);
    expect(extractMetrics("")).toEqual([]);
  });
});
